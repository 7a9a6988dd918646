//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { IProviders } from './providers.js';

export interface IJob {
  started: Date;
  providers: IProviders;
  args: string[];
}

export interface IJobResult {
  successProperties?: Record<string, string>;
  // A job that completes but wants a non-zero exit code
  failed?: boolean;
}

export interface IJobOptions {
  timeoutMinutes?: number;
  defaultDebugOutput?: string;
  insightsPrefix?: string;
  name?: string;
  args?: string[];
}
