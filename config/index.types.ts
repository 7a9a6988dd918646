//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { ConfigRootActiveDirectory } from './activeDirectory.types.js';
import type { ConfigRootDebug } from './debug.types.js';
import type { ConfigRootDeviceSync } from './deviceSync.types.js';
import type { ConfigRootGraph } from './graph.types.js';
import type { ConfigRootProcess } from './process.types.js';
import type { ConfigRootTelemetry } from './telemetry.types.js';

// prettier-ignore
export type SiteConfiguration =
  ConfigRootActiveDirectory &
  ConfigRootDebug &
  ConfigRootDeviceSync &
  ConfigRootGraph &
  ConfigRootProcess &
  ConfigRootTelemetry;
