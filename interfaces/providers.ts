//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { SiteConfiguration } from './config.js';
import type { IGraphProvider } from '../lib/graphProvider/index.js';
import type { EntraApplication } from '../lib/applicationIdentity.js';

export type InsightsProperties = Record<string, string>;

export type InsightsEventTelemetry = {
  name: string;
  properties?: InsightsProperties;
};

export type InsightsExceptionTelemetry = {
  exception: Error;
  properties?: InsightsProperties;
};

export type InsightsMetricTelemetry = {
  name: string;
  value: number;
  properties?: InsightsProperties;
};

// The subset of the applicationinsights TelemetryClient used by jobs
export interface IInsightsClient {
  trackEvent(telemetry: InsightsEventTelemetry): void;
  trackException(telemetry: InsightsExceptionTelemetry): void;
  trackMetric(telemetry: InsightsMetricTelemetry): void;
  flush(): Promise<void>;
}

export interface IProviders {
  config: SiteConfiguration;
  insights: IInsightsClient;
  graphProvider: IGraphProvider;
  entraApplication?: EntraApplication;
}
