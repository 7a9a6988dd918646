//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import appInsights from 'applicationinsights';

import type { TelemetryClient } from 'applicationinsights';
import type {
  IInsightsClient,
  InsightsEventTelemetry,
  InsightsExceptionTelemetry,
  InsightsMetricTelemetry,
  InsightsProperties,
} from '../interfaces/index.js';

const debug = Debug('appinsights');

function describeProperties(properties?: InsightsProperties) {
  if (!properties) {
    return '';
  }
  let props = ' ';
  for (const [key, value] of Object.entries(properties)) {
    props += `${key}=${value} `;
  }
  return props;
}

class DebugInsightsClient implements IInsightsClient {
  constructor(private commonProperties: InsightsProperties) {}

  trackEvent(telemetry: InsightsEventTelemetry) {
    debug(telemetry.name + describeProperties({ ...this.commonProperties, ...telemetry.properties }));
  }

  trackException(telemetry: InsightsExceptionTelemetry) {
    debug(`Exception ${telemetry.exception.message}` + describeProperties(telemetry.properties));
  }

  trackMetric(telemetry: InsightsMetricTelemetry) {
    debug(`Metric(${telemetry.name}: ${telemetry.value})`);
  }

  async flush() {}
}

class WrappedInsightsClient implements IInsightsClient {
  constructor(private client: TelemetryClient) {}

  trackEvent(telemetry: InsightsEventTelemetry) {
    this.client.trackEvent(telemetry);
  }

  trackException(telemetry: InsightsExceptionTelemetry) {
    this.client.trackException(telemetry);
  }

  trackMetric(telemetry: InsightsMetricTelemetry) {
    this.client.trackMetric(telemetry);
  }

  flush(): Promise<void> {
    return new Promise((resolve) => {
      this.client.flush({
        callback: () => resolve(),
      });
    });
  }
}

export function createInsightsClient(
  propertiesToInsert: InsightsProperties,
  connectionString?: string
): IInsightsClient {
  if (!connectionString) {
    debug('insights telemetry is not configured with a connection string');
    return new DebugInsightsClient(propertiesToInsert);
  }
  const client = new appInsights.TelemetryClient(connectionString);
  client.commonProperties = propertiesToInsert;
  debug(`insights telemetry will use endpoint ${client.config.endpointUrl}`);
  return new WrappedInsightsClient(client);
}

export default createInsightsClient;
