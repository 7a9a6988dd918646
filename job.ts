//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { hostname } from 'os';
import Debug from 'debug';

import type { IJob, IJobOptions, IJobResult, IProviders, SiteConfiguration } from './interfaces/index.js';
import { EntraApplication } from './lib/applicationIdentity.js';
import { loadConfiguration } from './lib/config/index.js';
import { createGraphProviderInstance } from './lib/graphProvider/index.js';
import { createInsightsClient } from './lib/insights.js';
import { quitInTenSeconds } from './lib/utils.js';

const debug = Debug('startup');

export function createJobProviders(config: SiteConfiguration, name: string): IProviders {
  const insights = createInsightsClient(
    {
      job: name,
      environment: config.debug.environmentName || 'unknown',
    },
    config.telemetry.jobsApplicationInsightsConnectionString
  );
  const entraApplication = new EntraApplication(config, name, insights);
  const graphProvider = createGraphProviderInstance(config, entraApplication);
  return {
    config,
    insights,
    entraApplication,
    graphProvider,
  };
}

export async function runJob(
  job: (job: IJob) => Promise<IJobResult>,
  options?: IJobOptions
): Promise<IJobResult | undefined> {
  debug('starting job...');

  options = options || {};
  const name = options.name || 'job';
  const started = new Date();
  const timeoutMinutes = options.timeoutMinutes;
  const killTimer = timeoutMinutes
    ? setTimeout(
        () => {
          console.log(`Kill bit at ${timeoutMinutes}m`);
          process.exit(1);
        },
        1000 * 60 * timeoutMinutes
      )
    : undefined;
  if (options.defaultDebugOutput && !process.env.DEBUG) {
    Debug.enable(options.defaultDebugOutput);
  }

  let providers: IProviders;
  try {
    const config = await loadConfiguration();
    providers = createJobProviders(config, name);
  } catch (startupError) {
    console.error(`Job startup error before runJob: ${startupError}`);
    if (startupError instanceof Error && startupError.stack) {
      console.error(startupError.stack);
    }
    clearTimeout(killTimer);
    quitInTenSeconds(false);
    return undefined;
  }
  const { insights, config } = providers;
  if (options.insightsPrefix) {
    insights.trackEvent({
      name: `${options.insightsPrefix}Started`,
      properties: {
        hostname: hostname(),
      },
    });
  }
  const jobObject: IJob = {
    providers,
    started,
    args: options.args || (process.argv.length > 2 ? process.argv.slice(2) : []),
  };
  let result: IJobResult | undefined;
  try {
    result = await job(jobObject);
    if (options.insightsPrefix) {
      insights.trackEvent({
        name: `${options.insightsPrefix}${result.failed ? 'CompletedWithErrors' : 'Success'}`,
        properties: {
          hostname: hostname(),
          ...result.successProperties,
        },
      });
    }
  } catch (jobError) {
    console.error(`The job failed: ${jobError}`);
    const exception = jobError instanceof Error ? jobError : new Error(String(jobError));
    if (exception.stack) {
      console.error(exception.stack);
    }
    if (options.insightsPrefix) {
      insights.trackException({
        exception,
        properties: {
          name: `${options.insightsPrefix}Failure`,
        },
      });
    }
  } finally {
    clearTimeout(killTimer);
    providers.entraApplication?.clearTokenCache();
    await trySilentInsightsFlush(providers);
  }
  const successful = result !== undefined && !result.failed;
  console.log();
  if (successful) {
    console.log('The job was successful.');
  } else if (result?.failed) {
    console.log('The job completed, but some members could not be updated.');
  }
  quitInTenSeconds(successful, config);
  return result;
}

async function trySilentInsightsFlush(providers: IProviders) {
  try {
    await providers.insights.flush();
  } catch (ignored) {
    console.warn(ignored);
  }
}

export const job = {
  run: async (
    script: (providers: IProviders, jobParameters: IJob) => Promise<IJobResult>,
    options?: IJobOptions
  ) => {
    return runJob(async function (jobParameters: IJob) {
      return script(jobParameters.providers, jobParameters);
    }, options);
  },
};

export default job;
