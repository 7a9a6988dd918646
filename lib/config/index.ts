//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import dotenv from 'dotenv';
import fs from 'fs';
import objectPath from 'object-path';
import path from 'path';
import { fileURLToPath } from 'url';

import buildConfigurationGraph from './graphBuilder.js';
import environmentConfigurationResolver, {
  processEnvironmentProvider,
  type IEnvironmentProvider,
} from './environmentConfigurationResolver.js';
import { CreateError } from '../transitional.js';

import type { SiteConfiguration } from '../../interfaces/index.js';
import type { ConfigDeviceSyncPlatform } from '../../config/deviceSync.types.js';

const debug = Debug('config');

const CONFIGURATION_DIRECTORY_ENV_VAR_KEY = 'CONFIGURATION_DIRECTORY';
const DOT_ENV_OVERRIDES_PROCESS_ENV_VAR_KEY = 'PREFER_DOTENV';

export type ConfigurationOptions = {
  provider?: IEnvironmentProvider;
  configurationDirectory?: string;
  skipDotEnv?: boolean;
};

function preloadDotEnv(dotEnvFilename: string): Record<string, string> {
  const dotenvPath = path.resolve(process.cwd(), dotEnvFilename);
  if (!fs.existsSync(dotenvPath)) {
    return {};
  }
  const outcome = dotenv.config({ path: dotenvPath });
  if (outcome.error) {
    throw outcome.error;
  }
  if (outcome.parsed) {
    debug(`Parsed ${Object.keys(outcome.parsed).length} environment variables from ${dotenvPath}`);
    return outcome.parsed;
  }
  return {};
}

// config/ sits at the project root; from dist/ it is one directory further up.
export function getConfigurationDirectory(provider: IEnvironmentProvider): string {
  const fromEnvironment = provider.get(CONFIGURATION_DIRECTORY_ENV_VAR_KEY);
  if (fromEnvironment) {
    return path.resolve(fromEnvironment);
  }
  const dirname = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(dirname, '..', '..', 'config'), path.resolve(dirname, '..', '..', '..', 'config')];
  const found = candidates.find((candidate) => fs.existsSync(path.join(candidate, 'graph.json')));
  if (!found) {
    throw CreateError.InvalidParameters(`No configuration directory found, looked in: ${candidates.join(', ')}`);
  }
  return found;
}

function readString(graph: object, key: string): string | undefined {
  const value: unknown = objectPath.get(graph, key);
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  throw CreateError.InvalidParameters(`Configuration value ${key} must be a string`);
}

function readBoolean(graph: object, key: string): boolean {
  const value: unknown = objectPath.get(graph, key);
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return value === '1' || value.toLowerCase() === 'true';
  }
  return false;
}

function readInteger(graph: object, key: string): number | undefined {
  const value: unknown = objectPath.get(graph, key);
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  throw CreateError.InvalidParameters(`Configuration value ${key} must be an integer, not "${String(value)}"`);
}

function readPositiveInteger(graph: object, key: string): number | undefined {
  const value = readInteger(graph, key);
  if (value !== undefined && value < 1) {
    throw CreateError.InvalidParameters(`Configuration value ${key} must be a positive integer, not "${value}"`);
  }
  return value;
}

function readPlatform(graph: object, key: string): ConfigDeviceSyncPlatform {
  return {
    minimumVersion: readString(graph, `${key}.minimumVersion`),
    operator: readString(graph, `${key}.operator`),
  };
}

export function createSiteConfiguration(graph: object, provider: IEnvironmentProvider): SiteConfiguration {
  return {
    activeDirectory: {
      application: {
        tenantId: readString(graph, 'activeDirectory.application.tenantId'),
        clientId: readString(graph, 'activeDirectory.application.clientId'),
        clientSecret: readString(graph, 'activeDirectory.application.clientSecret'),
        managedIdentityClientId: readString(graph, 'activeDirectory.application.managedIdentityClientId'),
        useDeveloperCli: readBoolean(graph, 'activeDirectory.application.useDeveloperCli'),
      },
    },
    debug: {
      environmentName: readString(graph, 'debug.environmentName'),
      exitImmediately: readBoolean(graph, 'debug.exitImmediately'),
    },
    deviceSync: {
      sourceGroups: readString(graph, 'deviceSync.sourceGroups'),
      targetGroup: readString(graph, 'deviceSync.targetGroup'),
      addMode: readString(graph, 'deviceSync.addMode'),
      clearFirst: readBoolean(graph, 'deviceSync.clearFirst'),
      dryRun: readBoolean(graph, 'deviceSync.dryRun'),
      failOnMemberErrors: readBoolean(graph, 'deviceSync.failOnMemberErrors'),
      serverSideVersionFilter: readBoolean(graph, 'deviceSync.serverSideVersionFilter'),
      batchSize: readPositiveInteger(graph, 'deviceSync.batchSize'),
      maximumResults: readPositiveInteger(graph, 'deviceSync.maximumResults'),
      reportPath: readString(graph, 'deviceSync.reportPath'),
      platforms: {
        ios: readPlatform(graph, 'deviceSync.platforms.ios'),
        ipados: readPlatform(graph, 'deviceSync.platforms.ipados'),
        windows: readPlatform(graph, 'deviceSync.platforms.windows'),
      },
    },
    graph: {
      provider: readString(graph, 'graph.provider') || 'microsoftGraphProvider',
      retries: readInteger(graph, 'graph.retries'),
      maximumPages: readInteger(graph, 'graph.maximumPages'),
    },
    process: provider,
    telemetry: {
      jobsApplicationInsightsConnectionString: readString(
        graph,
        'telemetry.jobsApplicationInsightsConnectionString'
      ),
    },
  };
}

export async function loadConfiguration(options?: ConfigurationOptions): Promise<SiteConfiguration> {
  // By capturing the values, we can override without relying on the default dotenv
  // approach and better log the outcomes.
  const envProviderOptions: { overrideValues: Record<string, string> } = { overrideValues: {} };
  const provider = options?.provider || processEnvironmentProvider(envProviderOptions);
  const dotEnvFilename = provider.get('DOTENV_FILENAME') || '.env';
  const dotenvValues = !options?.skipDotEnv && !options?.provider ? preloadDotEnv(dotEnvFilename) : {};
  if (provider.get(DOT_ENV_OVERRIDES_PROCESS_ENV_VAR_KEY) === '1') {
    envProviderOptions.overrideValues = dotenvValues;
    debug(
      `The ${DOT_ENV_OVERRIDES_PROCESS_ENV_VAR_KEY} environment variable was set to 1. Preferring .env file over process.env values.`
    );
  }
  const directory = options?.configurationDirectory || getConfigurationDirectory(provider);
  debug(`Configuration directory: ${directory}`);
  const graph = await buildConfigurationGraph(directory, { requireConfigurationDirectory: true });
  await environmentConfigurationResolver({ provider }).resolveObjectVariables(graph);
  return createSiteConfiguration(graph, provider);
}
