//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import objectPath from 'object-path';
import { URL } from 'url';

// Configuration Assumptions:
// In URL syntax, we define a custom scheme of "env://" which resolves
// an environment variable in the object, directly overwriting the
// original value.
//
// For example:
//   "env://HOSTNAME" will resolve on a Windows machine to its hostname
//
// Supported query parameters: default, trueIf, type (boolean, integer, date).

const envProtocol = 'env:';

const debug = Debug('config');

export interface IEnvironmentProvider {
  get: (key: string) => string | undefined;
}

export interface IEnvironmentProviderOptions {
  provider?: IEnvironmentProvider;
  overrideValues?: Record<string, string>;
}

type EnvironmentValueType = string | number | boolean | Date | undefined;

function getUrlIfEnvironmentVariable(value: string) {
  try {
    const u = new URL(value);
    if (u.protocol === envProtocol) {
      return u;
    }
  } catch (typeError) {
    /* not a URL */
  }
  return null;
}

function identifyPaths(node: object, prefix?: string): Record<string, URL> {
  prefix = prefix !== undefined ? prefix + '.' : '';
  const paths: Record<string, URL> = {};
  for (const [property, value] of Object.entries(node)) {
    if (value && typeof value === 'object') {
      Object.assign(paths, identifyPaths(value, prefix + property));
      continue;
    }
    if (typeof value !== 'string') {
      continue;
    }
    const envUrl = getUrlIfEnvironmentVariable(value);
    if (!envUrl) {
      continue;
    }
    const originalHostname = value.substring(
      value.indexOf(envProtocol) + envProtocol.length + 2,
      value.indexOf(envProtocol) + envProtocol.length + 2 + envUrl.hostname.length
    );
    if (originalHostname.toLowerCase() === envUrl.hostname.toLowerCase()) {
      envUrl.hostname = originalHostname;
    }
    paths[prefix + property] = envUrl;
  }
  return paths;
}

function castEnvironmentValue(variableName: string, type: string, currentValue: EnvironmentValueType) {
  switch (type) {
    case 'boolean':
    case 'bool': {
      return !!(currentValue && currentValue !== 'false' && currentValue !== '0' && currentValue !== 'False');
    }
    case 'date': {
      return currentValue === undefined ? undefined : new Date(String(currentValue));
    }
    case 'integer':
    case 'int': {
      if (currentValue === undefined) {
        return currentValue;
      }
      const attemptedValue = parseInt(String(currentValue), 10);
      if (isNaN(attemptedValue)) {
        console.warn(
          `The value "${currentValue}" for the env:// variable "${variableName}" is not a valid integer. Using the original value instead.`
        );
        return currentValue;
      }
      return attemptedValue;
    }
    default: {
      throw new Error(
        `The "type" parameter for the env:// string was set to "${type}", a type that is currently not supported.`
      );
    }
  }
}

export function processEnvironmentProvider(options?: IEnvironmentProviderOptions): IEnvironmentProvider {
  return {
    get: (key: string) => {
      const { overrideValues } = options || {};
      if (overrideValues && overrideValues[key] && overrideValues[key] !== process.env[key]) {
        const overrideOrSetDescriptor = process.env[key] === undefined ? 'Setting' : 'Overriding';
        debug(`${overrideOrSetDescriptor} environment variable ${key} to .env value instead of process.env`);
      }
      return overrideValues && overrideValues[key] ? overrideValues[key] : process.env[key];
    },
  };
}

function createClient(options?: IEnvironmentProviderOptions) {
  const provider = options?.provider || processEnvironmentProvider(options);
  return {
    resolveObjectVariables: async (object: object) => {
      const paths = identifyPaths(object);
      for (const [path, parsed] of Object.entries(paths)) {
        const variableName = parsed.hostname;
        let variableValue: EnvironmentValueType = provider.get(variableName);
        const getQueryKey = (key: string) => {
          return parsed.searchParams.get(key);
        };
        // Support for default variables
        const defaultValue = getQueryKey('default');
        if (variableValue === undefined && defaultValue !== null) {
          variableValue = defaultValue;
        }
        // Loose equality "true" for boolean values
        const trueIf = getQueryKey('trueIf');
        if (trueIf !== null) {
          variableValue = trueIf === variableValue;
        }
        // Cast if a type is set to 'boolean' or 'integer'
        const type = getQueryKey('type');
        if (type) {
          variableValue = castEnvironmentValue(variableName, type, variableValue);
        }
        objectPath.set(object, path, variableValue);
      }
    },
  };
}

export default createClient;
