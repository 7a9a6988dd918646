//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import { ManagedDeviceOperatingSystem } from '../../lib/graphProvider/index.js';
import { parseVersion, parseVersionComparisonOperator, versionMatches } from './versionComparator.js';

import type { IGraphManagedDevice } from '../../lib/graphProvider/index.js';
import type { DevicePlatformFilters, PlatformVersionFilter } from './types.js';

const debug = Debug('devicesync');

export const filterablePlatforms = [
  ManagedDeviceOperatingSystem.iOS,
  ManagedDeviceOperatingSystem.iPadOS,
  ManagedDeviceOperatingSystem.Windows,
] as const;

export type PlatformFilterInput = {
  minimumVersion?: string;
  operator?: string;
};

export type PlatformFilterInputs = {
  ios?: PlatformFilterInput;
  ipados?: PlatformFilterInput;
  windows?: PlatformFilterInput;
};

function createPlatformFilter(name: string, input?: PlatformFilterInput): PlatformVersionFilter | undefined {
  const operator = parseVersionComparisonOperator(input?.operator || 'lt');
  const minimumVersion = input?.minimumVersion?.trim();
  if (!minimumVersion) {
    return undefined;
  }
  if (!parseVersion(minimumVersion)) {
    console.warn(`The ${name} version "${minimumVersion}" cannot be compared; no ${name} device will match it`);
  }
  return {
    minimumVersion,
    operator,
  };
}

// A platform without a version is not filtered. An unknown operator throws,
// with or without a version.
export function createPlatformFilters(inputs: PlatformFilterInputs): DevicePlatformFilters {
  const filters: DevicePlatformFilters = {};
  const ios = createPlatformFilter('iOS', inputs.ios);
  if (ios) {
    filters[ManagedDeviceOperatingSystem.iOS] = ios;
  }
  const ipados = createPlatformFilter('iPadOS', inputs.ipados);
  if (ipados) {
    filters[ManagedDeviceOperatingSystem.iPadOS] = ipados;
  }
  const windows = createPlatformFilter('Windows', inputs.windows);
  if (windows) {
    filters[ManagedDeviceOperatingSystem.Windows] = windows;
  }
  return filters;
}

export function hasPlatformFilters(filters: DevicePlatformFilters) {
  return filterablePlatforms.some((platform) => filters[platform] !== undefined);
}

export function deviceMatchesFilters(device: IGraphManagedDevice, filters: DevicePlatformFilters): boolean {
  if (!hasPlatformFilters(filters)) {
    return true;
  }
  const filter = filters[device.operatingSystem];
  if (!filter) {
    return false;
  }
  if (!parseVersion(device.osVersion)) {
    debug(`device ${device.deviceName} reports version "${device.osVersion}" which cannot be compared`);
    return false;
  }
  return versionMatches(device.osVersion, filter.minimumVersion, filter.operator);
}

export function describePlatformFilters(filters: DevicePlatformFilters): string {
  const parts = filterablePlatforms
    .map((platform) => {
      const filter = filters[platform];
      return filter ? `${platform} ${filter.operator} ${filter.minimumVersion}` : null;
    })
    .filter((part) => part !== null);
  return parts.length ? parts.join(', ') : 'all devices';
}
