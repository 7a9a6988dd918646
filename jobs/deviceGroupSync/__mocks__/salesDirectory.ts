//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { createPlatformFilters, DeviceAddMode } from '../../../business/devices/index.js';
import { ManagedDeviceOperatingSystem } from '../../../lib/graphProvider/index.js';
import {
  TestGraphProvider,
  testManagedDevice,
  testUser,
} from '../../../lib/graphProvider/__mocks__/testGraphProvider.js';

import type { DeviceGroupSyncParameters } from '../arguments.js';

export const targetGroupId = '6f1c9a52-0d8e-4b7a-9c3e-2a5f8d1e4b60';

export function createSalesDirectory(targetMembers: string[] = []) {
  return new TestGraphProvider({
    users: [testUser('u-una', 'Una User'), testUser('u-old', 'Former Member')],
    groups: [
      { id: 'g-sales', displayName: 'Sales', members: ['u-una'] },
      { id: targetGroupId, displayName: 'Outdated iOS Owners', members: targetMembers },
    ],
    managedDevices: [testManagedDevice('iPhone12', ManagedDeviceOperatingSystem.iOS, '17.5.1', 'u-una')],
  });
}

export function createSalesParameters(overrides?: Partial<DeviceGroupSyncParameters>): DeviceGroupSyncParameters {
  return {
    sourceGroups: ['Sales'],
    filters: createPlatformFilters({ ios: { minimumVersion: '18.0', operator: 'lt' } }),
    targetGroup: 'Outdated iOS Owners',
    addMode: DeviceAddMode.Users,
    clearFirst: true,
    dryRun: false,
    batchSize: 15,
    serverSideVersionFilter: false,
    failOnMemberErrors: false,
    ...overrides,
  };
}
