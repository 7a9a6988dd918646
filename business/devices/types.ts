//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { IDirectoryPrincipal, ManagedDeviceOperatingSystem } from '../../lib/graphProvider/index.js';

export type VersionComparisonOperator = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';

export type PlatformVersionFilter = {
  minimumVersion: string;
  operator: VersionComparisonOperator;
};

export type DevicePlatformFilters = Partial<Record<ManagedDeviceOperatingSystem, PlatformVersionFilter>>;

export enum DeviceAddMode {
  Users = 'Users',
  Devices = 'Devices',
  Both = 'Both',
}

export type MatchedDevice = {
  name: string;
  os: ManagedDeviceOperatingSystem;
  version: string;
  ownerUserId: string | null;
  managedDeviceId: string;
  azureADDeviceId: string | null;
  // Entra object id, known when the device was reached as a group member
  directoryObjectId: string | null;
  sourceGroups: string[];
};

export enum MemberSyncOutcome {
  Added = 'Added',
  AlreadyMember = 'AlreadyMember',
  Failed = 'Failed',
  Removed = 'Removed',
  RemovalFailed = 'RemovalFailed',
  WouldAdd = 'WouldAdd',
  WouldRemove = 'WouldRemove',
}

export type MemberSyncResult = {
  principal: IDirectoryPrincipal;
  outcome: MemberSyncOutcome;
  message?: string;
};

export type SyncPlan = {
  toRemove: IDirectoryPrincipal[];
  toAdd: IDirectoryPrincipal[];
  alreadyPresent: IDirectoryPrincipal[];
};

export type SyncReportCounts = {
  added: number;
  alreadyMember: number;
  failed: number;
  removed: number;
  removalFailed: number;
  wouldAdd: number;
  wouldRemove: number;
};

export type SyncReport = {
  targetGroupId: string;
  clearFirst: boolean;
  dryRun: boolean;
  counts: SyncReportCounts;
  results: MemberSyncResult[];
};

export enum DeviceSyncRunState {
  Init = 'Init',
  Authenticated = 'Authenticated',
  Resolved = 'Resolved',
  Cleared = 'Cleared',
  Synced = 'Synced',
  Reported = 'Reported',
}
