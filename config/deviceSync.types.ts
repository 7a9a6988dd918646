//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootDeviceSync = {
  deviceSync: ConfigDeviceSync;
};

export type ConfigDeviceSyncPlatform = {
  minimumVersion?: string;
  operator?: string;
};

export type ConfigDeviceSync = {
  sourceGroups?: string;
  targetGroup?: string;
  addMode?: string;
  clearFirst: boolean;
  dryRun: boolean;
  failOnMemberErrors: boolean;
  serverSideVersionFilter: boolean;
  batchSize?: number;
  maximumResults?: number;
  reportPath?: string;

  platforms: {
    ios: ConfigDeviceSyncPlatform;
    ipados: ConfigDeviceSyncPlatform;
    windows: ConfigDeviceSyncPlatform;
  };
};
