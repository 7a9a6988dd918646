//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { SiteConfiguration } from '../config/index.types.js';
export type { SiteConfiguration };

export type { ConfigDeviceSync, ConfigDeviceSyncPlatform } from '../config/deviceSync.types.js';
