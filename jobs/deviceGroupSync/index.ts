//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

// Job: synchronize a directory group with device owners or devices matching
// OS version filters

import job from '../../job.js';
import { parseDeviceGroupSyncArguments } from './arguments.js';
import { reportDeviceGroupSync } from './report.js';
import { runDeviceGroupSync } from './task.js';

await job.run(
  async (providers, { args }) => {
    const parameters = parseDeviceGroupSyncArguments(args, providers.config.deviceSync);
    if (!parameters) {
      return {};
    }
    const outcome = await runDeviceGroupSync(providers.graphProvider, parameters);
    return reportDeviceGroupSync(outcome);
  },
  {
    name: 'device-group-sync',
    insightsPrefix: 'JobDeviceGroupSync',
    defaultDebugOutput: 'devicesync',
  }
);
