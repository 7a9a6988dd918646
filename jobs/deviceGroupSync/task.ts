//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { validate as isUuid } from 'uuid';

import {
  BatchIdentityLookup,
  buildDesiredMembers,
  describePlatformFilters,
  DeviceResolver,
  DeviceSyncRunContext,
  DeviceSyncRunState,
  GroupSynchronizer,
  unknownDisplayName,
  type MatchedDevice,
  type SyncReport,
} from '../../business/devices/index.js';
import { CreateError } from '../../lib/transitional.js';

import type { IDirectoryPrincipal, IGraphGroup, IGraphProvider } from '../../lib/graphProvider/index.js';
import type { DeviceGroupSyncParameters } from './arguments.js';

export type DeviceGroupSyncOutcome = {
  parameters: DeviceGroupSyncParameters;
  context: DeviceSyncRunContext;
  finished: Date;
  targetGroup: IGraphGroup | null;
  matches: MatchedDevice[];
  ownerDisplayNames: Map<string, string>;
  desiredMembers: IDirectoryPrincipal[];
  syncReport: SyncReport | null;
  batchesIssued: number;
  failedBatches: number;
};

export async function resolveTargetGroup(graphProvider: IGraphProvider, nameOrId: string): Promise<IGraphGroup> {
  const group = isUuid(nameOrId)
    ? await graphProvider.getGroup(nameOrId)
    : await graphProvider.getGroupByName(nameOrId);
  if (!group) {
    throw CreateError.NotFound(`The target group "${nameOrId}" was not found`);
  }
  return group;
}

export async function runDeviceGroupSync(
  graphProvider: IGraphProvider,
  parameters: DeviceGroupSyncParameters
): Promise<DeviceGroupSyncOutcome> {
  const context = new DeviceSyncRunContext();
  try {
    await graphProvider.getToken();
  } catch (error) {
    throw CreateError.NotAuthenticated('Could not authenticate to the directory', error);
  }
  context.transition(DeviceSyncRunState.Authenticated);

  let targetGroup: IGraphGroup | null = null;
  if (parameters.targetGroup) {
    targetGroup = await resolveTargetGroup(graphProvider, parameters.targetGroup);
    console.log(`Target group: ${targetGroup.displayName} (${targetGroup.id})`);
  }

  const sourceDescription = parameters.sourceGroups.length
    ? parameters.sourceGroups.map((name) => `"${name}"`).join(', ')
    : 'every managed device';
  console.log(`Resolving ${sourceDescription} with ${describePlatformFilters(parameters.filters)}`);
  const resolver = new DeviceResolver(graphProvider, context);
  const matches = await resolver.resolve(parameters.sourceGroups, parameters.filters, {
    serverSideVersionFilter: parameters.serverSideVersionFilter,
    maximumResults: parameters.maximumResults,
  });
  context.transition(DeviceSyncRunState.Resolved);

  const lookup = new BatchIdentityLookup(graphProvider, context, parameters.batchSize);
  const owners = await lookup.resolveUsers(matches.flatMap((match) => (match.ownerUserId ? [match.ownerUserId] : [])));
  const ownerDisplayNames = new Map<string, string>();
  for (const match of matches) {
    if (match.ownerUserId) {
      ownerDisplayNames.set(match.ownerUserId, owners.get(match.ownerUserId)?.displayName || unknownDisplayName);
    }
  }
  console.log(`${matches.length} matching devices`);
  for (const match of matches) {
    const owner = match.ownerUserId ? ownerDisplayNames.get(match.ownerUserId) : 'no owner';
    console.log(`  ${match.name}\t${match.os} ${match.version}\t${owner}`);
  }

  let desiredMembers: IDirectoryPrincipal[] = [];
  let syncReport: SyncReport | null = null;
  if (targetGroup) {
    desiredMembers = await buildDesiredMembers(matches, parameters.addMode, lookup, context);
    console.log(
      `${parameters.dryRun ? 'Dry run: ' : ''}${desiredMembers.length} desired ${parameters.addMode.toLowerCase()} for ${targetGroup.displayName}`
    );
    const synchronizer = new GroupSynchronizer(graphProvider);
    syncReport = await synchronizer.sync(targetGroup.id, desiredMembers, {
      clearFirst: parameters.clearFirst,
      dryRun: parameters.dryRun,
      onRemovalsComplete: () => context.transition(DeviceSyncRunState.Cleared),
      onWarning: (message) => context.warn(message),
    });
    context.transition(DeviceSyncRunState.Synced);
  } else {
    console.log('No target group: the matches are reported only');
  }

  return {
    parameters,
    context,
    finished: new Date(),
    targetGroup,
    matches,
    ownerDisplayNames,
    desiredMembers,
    syncReport,
    batchesIssued: lookup.batchesIssued,
    failedBatches: lookup.failedBatches,
  };
}
