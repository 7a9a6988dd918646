//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { GraphEntityType } from '../../lib/graphProvider/index.js';
import { assertUnreachable } from '../../lib/transitional.js';
import { DeviceAddMode } from './types.js';

import type { IDirectoryPrincipal } from '../../lib/graphProvider/index.js';
import type { BatchIdentityLookup } from './batchIdentityLookup.js';
import type { DeviceSyncRunContext } from './runContext.js';
import type { MatchedDevice } from './types.js';

export const unknownDisplayName = 'Unknown';

export function parseDeviceAddMode(value: string): DeviceAddMode | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(DeviceAddMode).find((mode) => mode.toLowerCase() === normalized);
}

export async function buildDesiredUsers(
  matches: MatchedDevice[],
  lookup: BatchIdentityLookup
): Promise<IDirectoryPrincipal[]> {
  const ownerIds: string[] = [];
  for (const match of matches) {
    if (match.ownerUserId && !ownerIds.includes(match.ownerUserId)) {
      ownerIds.push(match.ownerUserId);
    }
  }
  const users = await lookup.resolveUsers(ownerIds);
  return ownerIds.map((id) => ({
    id,
    displayName: users.get(id)?.displayName || unknownDisplayName,
    kind: GraphEntityType.User,
  }));
}

export async function buildDesiredDevices(
  matches: MatchedDevice[],
  lookup: BatchIdentityLookup,
  context: DeviceSyncRunContext
): Promise<IDirectoryPrincipal[]> {
  const needsLookup = matches.flatMap((match) =>
    !match.directoryObjectId && match.azureADDeviceId ? [match.azureADDeviceId] : []
  );
  const directoryDevices = await lookup.resolveDevices(needsLookup);
  const devices = new Map<string, IDirectoryPrincipal>();
  for (const match of matches) {
    const id =
      match.directoryObjectId || (match.azureADDeviceId && directoryDevices.get(match.azureADDeviceId)?.id);
    if (!id) {
      context.warn(`Device "${match.name}" has no directory object and cannot be added`);
      continue;
    }
    if (!devices.has(id)) {
      devices.set(id, { id, displayName: match.name, kind: GraphEntityType.Device });
    }
  }
  return Array.from(devices.values());
}

// Users come before devices when both are requested.
export async function buildDesiredMembers(
  matches: MatchedDevice[],
  addMode: DeviceAddMode,
  lookup: BatchIdentityLookup,
  context: DeviceSyncRunContext
): Promise<IDirectoryPrincipal[]> {
  switch (addMode) {
    case DeviceAddMode.Users:
      return buildDesiredUsers(matches, lookup);
    case DeviceAddMode.Devices:
      return buildDesiredDevices(matches, lookup, context);
    case DeviceAddMode.Both: {
      const users = await buildDesiredUsers(matches, lookup);
      const devices = await buildDesiredDevices(matches, lookup, context);
      return [...users, ...devices];
    }
    default:
      return assertUnreachable(addMode);
  }
}
