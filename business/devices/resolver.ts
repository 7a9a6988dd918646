//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import { GraphEntityType } from '../../lib/graphProvider/index.js';
import { CreateError } from '../../lib/transitional.js';
import { deviceMatchesFilters, filterablePlatforms, hasPlatformFilters } from './deviceFilter.js';
import { GroupExpander } from './groupExpander.js';

import type {
  IDirectoryPrincipal,
  IDirectoryReader,
  IGraphManagedDevice,
  ManagedDeviceQuery,
} from '../../lib/graphProvider/index.js';
import type { DeviceSyncRunContext } from './runContext.js';
import type { DevicePlatformFilters, MatchedDevice } from './types.js';

const debug = Debug('devicesync');

export type ResolveOptions = {
  // Pushes eq and ne version filters into the inventory query
  serverSideVersionFilter?: boolean;
  maximumResults?: number;
};

// Keyed by managed device id; a row without a device name is reported by its id.
class MatchCollector {
  private matches = new Map<string, MatchedDevice>();

  constructor(private maximumResults?: number) {
    if (maximumResults !== undefined && (!Number.isSafeInteger(maximumResults) || maximumResults < 1)) {
      throw CreateError.InvalidParameters(`The device limit must be a positive integer, not ${maximumResults}`);
    }
  }

  get full() {
    return this.maximumResults !== undefined && this.matches.size >= this.maximumResults;
  }

  add(device: IGraphManagedDevice, directoryObjectId: string | null, sourceGroup?: string) {
    const existing = this.matches.get(device.id);
    if (existing) {
      if (sourceGroup && !existing.sourceGroups.includes(sourceGroup)) {
        existing.sourceGroups.push(sourceGroup);
      }
      if (!existing.directoryObjectId && directoryObjectId) {
        existing.directoryObjectId = directoryObjectId;
      }
      return;
    }
    if (this.full) {
      return;
    }
    this.matches.set(device.id, {
      name: device.deviceName || device.id,
      os: device.operatingSystem,
      version: device.osVersion,
      ownerUserId: device.ownerUserId,
      managedDeviceId: device.id,
      azureADDeviceId: device.azureADDeviceId,
      directoryObjectId,
      sourceGroups: sourceGroup ? [sourceGroup] : [],
    });
  }

  values() {
    return Array.from(this.matches.values());
  }
}

export class DeviceResolver {
  private expander: GroupExpander;

  constructor(
    private directory: IDirectoryReader,
    private context: DeviceSyncRunContext
  ) {
    this.expander = new GroupExpander(directory, context);
  }

  // With no source groups, the whole inventory is considered.
  async resolve(
    sourceGroupNames: string[],
    filters: DevicePlatformFilters,
    options?: ResolveOptions
  ): Promise<MatchedDevice[]> {
    const collector = new MatchCollector(options?.maximumResults);
    if (sourceGroupNames.length === 0) {
      await this.resolveOrganizationWide(collector, filters, options);
    } else {
      for (const groupName of sourceGroupNames) {
        if (collector.full) {
          break;
        }
        await this.resolveGroup(collector, groupName, filters);
      }
    }
    if (collector.full) {
      console.log(`Stopped collecting after ${options?.maximumResults} matching devices`);
    }
    return collector.values();
  }

  private async resolveOrganizationWide(
    collector: MatchCollector,
    filters: DevicePlatformFilters,
    options?: ResolveOptions
  ) {
    if (!hasPlatformFilters(filters)) {
      console.log('No source group or platform filter: every managed device is considered');
      const inventory = await this.context.getInventory(() => this.directory.listManagedDevices());
      this.collect(collector, inventory, filters, null);
      return;
    }
    for (const platform of filterablePlatforms) {
      const filter = filters[platform];
      if (!filter) {
        continue;
      }
      const query: ManagedDeviceQuery = { operatingSystem: platform };
      if (options?.serverSideVersionFilter && (filter.operator === 'eq' || filter.operator === 'ne')) {
        query.osVersion = { operator: filter.operator, version: filter.minimumVersion };
      }
      const devices = await this.directory.listManagedDevices(query);
      debug(`${devices.length} ${platform} devices in the inventory query`);
      this.collect(collector, devices, filters, null);
      if (collector.full) {
        return;
      }
    }
  }

  private async resolveGroup(collector: MatchCollector, groupName: string, filters: DevicePlatformFilters) {
    const group = await this.directory.getGroupByName(groupName);
    if (!group) {
      this.context.warn(`Source group "${groupName}" was not found and is skipped`);
      return;
    }
    const leaves = await this.expander.expand(group.id);
    const deviceLeaves: IDirectoryPrincipal[] = [];
    const userIds = new Set<string>();
    for (const leaf of leaves) {
      if (leaf.kind === GraphEntityType.Device) {
        deviceLeaves.push(leaf);
      } else if (leaf.kind === GraphEntityType.User) {
        userIds.add(leaf.id);
      }
    }
    console.log(`Source group "${groupName}": ${deviceLeaves.length} devices and ${userIds.size} users`);
    if (deviceLeaves.length === 0 && userIds.size === 0) {
      this.context.warn(`Source group "${groupName}" has no user or device members`);
      return;
    }
    for (const leaf of deviceLeaves) {
      const managed = await this.context.getManagedDeviceByName(leaf.displayName, (name) =>
        this.directory.getManagedDeviceByName(name)
      );
      if (!managed) {
        this.context.warn(`Device "${leaf.displayName}" in "${groupName}" has no managed device record`);
        continue;
      }
      if (deviceMatchesFilters(managed, filters)) {
        collector.add(managed, leaf.id, groupName);
        if (collector.full) {
          return;
        }
      }
    }
    if (userIds.size) {
      const inventory = await this.context.getInventory(() => this.directory.listManagedDevices());
      const owned = inventory.filter((device) => device.ownerUserId !== null && userIds.has(device.ownerUserId));
      debug(`${owned.length} managed devices owned by members of ${groupName}`);
      this.collect(collector, owned, filters, groupName);
    }
  }

  private collect(
    collector: MatchCollector,
    devices: IGraphManagedDevice[],
    filters: DevicePlatformFilters,
    sourceGroup: string | null
  ) {
    for (const device of devices) {
      if (collector.full) {
        return;
      }
      if (deviceMatchesFilters(device, filters)) {
        collector.add(device, null, sourceGroup || undefined);
      }
    }
  }
}
