//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import { DeviceSyncRunState } from './types.js';

import type {
  IDirectoryPrincipal,
  IGraphDevice,
  IGraphEntry,
  IGraphManagedDevice,
} from '../../lib/graphProvider/index.js';

const debug = Debug('devicesync');

// Caches for a single synchronization run. Entries are written once per key;
// a new run builds a new context.
export class DeviceSyncRunContext {
  readonly started = new Date();

  private _state = DeviceSyncRunState.Init;
  private _warnings: string[] = [];
  private _groupMembers = new Map<string, IDirectoryPrincipal[]>();
  private _managedDevicesByName = new Map<string, IGraphManagedDevice | null>();
  private _inventory: IGraphManagedDevice[] | undefined;
  private _users = new Map<string, IGraphEntry>();
  private _directoryDevices = new Map<string, IGraphDevice>();
  // Ids sent in a lookup, whether it resolved, missed or failed
  private _userLookups = new Set<string>();
  private _directoryDeviceLookups = new Set<string>();

  get state() {
    return this._state;
  }

  get warnings(): readonly string[] {
    return this._warnings;
  }

  transition(state: DeviceSyncRunState) {
    debug(`run state ${this._state} -> ${state}`);
    this._state = state;
  }

  warn(message: string) {
    console.warn(message);
    this._warnings.push(message);
  }

  async getGroupMembers(
    groupId: string,
    fetch: (groupId: string) => Promise<IDirectoryPrincipal[]>
  ): Promise<IDirectoryPrincipal[]> {
    const cached = this._groupMembers.get(groupId);
    if (cached) {
      debug(`group ${groupId} members from the run cache`);
      return cached;
    }
    const members = await fetch(groupId);
    this._groupMembers.set(groupId, members);
    return members;
  }

  async getManagedDeviceByName(
    deviceName: string,
    fetch: (deviceName: string) => Promise<IGraphManagedDevice | null>
  ): Promise<IGraphManagedDevice | null> {
    const cached = this._managedDevicesByName.get(deviceName);
    if (cached !== undefined) {
      return cached;
    }
    const device = await fetch(deviceName);
    this._managedDevicesByName.set(deviceName, device);
    return device;
  }

  async getInventory(fetch: () => Promise<IGraphManagedDevice[]>): Promise<IGraphManagedDevice[]> {
    if (!this._inventory) {
      this._inventory = await fetch();
      debug(`inventory of ${this._inventory.length} managed devices cached for the run`);
    }
    return this._inventory;
  }

  getUser(id: string): IGraphEntry | undefined {
    return this._users.get(id);
  }

  wasUserLookedUp(id: string) {
    return this._users.has(id) || this._userLookups.has(id);
  }

  markUsersLookedUp(ids: string[]) {
    ids.forEach((id) => this._userLookups.add(id));
  }

  rememberUser(user: IGraphEntry) {
    if (!this._users.has(user.id)) {
      this._users.set(user.id, user);
    }
  }

  getDirectoryDevice(deviceId: string): IGraphDevice | undefined {
    return this._directoryDevices.get(deviceId);
  }

  wasDirectoryDeviceLookedUp(deviceId: string) {
    return this._directoryDevices.has(deviceId) || this._directoryDeviceLookups.has(deviceId);
  }

  markDirectoryDevicesLookedUp(deviceIds: string[]) {
    deviceIds.forEach((id) => this._directoryDeviceLookups.add(id));
  }

  rememberDirectoryDevice(device: IGraphDevice) {
    if (!this._directoryDevices.has(device.deviceId)) {
      this._directoryDevices.set(device.deviceId, device);
    }
  }
}
