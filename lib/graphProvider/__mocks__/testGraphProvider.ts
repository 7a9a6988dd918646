//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { CreateError } from '../../transitional.js';
import { GraphEntityType, GraphUserType, GroupMembershipChange, ManagedDeviceOperatingSystem } from '../enums.js';
import type {
  GroupMembersOptions,
  IDirectoryPrincipal,
  IGraphDevice,
  IGraphEntry,
  IGraphGroup,
  IGraphManagedDevice,
  IGraphProvider,
  ManagedDeviceQuery,
  UnsupportedDirectoryMember,
} from '../types.js';

export type TestDirectoryGroup = IGraphGroup & {
  members: string[];
  unsupportedMembers?: UnsupportedDirectoryMember[];
};

export type TestDirectory = {
  users?: IGraphEntry[];
  groups?: TestDirectoryGroup[];
  devices?: IGraphDevice[];
  managedDevices?: IGraphManagedDevice[];
};

export type TestDirectoryMutation = {
  operation: 'add' | 'remove';
  groupId: string;
  principalId: string;
};

export function testUser(id: string, displayName: string): IGraphEntry {
  const alias = displayName.toLowerCase().replace(/\s+/g, '.');
  return {
    id,
    displayName,
    userPrincipalName: `${alias}@contoso.example`,
    mail: `${alias}@contoso.example`,
    userType: GraphUserType.Member,
  };
}

export function testManagedDevice(
  deviceName: string,
  operatingSystem: ManagedDeviceOperatingSystem,
  osVersion: string,
  ownerUserId: string | null,
  azureADDeviceId?: string
): IGraphManagedDevice {
  return {
    id: `md-${deviceName}`,
    deviceName,
    operatingSystem,
    osVersion,
    ownerUserId,
    azureADDeviceId: azureADDeviceId || `aad-${deviceName}`,
    userPrincipalName: null,
  };
}

export class TestGraphProvider implements IGraphProvider {
  Users: IGraphEntry[];
  Groups: TestDirectoryGroup[];
  Devices: IGraphDevice[];
  ManagedDevices: IGraphManagedDevice[];

  getGroupMembersCalls: string[] = [];
  getUsersByIdsCalls: string[][] = [];
  getDirectoryDevicesByDeviceIdsCalls: string[][] = [];
  listManagedDevicesCalls: (ManagedDeviceQuery | undefined)[] = [];
  getManagedDeviceByNameCalls: string[] = [];
  mutations: TestDirectoryMutation[] = [];

  failTokenRequests = false;
  failUserLookupsContaining = new Set<string>();
  failAddsFor = new Set<string>();
  failRemovesFor = new Set<string>();

  constructor(directory?: TestDirectory) {
    this.Users = directory?.users || [];
    this.Groups = directory?.groups || [];
    this.Devices = directory?.devices || [];
    this.ManagedDevices = directory?.managedDevices || [];
  }

  async getToken(): Promise<string> {
    if (this.failTokenRequests) {
      throw CreateError.NotAuthenticated('Test directory refused the credential');
    }
    return 'test-token';
  }

  async getGroupByName(displayName: string): Promise<IGraphGroup | null> {
    const group = this.Groups.find((entry) => entry.displayName === displayName);
    return group ? { id: group.id, displayName: group.displayName } : null;
  }

  async getGroup(groupId: string): Promise<IGraphGroup | null> {
    const group = this.Groups.find((entry) => entry.id === groupId);
    return group ? { id: group.id, displayName: group.displayName } : null;
  }

  async getGroupMembers(groupId: string, options?: GroupMembersOptions): Promise<IDirectoryPrincipal[]> {
    this.getGroupMembersCalls.push(groupId);
    const group = this.Groups.find((entry) => entry.id === groupId);
    if (!group) {
      throw CreateError.NotFound(`Group ${groupId} not found`);
    }
    const members: IDirectoryPrincipal[] = [];
    for (const memberId of group.members) {
      const principal = this.getPrincipal(memberId);
      if (principal) {
        members.push(principal);
      }
    }
    for (const unsupported of group.unsupportedMembers || []) {
      options?.onUnsupportedMember?.(unsupported);
    }
    return members;
  }

  async listManagedDevices(query?: ManagedDeviceQuery): Promise<IGraphManagedDevice[]> {
    this.listManagedDevicesCalls.push(query);
    return this.ManagedDevices.filter((device) => {
      if (query?.operatingSystem && device.operatingSystem !== query.operatingSystem) {
        return false;
      }
      if (query?.osVersion) {
        const same = device.osVersion === query.osVersion.version;
        return query.osVersion.operator === 'eq' ? same : !same;
      }
      return true;
    });
  }

  async getManagedDeviceByName(deviceName: string): Promise<IGraphManagedDevice | null> {
    this.getManagedDeviceByNameCalls.push(deviceName);
    return this.ManagedDevices.find((device) => device.deviceName === deviceName) || null;
  }

  async getUsersByIds(userIds: string[]): Promise<IGraphEntry[]> {
    this.getUsersByIdsCalls.push(userIds);
    if (userIds.some((id) => this.failUserLookupsContaining.has(id))) {
      throw CreateError.ServerError('Test directory failed the user lookup');
    }
    return this.Users.filter((user) => userIds.includes(user.id));
  }

  async getDirectoryDevicesByDeviceIds(deviceIds: string[]): Promise<IGraphDevice[]> {
    this.getDirectoryDevicesByDeviceIdsCalls.push(deviceIds);
    return this.Devices.filter((device) => deviceIds.includes(device.deviceId));
  }

  async addGroupMember(groupId: string, principalId: string): Promise<GroupMembershipChange> {
    const group = this.getGroupOrThrow(groupId);
    if (this.failAddsFor.has(principalId)) {
      throw CreateError.InvalidParameters(`Test directory refused to add ${principalId}`);
    }
    if (group.members.includes(principalId)) {
      return GroupMembershipChange.AlreadyMember;
    }
    this.mutations.push({ operation: 'add', groupId, principalId });
    group.members.push(principalId);
    return GroupMembershipChange.Added;
  }

  async removeGroupMember(groupId: string, principalId: string): Promise<void> {
    const group = this.getGroupOrThrow(groupId);
    if (this.failRemovesFor.has(principalId)) {
      throw CreateError.InvalidParameters(`Test directory refused to remove ${principalId}`);
    }
    const index = group.members.indexOf(principalId);
    if (index < 0) {
      throw CreateError.NotFound(`${principalId} is not a member of ${groupId}`);
    }
    this.mutations.push({ operation: 'remove', groupId, principalId });
    group.members.splice(index, 1);
  }

  private getGroupOrThrow(groupId: string) {
    const group = this.Groups.find((entry) => entry.id === groupId);
    if (!group) {
      throw CreateError.NotFound(`Group ${groupId} not found`);
    }
    return group;
  }

  private getPrincipal(id: string): IDirectoryPrincipal | undefined {
    const user = this.Users.find((entry) => entry.id === id);
    if (user) {
      return { id, displayName: user.displayName, kind: GraphEntityType.User };
    }
    const device = this.Devices.find((entry) => entry.id === id);
    if (device) {
      return { id, displayName: device.displayName, kind: GraphEntityType.Device };
    }
    const group = this.Groups.find((entry) => entry.id === id);
    if (group) {
      return { id, displayName: group.displayName, kind: GraphEntityType.Group };
    }
    return undefined;
  }
}
