//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type {
  GraphEntityType,
  GraphUserType,
  GroupMembershipChange,
  ManagedDeviceOperatingSystem,
} from './enums.js';

export interface IGraphEntry {
  id: string;
  displayName: string;
  userPrincipalName: string;
  mail: string | null;
  userType?: GraphUserType;
}

export interface IGraphGroup {
  id: string;
  displayName: string;
  mailNickname?: string;
  description?: string;
}

// A directory object as it appears in a group's membership. The kind is
// decided once when the Graph response is parsed.
export interface IDirectoryPrincipal {
  id: string;
  displayName: string;
  kind: GraphEntityType;
}

// Directory (Entra) device object; deviceId matches the Intune azureADDeviceId.
export interface IGraphDevice {
  id: string;
  deviceId: string;
  displayName: string;
}

// Intune managed device inventory row.
export interface IGraphManagedDevice {
  id: string;
  deviceName: string;
  operatingSystem: ManagedDeviceOperatingSystem;
  osVersion: string;
  ownerUserId: string | null;
  azureADDeviceId: string | null;
  userPrincipalName: string | null;
}

export type ManagedDeviceVersionQuery = {
  operator: 'eq' | 'ne';
  version: string;
};

export type ManagedDeviceQuery = {
  operatingSystem?: ManagedDeviceOperatingSystem;
  osVersion?: ManagedDeviceVersionQuery;
};

// A group member whose directory type is not a user, device or group, such
// as a service principal or an organizational contact.
export type UnsupportedDirectoryMember = {
  id: string;
  displayName: string;
  odataType: string;
};

export type GroupMembersOptions = {
  onUnsupportedMember?: (member: UnsupportedDirectoryMember) => void;
};

export interface IDirectoryReader {
  getGroupByName(displayName: string): Promise<IGraphGroup | null>;
  getGroup(groupId: string): Promise<IGraphGroup | null>;
  getGroupMembers(groupId: string, options?: GroupMembersOptions): Promise<IDirectoryPrincipal[]>;
  listManagedDevices(query?: ManagedDeviceQuery): Promise<IGraphManagedDevice[]>;
  getManagedDeviceByName(deviceName: string): Promise<IGraphManagedDevice | null>;
  getUsersByIds(userIds: string[]): Promise<IGraphEntry[]>;
  getDirectoryDevicesByDeviceIds(deviceIds: string[]): Promise<IGraphDevice[]>;
}

export interface IDirectoryWriter {
  addGroupMember(groupId: string, principalId: string): Promise<GroupMembershipChange>;
  removeGroupMember(groupId: string, principalId: string): Promise<void>;
}

export interface IGraphProvider extends IDirectoryReader, IDirectoryWriter {
  getToken(): Promise<string>;
}
