//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export enum GraphUserType {
  Unknown = '', // most employees
  Guest = 'Guest',
  Member = 'Member',
}

export enum GraphEntityType {
  User = 'user',
  Device = 'device',
  Group = 'group',
}

export enum ManagedDeviceOperatingSystem {
  iOS = 'iOS',
  iPadOS = 'iPadOS',
  Windows = 'Windows',
  Other = 'Other',
}

export enum GroupMembershipChange {
  Added = 'added',
  AlreadyMember = 'alreadyMember',
}
