//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import { GraphEntityType } from '../../lib/graphProvider/index.js';

import type { IDirectoryPrincipal, IDirectoryReader } from '../../lib/graphProvider/index.js';
import type { DeviceSyncRunContext } from './runContext.js';

const debug = Debug('devicesync');

export class GroupExpander {
  constructor(
    private directory: IDirectoryReader,
    private context: DeviceSyncRunContext
  ) {}

  // Flattens nested membership into user and device leaves, first seen first.
  // The visited set covers a single traversal; pass the same set to share it.
  async expand(groupId: string, visited: Set<string> = new Set<string>()): Promise<IDirectoryPrincipal[]> {
    const leaves = new Map<string, IDirectoryPrincipal>();
    const queue: string[] = [groupId];
    let current: string | undefined;
    while ((current = queue.shift()) !== undefined) {
      if (visited.has(current)) {
        debug(`group ${current} was already expanded in this traversal, skipping`);
        continue;
      }
      visited.add(current);
      const members = await this.context.getGroupMembers(current, (id) => this.directory.getGroupMembers(id));
      for (const member of members) {
        if (member.kind === GraphEntityType.Group) {
          queue.push(member.id);
        } else if (!leaves.has(member.id)) {
          leaves.set(member.id, member);
        }
      }
    }
    debug(`group ${groupId} expanded to ${leaves.size} leaves across ${visited.size} groups`);
    return Array.from(leaves.values());
  }
}
