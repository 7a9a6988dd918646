//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import { GroupMembershipChange } from '../../lib/graphProvider/index.js';
import { CreateError, ErrorHelper } from '../../lib/transitional.js';
import { MemberSyncOutcome } from './types.js';

import type {
  IDirectoryPrincipal,
  IDirectoryReader,
  IDirectoryWriter,
  UnsupportedDirectoryMember,
} from '../../lib/graphProvider/index.js';
import type { MemberSyncResult, SyncPlan, SyncReport, SyncReportCounts } from './types.js';

const debug = Debug('devicesync');

export type SyncOptions = {
  clearFirst: boolean;
  dryRun: boolean;
  onRemovalsComplete?: () => void;
  onWarning?: (message: string) => void;
};

export function countOutcomes(results: MemberSyncResult[]): SyncReportCounts {
  const counts: SyncReportCounts = {
    added: 0,
    alreadyMember: 0,
    failed: 0,
    removed: 0,
    removalFailed: 0,
    wouldAdd: 0,
    wouldRemove: 0,
  };
  for (const { outcome } of results) {
    switch (outcome) {
      case MemberSyncOutcome.Added:
        ++counts.added;
        break;
      case MemberSyncOutcome.AlreadyMember:
        ++counts.alreadyMember;
        break;
      case MemberSyncOutcome.Failed:
        ++counts.failed;
        break;
      case MemberSyncOutcome.Removed:
        ++counts.removed;
        break;
      case MemberSyncOutcome.RemovalFailed:
        ++counts.removalFailed;
        break;
      case MemberSyncOutcome.WouldAdd:
        ++counts.wouldAdd;
        break;
      case MemberSyncOutcome.WouldRemove:
        ++counts.wouldRemove;
        break;
    }
  }
  return counts;
}

function uniqueById(principals: IDirectoryPrincipal[]) {
  const byId = new Map<string, IDirectoryPrincipal>();
  for (const principal of principals) {
    if (!byId.has(principal.id)) {
      byId.set(principal.id, principal);
    }
  }
  return Array.from(byId.values());
}

export class GroupSynchronizer {
  constructor(private directory: IDirectoryReader & IDirectoryWriter) {}

  async plan(targetGroupId: string, desiredMembers: IDirectoryPrincipal[], options: SyncOptions): Promise<SyncPlan> {
    let current: IDirectoryPrincipal[];
    const unsupported: UnsupportedDirectoryMember[] = [];
    try {
      current = await this.directory.getGroupMembers(targetGroupId, {
        onUnsupportedMember: (member) => unsupported.push(member),
      });
    } catch (error) {
      throw CreateError.Wrap(`The membership of target group ${targetGroupId} could not be read`, error);
    }
    if (unsupported.length) {
      const names = unsupported.map((member) => `${member.displayName} (${member.odataType})`).join(', ');
      options.onWarning?.(
        `Target group ${targetGroupId} has ${unsupported.length} members of unsupported types that are left in place: ${names}`
      );
    }
    const desired = uniqueById(desiredMembers);
    if (options.clearFirst) {
      return { toRemove: current, toAdd: desired, alreadyPresent: [] };
    }
    const currentIds = new Set(current.map((member) => member.id));
    return {
      toRemove: [],
      toAdd: desired.filter((member) => !currentIds.has(member.id)),
      alreadyPresent: desired.filter((member) => currentIds.has(member.id)),
    };
  }

  // Individual member failures are reported, not thrown. Every removal
  // completes before the first addition.
  async sync(targetGroupId: string, desiredMembers: IDirectoryPrincipal[], options: SyncOptions): Promise<SyncReport> {
    const plan = await this.plan(targetGroupId, desiredMembers, options);
    debug(
      `target ${targetGroupId}: remove ${plan.toRemove.length}, add ${plan.toAdd.length}, present ${plan.alreadyPresent.length}`
    );
    const results: MemberSyncResult[] = [];
    for (const principal of plan.toRemove) {
      results.push(await this.removeMember(targetGroupId, principal, options.dryRun));
    }
    if (options.clearFirst) {
      options.onRemovalsComplete?.();
    }
    for (const principal of plan.alreadyPresent) {
      results.push({ principal, outcome: MemberSyncOutcome.AlreadyMember });
    }
    for (const principal of plan.toAdd) {
      results.push(await this.addMember(targetGroupId, principal, options.dryRun));
    }
    return {
      targetGroupId,
      clearFirst: options.clearFirst,
      dryRun: options.dryRun,
      counts: countOutcomes(results),
      results,
    };
  }

  private async removeMember(
    targetGroupId: string,
    principal: IDirectoryPrincipal,
    dryRun: boolean
  ): Promise<MemberSyncResult> {
    if (dryRun) {
      return { principal, outcome: MemberSyncOutcome.WouldRemove };
    }
    try {
      await this.directory.removeGroupMember(targetGroupId, principal.id);
      console.log(`Removed ${principal.kind} ${principal.displayName} (${principal.id})`);
      return { principal, outcome: MemberSyncOutcome.Removed };
    } catch (error) {
      const message = ErrorHelper.GetMessage(error);
      console.warn(`Could not remove ${principal.kind} ${principal.displayName} (${principal.id}): ${message}`);
      return { principal, outcome: MemberSyncOutcome.RemovalFailed, message };
    }
  }

  private async addMember(
    targetGroupId: string,
    principal: IDirectoryPrincipal,
    dryRun: boolean
  ): Promise<MemberSyncResult> {
    if (dryRun) {
      return { principal, outcome: MemberSyncOutcome.WouldAdd };
    }
    try {
      const change = await this.directory.addGroupMember(targetGroupId, principal.id);
      if (change === GroupMembershipChange.AlreadyMember) {
        return { principal, outcome: MemberSyncOutcome.AlreadyMember };
      }
      console.log(`Added ${principal.kind} ${principal.displayName} (${principal.id})`);
      return { principal, outcome: MemberSyncOutcome.Added };
    } catch (error) {
      if (ErrorHelper.IsAlreadyMember(error)) {
        return { principal, outcome: MemberSyncOutcome.AlreadyMember };
      }
      const message = ErrorHelper.GetMessage(error);
      console.warn(`Could not add ${principal.kind} ${principal.displayName} (${principal.id}): ${message}`);
      return { principal, outcome: MemberSyncOutcome.Failed, message };
    }
  }
}
