//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { describe, expect, it } from 'vitest';

import { GraphEntityType, GroupMembershipChange } from '../../lib/graphProvider/index.js';
import { TestGraphProvider, testUser } from '../../lib/graphProvider/__mocks__/testGraphProvider.js';
import { CreateError, ErrorHelper } from '../../lib/transitional.js';
import { GroupSynchronizer } from './groupSynchronizer.js';
import { MemberSyncOutcome } from './types.js';

import type { IDirectoryPrincipal } from '../../lib/graphProvider/index.js';

function user(id: string, displayName: string): IDirectoryPrincipal {
  return { id, displayName, kind: GraphEntityType.User };
}

const u1 = user('u1', 'Una User');
const u2 = user('u2', 'Dev User');
const u3 = user('u3', 'Third User');

function createDirectory() {
  return new TestGraphProvider({
    users: [testUser('u1', 'Una User'), testUser('u2', 'Dev User'), testUser('u3', 'Third User')],
    devices: [{ id: 'dir-1', deviceId: 'aad-1', displayName: 'Laptop1' }],
    groups: [{ id: 'target', displayName: 'Target', members: ['u1', 'dir-1'] }],
  });
}

function outcomes(results: { principal: IDirectoryPrincipal; outcome: MemberSyncOutcome }[]) {
  return results.map((result) => [result.principal.id, result.outcome]);
}

describe('GroupSynchronizer', () => {
  it('makes no mutation on a clearing dry run and reports the intended changes', async () => {
    const directory = createDirectory();
    const report = await new GroupSynchronizer(directory).sync('target', [u2, u3], {
      clearFirst: true,
      dryRun: true,
    });
    expect(directory.mutations).toEqual([]);
    expect(outcomes(report.results)).toEqual([
      ['u1', MemberSyncOutcome.WouldRemove],
      ['dir-1', MemberSyncOutcome.WouldRemove],
      ['u2', MemberSyncOutcome.WouldAdd],
      ['u3', MemberSyncOutcome.WouldAdd],
    ]);
    expect(report.counts).toEqual({
      added: 0,
      alreadyMember: 0,
      failed: 0,
      removed: 0,
      removalFailed: 0,
      wouldAdd: 2,
      wouldRemove: 2,
    });
  });

  it('finishes every removal before the first addition when clearing', async () => {
    const directory = createDirectory();
    const report = await new GroupSynchronizer(directory).sync('target', [u1, u2], {
      clearFirst: true,
      dryRun: false,
    });
    expect(directory.mutations).toEqual([
      { operation: 'remove', groupId: 'target', principalId: 'u1' },
      { operation: 'remove', groupId: 'target', principalId: 'dir-1' },
      { operation: 'add', groupId: 'target', principalId: 'u1' },
      { operation: 'add', groupId: 'target', principalId: 'u2' },
    ]);
    expect(report.counts.removed).toBe(2);
    expect(report.counts.added).toBe(2);
    expect(directory.Groups[0].members).toEqual(['u1', 'u2']);
  });

  it('reports present members without a directory call when not clearing', async () => {
    const directory = createDirectory();
    const report = await new GroupSynchronizer(directory).sync('target', [u1, u2, u2], {
      clearFirst: false,
      dryRun: false,
    });
    expect(outcomes(report.results)).toEqual([
      ['u1', MemberSyncOutcome.AlreadyMember],
      ['u2', MemberSyncOutcome.Added],
    ]);
    expect(directory.mutations).toEqual([{ operation: 'add', groupId: 'target', principalId: 'u2' }]);
  });

  it('treats an already-exists reply as AlreadyMember, not Failed', async () => {
    class AlreadyExistsDirectory extends TestGraphProvider {
      async addGroupMember(): Promise<GroupMembershipChange> {
        throw CreateError.InvalidParameters(
          "One or more added object references already exist for the following modified properties: 'members'."
        );
      }
    }
    const directory = new AlreadyExistsDirectory({
      groups: [{ id: 'target', displayName: 'Target', members: [] }],
    });
    const report = await new GroupSynchronizer(directory).sync('target', [u1], { clearFirst: true, dryRun: false });
    expect(outcomes(report.results)).toEqual([['u1', MemberSyncOutcome.AlreadyMember]]);
    expect(report.counts.failed).toBe(0);
  });

  it('treats an already-member result as AlreadyMember', async () => {
    class StaleMembershipDirectory extends TestGraphProvider {
      async getGroupMembers(): Promise<IDirectoryPrincipal[]> {
        return [];
      }
    }
    const directory = new StaleMembershipDirectory({
      users: [testUser('u1', 'Una User')],
      groups: [{ id: 'target', displayName: 'Target', members: ['u1'] }],
    });
    const report = await new GroupSynchronizer(directory).sync('target', [u1], { clearFirst: false, dryRun: false });
    expect(outcomes(report.results)).toEqual([['u1', MemberSyncOutcome.AlreadyMember]]);
  });

  it('records individual failures and continues', async () => {
    const directory = createDirectory();
    directory.failRemovesFor.add('dir-1');
    directory.failAddsFor.add('u2');
    const report = await new GroupSynchronizer(directory).sync('target', [u2, u3], {
      clearFirst: true,
      dryRun: false,
    });
    expect(report.results).toEqual([
      { principal: { id: 'u1', displayName: 'Una User', kind: GraphEntityType.User }, outcome: MemberSyncOutcome.Removed },
      {
        principal: { id: 'dir-1', displayName: 'Laptop1', kind: GraphEntityType.Device },
        outcome: MemberSyncOutcome.RemovalFailed,
        message: 'Test directory refused to remove dir-1',
      },
      { principal: u2, outcome: MemberSyncOutcome.Failed, message: 'Test directory refused to add u2' },
      { principal: u3, outcome: MemberSyncOutcome.Added },
    ]);
    expect(report.counts).toEqual({
      added: 1,
      alreadyMember: 0,
      failed: 1,
      removed: 1,
      removalFailed: 1,
      wouldAdd: 0,
      wouldRemove: 0,
    });
  });

  it('warns about target members of unsupported types that a clear leaves in place', async () => {
    const directory = new TestGraphProvider({
      users: [testUser('u1', 'Una User')],
      groups: [
        {
          id: 'target',
          displayName: 'Target',
          members: ['u1'],
          unsupportedMembers: [
            { id: 'sp-1', displayName: 'Build Agent', odataType: '#microsoft.graph.servicePrincipal' },
          ],
        },
      ],
    });
    const warnings: string[] = [];
    const report = await new GroupSynchronizer(directory).sync('target', [u2], {
      clearFirst: true,
      dryRun: false,
      onWarning: (message) => warnings.push(message),
    });
    expect(warnings).toEqual([
      'Target group target has 1 members of unsupported types that are left in place: Build Agent (#microsoft.graph.servicePrincipal)',
    ]);
    expect(directory.mutations).toEqual([
      { operation: 'remove', groupId: 'target', principalId: 'u1' },
      { operation: 'add', groupId: 'target', principalId: 'u2' },
    ]);
    expect(outcomes(report.results)).toEqual([
      ['u1', MemberSyncOutcome.Removed],
      ['u2', MemberSyncOutcome.Added],
    ]);
  });

  it('fails the sync when the target membership cannot be read', async () => {
    const directory = createDirectory();
    let error: unknown;
    try {
      await new GroupSynchronizer(directory).sync('missing', [u1], { clearFirst: true, dryRun: false });
    } catch (syncError) {
      error = syncError;
    }
    expect(ErrorHelper.IsNotFound(error)).toBe(true);
    expect(ErrorHelper.GetMessage(error)).toBe('The membership of target group missing could not be read');
  });
});
