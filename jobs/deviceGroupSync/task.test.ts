//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { describe, expect, it } from 'vitest';

import { DeviceSyncRunState, MemberSyncOutcome } from '../../business/devices/index.js';
import { GraphEntityType } from '../../lib/graphProvider/index.js';
import { ErrorHelper } from '../../lib/transitional.js';
import { createSalesDirectory, createSalesParameters, targetGroupId } from './__mocks__/salesDirectory.js';
import { runDeviceGroupSync } from './task.js';

async function captureRejection(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('runDeviceGroupSync', () => {
  it('adds the owner of an outdated iPhone to an empty target group', async () => {
    const directory = createSalesDirectory();
    const outcome = await runDeviceGroupSync(directory, createSalesParameters());
    expect(outcome.desiredMembers).toEqual([{ id: 'u-una', displayName: 'Una User', kind: GraphEntityType.User }]);
    expect(outcome.syncReport?.counts.added).toBe(1);
    expect(outcome.syncReport?.counts.alreadyMember).toBe(0);
    expect(outcome.syncReport?.counts.failed).toBe(0);
    expect(outcome.syncReport?.counts.removed).toBe(0);
    expect(directory.mutations).toEqual([{ operation: 'add', groupId: targetGroupId, principalId: 'u-una' }]);
    expect(outcome.context.state).toBe(DeviceSyncRunState.Synced);
    expect(outcome.ownerDisplayNames.get('u-una')).toBe('Una User');
    expect(directory.getUsersByIdsCalls).toEqual([['u-una']]);
  });

  it('counts a failed owner lookup once', async () => {
    const directory = createSalesDirectory();
    directory.failUserLookupsContaining.add('u-una');
    const outcome = await runDeviceGroupSync(directory, createSalesParameters());
    expect(directory.getUsersByIdsCalls).toEqual([['u-una']]);
    expect(outcome.batchesIssued).toBe(1);
    expect(outcome.failedBatches).toBe(1);
    expect(outcome.context.warnings).toEqual([
      'The user lookup of a batch of 1 ids failed and was skipped: Test directory failed the user lookup',
    ]);
    expect(outcome.desiredMembers).toEqual([{ id: 'u-una', displayName: 'Unknown', kind: GraphEntityType.User }]);
  });

  it('resolves the target group by id', async () => {
    const directory = createSalesDirectory();
    const outcome = await runDeviceGroupSync(directory, createSalesParameters({ targetGroup: targetGroupId }));
    expect(outcome.targetGroup).toEqual({ id: targetGroupId, displayName: 'Outdated iOS Owners' });
  });

  it('changes nothing on a dry run', async () => {
    const directory = createSalesDirectory(['u-old']);
    const outcome = await runDeviceGroupSync(directory, createSalesParameters({ dryRun: true }));
    expect(directory.mutations).toEqual([]);
    expect(outcome.syncReport?.results.map((result) => [result.principal.id, result.outcome])).toEqual([
      ['u-old', MemberSyncOutcome.WouldRemove],
      ['u-una', MemberSyncOutcome.WouldAdd],
    ]);
  });

  it('only reports the matches without a target group', async () => {
    const directory = createSalesDirectory();
    const outcome = await runDeviceGroupSync(directory, createSalesParameters({ targetGroup: undefined }));
    expect(outcome.matches.map((match) => match.name)).toEqual(['iPhone12']);
    expect(outcome.syncReport).toBeNull();
    expect(outcome.context.state).toBe(DeviceSyncRunState.Resolved);
  });

  it('fails before resolving when the target group does not exist', async () => {
    const directory = createSalesDirectory();
    const error = await captureRejection(
      runDeviceGroupSync(directory, createSalesParameters({ targetGroup: 'Missing' }))
    );
    expect(ErrorHelper.IsNotFound(error)).toBe(true);
    expect(ErrorHelper.GetMessage(error)).toBe('The target group "Missing" was not found');
    expect(directory.getGroupMembersCalls).toEqual([]);
  });

  it('fails when the directory refuses the credential', async () => {
    const directory = createSalesDirectory();
    directory.failTokenRequests = true;
    const error = await captureRejection(runDeviceGroupSync(directory, createSalesParameters()));
    expect(ErrorHelper.IsNotAuthenticated(error)).toBe(true);
    expect(ErrorHelper.GetMessage(error)).toBe('Could not authenticate to the directory');
  });
});
