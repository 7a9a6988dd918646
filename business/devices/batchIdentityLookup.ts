//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import _ from 'lodash';
import Debug from 'debug';

import { CreateError, ErrorHelper } from '../../lib/transitional.js';

import type { IDirectoryReader, IGraphDevice, IGraphEntry } from '../../lib/graphProvider/index.js';
import type { DeviceSyncRunContext } from './runContext.js';

const debug = Debug('devicesync');

// Graph caps the number of OR clauses in a $filter expression at 15
export const defaultIdentityBatchSize = 15;

export class BatchIdentityLookup {
  private _batchesIssued = 0;
  private _failedBatches = 0;

  constructor(
    private directory: IDirectoryReader,
    private context: DeviceSyncRunContext,
    private batchSize: number = defaultIdentityBatchSize
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw CreateError.InvalidParameters(`The identity lookup batch size must be a positive integer, not ${batchSize}`);
    }
  }

  get batchesIssued() {
    return this._batchesIssued;
  }

  get failedBatches() {
    return this._failedBatches;
  }

  // Ids that cannot be resolved, including those of a failed batch, are absent
  // from the returned map. An id is sent at most once per run.
  async resolveUsers(userIds: string[]): Promise<Map<string, IGraphEntry>> {
    const unique = _.uniq(userIds.filter(Boolean));
    const pending = unique.filter((id) => !this.context.wasUserLookedUp(id));
    await this.inBatches('user', pending, async (batch) => {
      this.context.markUsersLookedUp(batch);
      const users = await this.directory.getUsersByIds(batch);
      users.forEach((user) => this.context.rememberUser(user));
    });
    const resolved = new Map<string, IGraphEntry>();
    for (const id of unique) {
      const user = this.context.getUser(id);
      if (user) {
        resolved.set(id, user);
      }
    }
    return resolved;
  }

  async resolveDevices(azureADDeviceIds: string[]): Promise<Map<string, IGraphDevice>> {
    const unique = _.uniq(azureADDeviceIds.filter(Boolean));
    const pending = unique.filter((id) => !this.context.wasDirectoryDeviceLookedUp(id));
    await this.inBatches('device', pending, async (batch) => {
      this.context.markDirectoryDevicesLookedUp(batch);
      const devices = await this.directory.getDirectoryDevicesByDeviceIds(batch);
      devices.forEach((device) => this.context.rememberDirectoryDevice(device));
    });
    const resolved = new Map<string, IGraphDevice>();
    for (const id of unique) {
      const device = this.context.getDirectoryDevice(id);
      if (device) {
        resolved.set(id, device);
      }
    }
    return resolved;
  }

  private async inBatches(kind: string, ids: string[], lookup: (batch: string[]) => Promise<void>) {
    const batches = _.chunk(ids, this.batchSize);
    if (batches.length) {
      debug(`resolving ${ids.length} ${kind} ids in ${batches.length} batches of up to ${this.batchSize}`);
    }
    for (const batch of batches) {
      ++this._batchesIssued;
      try {
        await lookup(batch);
      } catch (error) {
        ++this._failedBatches;
        this.context.warn(
          `The ${kind} lookup of a batch of ${batch.length} ids failed and was skipped: ${ErrorHelper.GetMessage(error)}`
        );
      }
    }
  }
}
