//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { describe, expect, it } from 'vitest';

import { DeviceAddMode } from '../../business/devices/index.js';
import { ManagedDeviceOperatingSystem } from '../../lib/graphProvider/index.js';
import { ErrorHelper } from '../../lib/transitional.js';
import { parseDeviceGroupSyncArguments } from './arguments.js';

import type { ConfigDeviceSync } from '../../interfaces/index.js';

function createDefaults(overrides?: Partial<ConfigDeviceSync>): ConfigDeviceSync {
  return {
    addMode: 'Users',
    clearFirst: true,
    dryRun: false,
    failOnMemberErrors: false,
    serverSideVersionFilter: false,
    batchSize: 15,
    platforms: {
      ios: { operator: 'lt' },
      ipados: { operator: 'lt' },
      windows: { operator: 'lt' },
    },
    ...overrides,
  };
}

function captureError(fn: () => unknown) {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseDeviceGroupSyncArguments', () => {
  it('uses the configured defaults without arguments', () => {
    const parameters = parseDeviceGroupSyncArguments([], createDefaults());
    expect(parameters).toEqual({
      sourceGroups: [],
      filters: {},
      targetGroup: undefined,
      addMode: DeviceAddMode.Users,
      clearFirst: true,
      dryRun: false,
      maximumResults: undefined,
      batchSize: 15,
      serverSideVersionFilter: false,
      reportPath: undefined,
      failOnMemberErrors: false,
    });
  });

  it('reads source groups, filters and the target from the command line', () => {
    const parameters = parseDeviceGroupSyncArguments(
      [
        '--source-group',
        'Sales',
        'Sales Leads',
        '--ios',
        '18.0',
        '--windows',
        '10.0.22621',
        '--windows-operator',
        '<=',
        '--target-group',
        'Outdated Devices',
        '--add',
        'both',
        '--no-clear',
        '--dry-run',
        '--limit',
        '25',
        '--report',
        'report.json',
        '--fail-on-member-errors',
      ],
      createDefaults()
    );
    expect(parameters).toEqual({
      sourceGroups: ['Sales', 'Sales Leads'],
      filters: {
        [ManagedDeviceOperatingSystem.iOS]: { minimumVersion: '18.0', operator: 'lt' },
        [ManagedDeviceOperatingSystem.Windows]: { minimumVersion: '10.0.22621', operator: 'le' },
      },
      targetGroup: 'Outdated Devices',
      addMode: DeviceAddMode.Both,
      clearFirst: false,
      dryRun: true,
      maximumResults: 25,
      batchSize: 15,
      serverSideVersionFilter: false,
      reportPath: 'report.json',
      failOnMemberErrors: true,
    });
  });

  it('splits configured source groups on commas and semicolons', () => {
    const parameters = parseDeviceGroupSyncArguments(
      [],
      createDefaults({ sourceGroups: 'Sales; Engineering,Support', clearFirst: false })
    );
    expect(parameters?.sourceGroups).toEqual(['Sales', 'Engineering', 'Support']);
    expect(parameters?.clearFirst).toBe(false);
  });

  it('lets --clear override a configuration that does not clear', () => {
    const parameters = parseDeviceGroupSyncArguments(['--clear'], createDefaults({ clearFirst: false }));
    expect(parameters?.clearFirst).toBe(true);
  });

  it('rejects a malformed operator', () => {
    const error = captureError(() =>
      parseDeviceGroupSyncArguments(['--ios', '18', '--ios-operator', 'older'], createDefaults())
    );
    expect(ErrorHelper.GetStatus(error)).toBe(400);
  });

  it('rejects a malformed operator given without a version', () => {
    const error = captureError(() => parseDeviceGroupSyncArguments(['--ios-operator', 'bogus'], createDefaults()));
    expect(ErrorHelper.GetStatus(error)).toBe(400);
  });

  it('rejects a malformed configured operator', () => {
    const defaults = createDefaults();
    defaults.platforms.windows.operator = 'bogus';
    const error = captureError(() => parseDeviceGroupSyncArguments([], defaults));
    expect(ErrorHelper.GetStatus(error)).toBe(400);
  });

  it('rejects an unknown add mode', () => {
    const error = captureError(() => parseDeviceGroupSyncArguments(['--add', 'groups'], createDefaults()));
    expect(ErrorHelper.GetMessage(error)).toBe('"groups" is not an add mode. Use Users, Devices or Both.');
  });

  it('rejects a limit that is not a positive integer', () => {
    const error = captureError(() => parseDeviceGroupSyncArguments(['--limit', '0'], createDefaults()));
    expect(ErrorHelper.GetStatus(error)).toBe(400);
  });

  it('rejects a configured limit below one', () => {
    const error = captureError(() => parseDeviceGroupSyncArguments([], createDefaults({ maximumResults: 0 })));
    expect(ErrorHelper.GetMessage(error)).toBe('The device limit must be a positive integer, not 0');
  });

  it('rejects a configured batch size below one', () => {
    const error = captureError(() => parseDeviceGroupSyncArguments([], createDefaults({ batchSize: -3 })));
    expect(ErrorHelper.GetMessage(error)).toBe('The identity lookup batch size must be a positive integer, not -3');
  });

  it('rejects an unknown option', () => {
    const error = captureError(() => parseDeviceGroupSyncArguments(['--everything'], createDefaults()));
    expect(ErrorHelper.GetStatus(error)).toBe(400);
  });
});
