//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import {
  createPlatformFilters,
  defaultIdentityBatchSize,
  DeviceAddMode,
  parseDeviceAddMode,
  type DevicePlatformFilters,
} from '../../business/devices/index.js';
import { CreateError, splitSemiColonCommas } from '../../lib/transitional.js';

import type { ConfigDeviceSync } from '../../interfaces/index.js';

export type DeviceGroupSyncParameters = {
  sourceGroups: string[];
  filters: DevicePlatformFilters;
  targetGroup?: string;
  addMode: DeviceAddMode;
  clearFirst: boolean;
  dryRun: boolean;
  maximumResults?: number;
  batchSize: number;
  serverSideVersionFilter: boolean;
  reportPath?: string;
  failOnMemberErrors: boolean;
};

type DeviceGroupSyncCommandOptions = {
  sourceGroup?: string[];
  ios?: string;
  iosOperator?: string;
  ipados?: string;
  ipadosOperator?: string;
  windows?: string;
  windowsOperator?: string;
  targetGroup?: string;
  add?: string;
  clear?: boolean;
  dryRun?: boolean;
  limit?: number;
  batchSize?: number;
  report?: string;
  failOnMemberErrors?: boolean;
  serverSideVersionFilter?: boolean;
};

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function requirePositiveInteger(name: string, value: number | undefined) {
  if (value !== undefined && (!Number.isSafeInteger(value) || value < 1)) {
    throw CreateError.InvalidParameters(`The ${name} must be a positive integer, not ${value}`);
  }
  return value;
}

export function createDeviceGroupSyncCommand(): Command {
  return new Command('device-group-sync')
    .description('Synchronize a directory group with the owners or devices matching OS version filters')
    .option('-s, --source-group <name...>', 'source group display names; none means every managed device')
    .option('--ios <version>', 'iOS version to compare against')
    .option('--ios-operator <op>', 'iOS comparison: eq, ne, lt, le, gt or ge')
    .option('--ipados <version>', 'iPadOS version to compare against')
    .option('--ipados-operator <op>', 'iPadOS comparison: eq, ne, lt, le, gt or ge')
    .option('--windows <version>', 'Windows version to compare against')
    .option('--windows-operator <op>', 'Windows comparison: eq, ne, lt, le, gt or ge')
    .option('-t, --target-group <nameOrId>', 'group to synchronize; without one the run only reports')
    .option('--add <mode>', 'members to add: Users, Devices or Both')
    .option('--clear', 'remove every current member of the target group first')
    .option('--no-clear', 'only add members that are missing from the target group')
    .option('--dry-run', 'report the changes without making them')
    .option('--limit <n>', 'stop after this many matching devices', parsePositiveInteger)
    .option('--batch-size <n>', 'ids per directory lookup', parsePositiveInteger)
    .option('--report <file>', 'write a JSON report of the run')
    .option('--fail-on-member-errors', 'exit non-zero when any member could not be added or removed')
    .option('--server-side-version-filter', 'send eq and ne version filters with the inventory query')
    .configureOutput({
      // the job runner prints the thrown error
      outputError: () => undefined,
    })
    .exitOverride();
}

// Command line values win over the deviceSync configuration. Returns null
// when only help or the version was requested.
export function parseDeviceGroupSyncArguments(
  args: string[],
  defaults: ConfigDeviceSync
): DeviceGroupSyncParameters | null {
  const command = createDeviceGroupSyncCommand();
  try {
    command.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        return null;
      }
      throw CreateError.InvalidParameters(error.message, error);
    }
    throw error;
  }
  const options = command.opts<DeviceGroupSyncCommandOptions>();
  const addModeValue = options.add || defaults.addMode || DeviceAddMode.Users;
  const addMode = parseDeviceAddMode(addModeValue);
  if (!addMode) {
    throw CreateError.InvalidParameters(`"${addModeValue}" is not an add mode. Use Users, Devices or Both.`);
  }
  const { platforms } = defaults;
  const filters = createPlatformFilters({
    ios: {
      minimumVersion: options.ios ?? platforms.ios.minimumVersion,
      operator: options.iosOperator ?? platforms.ios.operator,
    },
    ipados: {
      minimumVersion: options.ipados ?? platforms.ipados.minimumVersion,
      operator: options.ipadosOperator ?? platforms.ipados.operator,
    },
    windows: {
      minimumVersion: options.windows ?? platforms.windows.minimumVersion,
      operator: options.windowsOperator ?? platforms.windows.operator,
    },
  });
  const sourceGroups = options.sourceGroup
    ? options.sourceGroup.map((name) => name.trim()).filter(Boolean)
    : splitSemiColonCommas(defaults.sourceGroups);
  return {
    sourceGroups,
    filters,
    targetGroup: options.targetGroup?.trim() || defaults.targetGroup || undefined,
    addMode,
    clearFirst: options.clear ?? defaults.clearFirst,
    dryRun: options.dryRun || defaults.dryRun,
    maximumResults: requirePositiveInteger('device limit', options.limit ?? defaults.maximumResults),
    batchSize:
      requirePositiveInteger('identity lookup batch size', options.batchSize ?? defaults.batchSize) ??
      defaultIdentityBatchSize,
    serverSideVersionFilter: options.serverSideVersionFilter || defaults.serverSideVersionFilter,
    reportPath: options.report || defaults.reportPath || undefined,
    failOnMemberErrors: options.failOnMemberErrors || defaults.failOnMemberErrors,
  };
}
