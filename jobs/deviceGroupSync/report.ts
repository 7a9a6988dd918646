//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { describePlatformFilters, DeviceSyncRunState, type SyncReportCounts } from '../../business/devices/index.js';
import { writeTextToFile } from '../../lib/utils.js';

import type { IJobResult } from '../../interfaces/index.js';
import type { DeviceGroupSyncOutcome } from './task.js';

export type DeviceGroupSyncReportDocument = {
  started: string;
  finished: string;
  dryRun: boolean;
  clearFirst: boolean;
  addMode: string;
  sourceGroups: string[];
  filters: string;
  targetGroup: { id: string; displayName: string } | null;
  matches: {
    name: string;
    os: string;
    version: string;
    ownerUserId: string | null;
    owner: string | null;
    sourceGroups: string[];
  }[];
  members: {
    counts: SyncReportCounts;
    results: {
      id: string;
      displayName: string;
      kind: string;
      outcome: string;
      message?: string;
    }[];
  } | null;
  identityLookups: {
    batchesIssued: number;
    failedBatches: number;
  };
  warnings: string[];
};

export function countMemberFailures(outcome: DeviceGroupSyncOutcome): number {
  const counts = outcome.syncReport?.counts;
  return counts ? counts.failed + counts.removalFailed : 0;
}

export function createReportDocument(outcome: DeviceGroupSyncOutcome): DeviceGroupSyncReportDocument {
  const { parameters, syncReport } = outcome;
  return {
    started: outcome.context.started.toISOString(),
    finished: outcome.finished.toISOString(),
    dryRun: parameters.dryRun,
    clearFirst: parameters.clearFirst,
    addMode: parameters.addMode,
    sourceGroups: parameters.sourceGroups,
    filters: describePlatformFilters(parameters.filters),
    targetGroup: outcome.targetGroup
      ? { id: outcome.targetGroup.id, displayName: outcome.targetGroup.displayName }
      : null,
    matches: outcome.matches.map((match) => ({
      name: match.name,
      os: match.os,
      version: match.version,
      ownerUserId: match.ownerUserId,
      owner: match.ownerUserId ? outcome.ownerDisplayNames.get(match.ownerUserId) || null : null,
      sourceGroups: match.sourceGroups,
    })),
    members: syncReport
      ? {
          counts: syncReport.counts,
          results: syncReport.results.map((result) => ({
            id: result.principal.id,
            displayName: result.principal.displayName,
            kind: result.principal.kind,
            outcome: result.outcome,
            ...(result.message ? { message: result.message } : {}),
          })),
        }
      : null,
    identityLookups: {
      batchesIssued: outcome.batchesIssued,
      failedBatches: outcome.failedBatches,
    },
    warnings: [...outcome.context.warnings],
  };
}

export function summarizeOutcome(outcome: DeviceGroupSyncOutcome): string[] {
  const lines = [`Matching devices: ${outcome.matches.length}`];
  const counts = outcome.syncReport?.counts;
  if (counts) {
    if (outcome.syncReport?.dryRun) {
      lines.push(`Would remove: ${counts.wouldRemove}`, `Would add: ${counts.wouldAdd}`);
    } else {
      lines.push(
        `Added: ${counts.added}`,
        `AlreadyMember: ${counts.alreadyMember}`,
        `Failed: ${counts.failed}`,
        `Removed: ${counts.removed}`
      );
      if (counts.removalFailed) {
        lines.push(`RemovalFailed: ${counts.removalFailed}`);
      }
    }
  }
  if (outcome.failedBatches) {
    lines.push(`Failed identity lookup batches: ${outcome.failedBatches} of ${outcome.batchesIssued}`);
  }
  if (outcome.context.warnings.length) {
    lines.push(`Warnings: ${outcome.context.warnings.length}`);
  }
  return lines;
}

export async function reportDeviceGroupSync(outcome: DeviceGroupSyncOutcome): Promise<IJobResult> {
  console.log();
  for (const line of summarizeOutcome(outcome)) {
    console.log(line);
  }
  const reportPath = outcome.parameters.reportPath;
  if (reportPath) {
    const document = createReportDocument(outcome);
    await writeTextToFile(reportPath, JSON.stringify(document, null, 2));
    console.log(`Report written to ${reportPath}`);
  }
  outcome.context.transition(DeviceSyncRunState.Reported);
  const failures = countMemberFailures(outcome);
  const counts = outcome.syncReport?.counts;
  return {
    successProperties: {
      matches: String(outcome.matches.length),
      desiredMembers: String(outcome.desiredMembers.length),
      added: String(counts?.added || 0),
      alreadyMember: String(counts?.alreadyMember || 0),
      failed: String(counts?.failed || 0),
      removed: String(counts?.removed || 0),
      removalFailed: String(counts?.removalFailed || 0),
      dryRun: String(outcome.parameters.dryRun),
      warnings: String(outcome.context.warnings.length),
    },
    failed: outcome.parameters.failOnMemberErrors && failures > 0,
  };
}
