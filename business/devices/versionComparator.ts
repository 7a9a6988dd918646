//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { CreateError } from '../../lib/transitional.js';

import type { VersionComparisonOperator } from './types.js';

const operatorsByText = new Map<string, VersionComparisonOperator>([
  ['eq', 'eq'],
  ['=', 'eq'],
  ['==', 'eq'],
  ['ne', 'ne'],
  ['!=', 'ne'],
  ['lt', 'lt'],
  ['<', 'lt'],
  ['le', 'le'],
  ['<=', 'le'],
  ['gt', 'gt'],
  ['>', 'gt'],
  ['ge', 'ge'],
  ['>=', 'ge'],
]);

export function parseVersionComparisonOperator(text: string): VersionComparisonOperator {
  const operator = operatorsByText.get(text.trim().toLowerCase());
  if (!operator) {
    throw CreateError.InvalidParameters(
      `"${text}" is not a version comparison operator. Use one of eq, ne, lt, le, gt, ge.`
    );
  }
  return operator;
}

// "18" is read as "18.0". Returns undefined when any component is not a
// non-negative integer.
export function parseVersion(value: string): number[] | undefined {
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  const normalized = trimmed.includes('.') ? trimmed : `${trimmed}.0`;
  const components: number[] = [];
  for (const part of normalized.split('.')) {
    if (!/^\d+$/.test(part)) {
      return undefined;
    }
    components.push(parseInt(part, 10));
  }
  return components;
}

// -1, 0 or 1 with the shorter version zero padded; undefined if incomparable.
export function compareVersions(a: string, b: string): number | undefined {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) {
    return undefined;
  }
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const l = i < left.length ? left[i] : 0;
    const r = i < right.length ? right[i] : 0;
    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }
  return 0;
}

export function versionMatches(current: string, target: string, operator: VersionComparisonOperator): boolean {
  const comparison = compareVersions(current, target);
  if (comparison === undefined) {
    return false;
  }
  switch (operator) {
    case 'eq':
      return comparison === 0;
    case 'ne':
      return comparison !== 0;
    case 'lt':
      return comparison < 0;
    case 'le':
      return comparison <= 0;
    case 'gt':
      return comparison > 0;
    case 'ge':
      return comparison >= 0;
  }
}
