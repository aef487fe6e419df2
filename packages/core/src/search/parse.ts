/**
 * Target grammar parser.
 *
 *   TABLE         every column of one table
 *   TABLE.COLUMN  one column of one table
 *   *.COLUMN      that column in every table that has it
 *   *, *.*        every table
 */

import { MalformedTargetError } from './errors.js';
import type { TargetSpec } from './types.js';

const WILDCARD = '*';

export function parseTargets(targets: readonly string[]): TargetSpec[] {
  if (targets.length === 0) {
    return [{ kind: 'all-tables', raw: '' }];
  }
  return targets.map(parseTarget);
}

export function parseTarget(raw: string): TargetSpec {
  const parts = raw.split('.');
  if (parts.length > 2) {
    throw new MalformedTargetError(raw, 'expected at most one "."');
  }
  if (parts.some((part) => part.trim() === '')) {
    throw new MalformedTargetError(raw, 'table and column names must not be empty');
  }

  if (parts.length === 1) {
    return raw === WILDCARD ? { kind: 'all-tables', raw } : { kind: 'table', raw, table: raw };
  }

  const [table, column] = parts;
  if (table === WILDCARD) {
    return column === WILDCARD
      ? { kind: 'all-tables', raw }
      : { kind: 'any-table-column', raw, column };
  }
  if (column === WILDCARD) {
    return { kind: 'table', raw, table };
  }
  return { kind: 'table-column', raw, table, column };
}
