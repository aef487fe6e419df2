/**
 * Merge per-unit outcomes into one report grouped by table, then column,
 * then row. Outcomes arrive in resolution order and keep that order.
 */

import type { ColumnReport, SearchReport, TableReport, UnitError, UnitOutcome } from './types.js';

export interface ReportMeta {
  warnings?: string[];
  cancelled?: boolean;
  durationMs?: number;
}

export function aggregateResults(
  value: string,
  outcomes: readonly UnitOutcome[],
  meta: ReportMeta = {},
): SearchReport {
  const tables: TableReport[] = [];
  const errors: UnitError[] = [];
  let totalMatches = 0;

  for (const outcome of outcomes) {
    if (outcome.error) {
      errors.push(outcome.error);
    }

    const columns: ColumnReport[] = [];
    for (const column of outcome.unit.columns) {
      const matches = outcome.matches.filter((match) => match.column === column);
      if (matches.length > 0) {
        columns.push({ column, matches });
      }
    }
    if (columns.length === 0) continue;

    const matchCount = columns.reduce((sum, column) => sum + column.matches.length, 0);
    totalMatches += matchCount;
    tables.push({
      table: outcome.unit.table,
      columns,
      matchCount,
      truncated: outcome.truncated,
    });
  }

  return {
    value,
    tables,
    errors,
    warnings: meta.warnings ?? [],
    totalMatches,
    cancelled: meta.cancelled ?? false,
    durationMs: meta.durationMs ?? 0,
  };
}
