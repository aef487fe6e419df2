/**
 * Human-readable rendering of search reports and catalog listings.
 */

import type { SearchReport, TableInfo } from '@csvcatalog/core';
import { formatTable } from './util/table.js';

export function renderSearchReport(report: SearchReport): string {
  if (report.totalMatches === 0) {
    return report.cancelled
      ? `Search for "${report.value}" cancelled before any match was found.`
      : `No matches found for "${report.value}".`;
  }

  const lines: string[] = [
    `Found ${report.totalMatches} match(es) for "${report.value}" in ${report.tables.length} table(s) (${report.durationMs}ms).`,
  ];

  for (const table of report.tables) {
    for (const column of table.columns) {
      lines.push('');
      lines.push(`${table.table}.${column.column}: ${column.matches.length} match(es)`);
      const rowColumns = Object.keys(column.matches[0].row);
      lines.push(formatTable(rowColumns, column.matches.map((match) => ({ ...match.row }))));
    }
  }

  return lines.join('\n');
}

/** Warnings, truncation notes and per-table failures, one line each */
export function describeProblems(report: SearchReport): string[] {
  const problems: string[] = [...report.warnings];
  for (const table of report.tables) {
    if (table.truncated) {
      problems.push(`Results for "${table.table}" were truncated at the per-table row limit.`);
    }
  }
  for (const error of report.errors) {
    problems.push(error.message);
  }
  if (report.cancelled) {
    problems.push('Search interrupted; showing partial results.');
  }
  return problems;
}

export function tableListingRows(tables: TableInfo[]): Record<string, unknown>[] {
  return tables.map((t) => ({
    name: t.name,
    columns: t.columns.join(', '),
    description: t.description ?? 'n/a',
    rows: t.rowCount,
    'created at': t.createdAt ?? '',
  }));
}

export const TABLE_LISTING_COLUMNS = ['name', 'columns', 'description', 'rows', 'created at'];

/** Case-insensitive filter on table descriptions */
export function filterByDescription(tables: TableInfo[], filter?: string): TableInfo[] {
  if (!filter) return tables;
  const needle = filter.toLowerCase();
  return tables.filter((t) => t.description?.toLowerCase().includes(needle) ?? false);
}
