/**
 * Search engine types.
 *
 * A search runs in five steps: targets are parsed into TargetSpecs, the
 * schema is captured once, specs resolve to SearchUnits, each unit runs as a
 * single query yielding Matches, and matches are grouped into a SearchReport.
 */

import type { ColumnInfo, QueryRow } from '../db/types.js';

export type TargetSpec =
  | { kind: 'all-tables'; raw: string }
  | { kind: 'table'; raw: string; table: string }
  | { kind: 'table-column'; raw: string; table: string; column: string }
  | { kind: 'any-table-column'; raw: string; column: string };

/** Point-in-time table/column structure, in listing order */
export interface SchemaInfo {
  readonly tables: ReadonlyMap<string, readonly ColumnInfo[]>;
  readonly capturedAt: Date;
}

export interface SearchUnit {
  table: string;
  /** Subset of the table's columns, in table column order */
  columns: string[];
}

export interface Match {
  readonly table: string;
  readonly column: string;
  /** Full row snapshot over the unit table's columns */
  readonly row: Readonly<QueryRow>;
  readonly value: unknown;
}

export interface UnitOutcome {
  unit: SearchUnit;
  matches: Match[];
  truncated: boolean;
  error?: UnitError;
}

export interface UnitError {
  table: string;
  columns: string[];
  code: 'QUERY_EXECUTION_FAILED';
  message: string;
}

export interface ColumnReport {
  column: string;
  matches: Match[];
}

export interface TableReport {
  table: string;
  columns: ColumnReport[];
  matchCount: number;
  truncated: boolean;
}

export interface SearchReport {
  value: string;
  tables: TableReport[];
  errors: UnitError[];
  warnings: string[];
  totalMatches: number;
  cancelled: boolean;
  durationMs: number;
}

export interface SearchLogger {
  debug(message: string): void;
}
