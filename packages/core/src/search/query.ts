/**
 * Per-unit query construction and execution.
 *
 * Each unit runs as one statement. Every searched column contributes a match
 * flag to the inner SELECT and the outer WHERE keeps rows with any flag set,
 * so a single pass tells which columns of each row matched.
 */

import { isTextLike } from '../db/affinity.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { FOLD_FUNCTION, foldCase } from '../db/fold.js';
import { quoteIdent } from '../db/ident.js';
import type { QueryRow, SearchSource } from '../db/types.js';
import { QueryExecutionError } from './errors.js';
import type { Match, SchemaInfo, SearchUnit } from './types.js';

const FLAG_PREFIX = '__catalog_match_';

export interface UnitQuery {
  sql: string;
  params: string[];
  /** Columns of the row snapshot, in table order */
  rowColumns: string[];
  /** Match flag alias per searched column */
  flags: Array<{ column: string; alias: string }>;
}

export interface ExecuteUnitOptions {
  maxRows?: number;
  signal?: AbortSignal;
}

export interface UnitSummary {
  matchedRows: number;
  truncated: boolean;
  aborted: boolean;
}

export function buildUnitQuery(unit: SearchUnit, schema: SchemaInfo, value: string): UnitQuery {
  const tableColumns = schema.tables.get(unit.table) ?? [];
  const rowColumns = tableColumns.map((c) => c.name);
  // SQLite resolves identifiers case-insensitively
  const taken = new Set(rowColumns.map((name) => name.toLowerCase()));
  const flags: UnitQuery['flags'] = [];
  const predicates: string[] = [];
  const params: string[] = [];

  unit.columns.forEach((column, i) => {
    const info = tableColumns.find((c) => c.name === column);
    const ident = quoteIdent(column);
    // Text columns: case-insensitive substring. Others: exact textual equality.
    if (info && !isTextLike(info.affinity)) {
      predicates.push(`CAST(${ident} AS TEXT) = ?`);
      params.push(value);
    } else {
      predicates.push(`instr(${FOLD_FUNCTION}(CAST(${ident} AS TEXT)), ?) > 0`);
      params.push(foldCase(value));
    }
    flags.push({ column, alias: flagAlias(i, taken) });
  });

  const flagColumns = flags.map((flag, i) => `COALESCE(${predicates[i]}, 0) AS ${quoteIdent(flag.alias)}`);
  const selectList = [...rowColumns.map(quoteIdent), ...flagColumns].join(', ');
  const where = flags.map((flag) => quoteIdent(flag.alias)).join(' OR ');

  return {
    sql: `SELECT * FROM (SELECT ${selectList} FROM ${quoteIdent(unit.table)}) WHERE ${where}`,
    params,
    rowColumns,
    flags,
  };
}

/** `__catalog_match_<i>`, suffixed with "_" until no table column shares the name */
function flagAlias(index: number, taken: Set<string>): string {
  let alias = `${FLAG_PREFIX}${index}`;
  while (taken.has(alias.toLowerCase())) {
    alias += '_';
  }
  return alias;
}

/**
 * Stream the matches of one unit. Rows are pulled lazily from the source;
 * iteration stops at maxRows matching rows or when the signal aborts.
 * Storage failures surface as QueryExecutionError.
 */
export function* executeUnit(
  source: Pick<SearchSource, 'runQuery'>,
  unit: SearchUnit,
  schema: SchemaInfo,
  value: string,
  options: ExecuteUnitOptions = {},
): Generator<Match, UnitSummary, undefined> {
  const maxRows = options.maxRows ?? SAFE_DEFAULTS.maxRowsPerTable;
  const query = buildUnitQuery(unit, schema, value);

  let rows: IterableIterator<QueryRow>;
  try {
    rows = source.runQuery(query.sql, query.params);
  } catch (err: unknown) {
    throw new QueryExecutionError(unit.table, err);
  }

  let matchedRows = 0;
  try {
    for (;;) {
      if (options.signal?.aborted) {
        return { matchedRows, truncated: false, aborted: true };
      }

      let next: IteratorResult<QueryRow>;
      try {
        next = rows.next();
      } catch (err: unknown) {
        throw new QueryExecutionError(unit.table, err);
      }
      if (next.done) break;

      if (matchedRows >= maxRows) {
        return { matchedRows, truncated: true, aborted: false };
      }
      matchedRows++;
      yield* toMatches(unit.table, query, next.value);
    }
  } finally {
    rows.return?.();
  }

  return { matchedRows, truncated: false, aborted: false };
}

function toMatches(table: string, query: UnitQuery, raw: QueryRow): Match[] {
  const row: QueryRow = {};
  for (const column of query.rowColumns) {
    row[column] = raw[column];
  }
  Object.freeze(row);

  return query.flags
    .filter((flag) => raw[flag.alias] === 1)
    .map((flag) => Object.freeze({ table, column: flag.column, row, value: row[flag.column] }));
}
