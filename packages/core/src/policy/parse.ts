/**
 * AST-based SQL parser for the `sql` command guard.
 * Uses node-sql-parser with the SQLite dialect.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const SQLITE_OPT = { database: 'sqlite' } as const;

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'unknown';

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
];

export interface ParseResult {
  /** First statement of the AST */
  ast: Record<string, unknown>;
  statementCount: number;
  kind: SqlKind;
  /** Tables referenced anywhere in the statement */
  tables: string[];
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

export function parseSql(sql: string): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult = parser.astify(normalizedSql, SQLITE_OPT);
    const statements: unknown[] = Array.isArray(astResult) ? astResult : [astResult];
    const first = statements[0];
    if (!isRecord(first)) {
      return { ok: false, error: 'No statements found' };
    }

    const rawKind = typeof first.type === 'string' ? first.type.toLowerCase() : '';
    return {
      ok: true,
      ast: first,
      statementCount: statements.length,
      kind: isKnownKind(rawKind) ? rawKind : 'unknown',
      tables: listTables(normalizedSql),
      normalizedSql,
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}

/** tableList entries look like "select::null::users" */
function listTables(sql: string): string[] {
  const tables = parser.tableList(sql, SQLITE_OPT).map((entry) => {
    const [, db, table] = entry.split('::');
    return db && db !== 'null' ? `${db}.${table}` : table;
  });
  return [...new Set(tables.filter((t): t is string => Boolean(t)))];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isKnownKind(s: string): s is SqlKind {
  return KNOWN_KINDS.some((kind) => kind === s);
}
