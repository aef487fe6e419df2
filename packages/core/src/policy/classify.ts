/**
 * Statement classifier for the `sql` command.
 * Classifies SQL as read/write/dangerous and extracts impacted tables.
 */

import { parseSql, type SqlKind } from './parse.js';

export type StatementClassification = 'read' | 'write' | 'dangerous';

export interface ClassificationResult {
  classification: StatementClassification;
  kind: SqlKind;
  impactedTables: string[];
  hasWhereClause: boolean;
  /** False when the parser could not read the statement */
  parsed: boolean;
  summary: string;
}

const WRITE_KINDS: SqlKind[] = ['insert', 'replace', 'update', 'delete', 'create', 'alter'];
const DANGEROUS_KINDS: SqlKind[] = ['drop'];

/**
 * Classify a SQL statement as read, write, or dangerous.
 * Unparseable statements come back as 'read' with parsed=false; callers
 * must confirm with the database before treating them as read-only.
 */
export function classifyStatement(sql: string): ClassificationResult {
  const parseResult = parseSql(sql);
  if (!parseResult.ok) {
    return {
      classification: 'read',
      kind: 'unknown',
      impactedTables: [],
      hasWhereClause: false,
      parsed: false,
      summary: 'Unparseable statement',
    };
  }

  const { kind, ast, tables } = parseResult;

  let classification: StatementClassification = 'read';
  if (DANGEROUS_KINDS.includes(kind)) {
    classification = 'dangerous';
  } else if (WRITE_KINDS.includes(kind)) {
    classification = 'write';
  }

  // Only UPDATE and DELETE care about a WHERE clause
  const hasWhereClause = kind === 'update' || kind === 'delete' ? ast.where != null : true;
  const summary = buildSummary(kind, classification, tables, hasWhereClause);

  return { classification, kind, impactedTables: tables, hasWhereClause, parsed: true, summary };
}

function buildSummary(
  kind: SqlKind,
  classification: StatementClassification,
  tables: string[],
  hasWhere: boolean,
): string {
  const tableStr = tables.length > 0 ? ` on ${tables.join(', ')}` : '';
  const kindUpper = kind.toUpperCase();

  if (classification === 'dangerous') {
    return `${kindUpper}${tableStr} (DANGEROUS: may cause irreversible data loss)`;
  }

  if ((kind === 'update' || kind === 'delete') && !hasWhere) {
    return `${kindUpper}${tableStr} (WARNING: no WHERE clause, affects ALL rows)`;
  }

  return `${kindUpper}${tableStr}`;
}

/**
 * Why a statement must be confirmed before it runs, or null when it may run
 * directly. `reader` is SQLite's own verdict from preparing the statement;
 * it settles statements the parser could not read.
 */
export function confirmationReason(result: ClassificationResult, reader: boolean): string | null {
  if (reader && result.classification === 'read') return null;
  if (!result.parsed || result.kind === 'unknown') {
    return 'Unrecognized statement that modifies the database';
  }
  return result.summary;
}
