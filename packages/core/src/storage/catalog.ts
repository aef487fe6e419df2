/**
 * SQLite catalog store using better-sqlite3.
 * Holds the imported tables plus a small metadata table for descriptions.
 * One instance is opened per process and reused by every command.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { columnAffinity } from '../db/affinity.js';
import { FOLD_FUNCTION, foldSqlValue } from '../db/fold.js';
import { quoteIdent } from '../db/ident.js';
import type { ColumnInfo, QueryRow, SearchSource, SqlResult, TableInfo } from '../db/types.js';

export const META_TABLE = '_catalog_meta';

// ── Schema migrations (tracked with PRAGMA user_version) ────────────

const MIGRATIONS: string[] = [
  // 1: table metadata
  `CREATE TABLE IF NOT EXISTS ${META_TABLE} (
    table_name TEXT PRIMARY KEY,
    description TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,
];

// ── Errors ───────────────────────────────────────────────────────────

export type CatalogErrorCode = 'TABLE_NOT_FOUND' | 'INVALID_IDENTIFIER' | 'NOT_READ_ONLY';

export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string) {
    super(message);
    this.name = 'CatalogError';
    this.code = code;
  }
}

// ── Column definitions ───────────────────────────────────────────────

export type ColumnType = 'TEXT' | 'INTEGER' | 'REAL' | 'NUMERIC' | 'BLOB';

export interface ColumnDefinition {
  name: string;
  type?: ColumnType;
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function validateIdentifier(name: string): string {
  if (!IDENTIFIER_RE.test(name) || name === META_TABLE) {
    throw new CatalogError('INVALID_IDENTIFIER', `Invalid table or column name: "${name}"`);
  }
  return name;
}

// ── Integer reads ────────────────────────────────────────────────────

/**
 * Rows are read with safeIntegers so INTEGER values arrive as bigint.
 * Values a JS number holds exactly become numbers; larger ones become
 * their decimal string.
 */
function exactValue(value: unknown): unknown {
  if (typeof value !== 'bigint') return value;
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

function exactRow(row: QueryRow): QueryRow {
  const out: QueryRow = {};
  for (const [key, value] of Object.entries(row)) {
    out[key] = exactValue(value);
  }
  return out;
}

/** Maps rows lazily; return() reaches the statement even before the first next() */
function exactRows(rows: IterableIterator<QueryRow>): IterableIterator<QueryRow> {
  return {
    next() {
      const step = rows.next();
      return step.done ? step : { done: false, value: exactRow(step.value) };
    },
    return(value?: unknown) {
      return rows.return ? rows.return(value) : { done: true, value };
    },
    [Symbol.iterator]() {
      return this;
    },
  };
}

interface PragmaColumnRow {
  name: string;
  type: string;
}

interface MetaRow {
  description: string | null;
  created_at: string;
}

// ── SqliteCatalog ────────────────────────────────────────────────────

export class SqliteCatalog implements SearchSource {
  private db: Database.Database;
  readonly path: string;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.path = dbPath;
    this.db = new Database(dbPath);
    this.db.function(FOLD_FUNCTION, { deterministic: true }, foldSqlValue);
    this.migrate();
  }

  /** Run all pending migrations */
  private migrate(): void {
    const current = Number(this.db.pragma('user_version', { simple: true }));
    for (let i = current; i < MIGRATIONS.length; i++) {
      this.db.exec(MIGRATIONS[i]);
      this.db.pragma(`user_version = ${i + 1}`);
    }
  }

  // ── Search collaborator ──────────────────────────────────────────

  listTables(): string[] {
    return this.db
      .prepare<[string], { name: string }>(
        `SELECT name
         FROM sqlite_master
         WHERE type = 'table'
           AND name NOT LIKE 'sqlite_%'
           AND name <> ?
         ORDER BY name`,
      )
      .all(META_TABLE)
      .map((row) => row.name);
  }

  listColumns(table: string): ColumnInfo[] {
    return this.db
      .prepare<[], PragmaColumnRow>(`PRAGMA table_info(${quoteIdent(table)})`)
      .all()
      .map((column) => ({
        name: column.name,
        dataType: column.type,
        affinity: columnAffinity(column.type),
      }));
  }

  runQuery(sql: string, params: unknown[] = []): IterableIterator<QueryRow> {
    const stmt = this.db.prepare<unknown[], QueryRow>(sql);
    if (!stmt.reader) {
      throw new CatalogError('NOT_READ_ONLY', 'Search queries must be read-only statements.');
    }
    return exactRows(stmt.safeIntegers(true).iterate(...params));
  }

  // ── Catalog management ───────────────────────────────────────────

  hasTable(name: string): boolean {
    return this.listTables().includes(name);
  }

  getTables(): TableInfo[] {
    const meta = this.db.prepare<[string], MetaRow>(
      `SELECT description, created_at FROM ${META_TABLE} WHERE table_name = ?`,
    );

    return this.listTables().map((name) => {
      const countRow = this.db
        .prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${quoteIdent(name)}`)
        .get();
      const metaRow = meta.get(name);
      return {
        name,
        columns: this.listColumns(name).map((column) => column.name),
        rowCount: Number(countRow?.c ?? 0),
        description: metaRow?.description ?? null,
        createdAt: metaRow?.created_at ?? null,
      };
    });
  }

  createTable(name: string, columns: Array<string | ColumnDefinition>): void {
    const safeName = validateIdentifier(name);
    if (columns.length === 0) {
      throw new CatalogError('INVALID_IDENTIFIER', `Table "${name}" needs at least one column.`);
    }
    const defs = columns.map((column) => {
      const def = typeof column === 'string' ? { name: column } : column;
      return `${quoteIdent(validateIdentifier(def.name))} ${def.type ?? 'TEXT'}`;
    });

    const create = this.db.transaction(() => {
      this.db.exec(`CREATE TABLE IF NOT EXISTS ${quoteIdent(safeName)} (${defs.join(', ')})`);
      this.db.prepare(`INSERT OR IGNORE INTO ${META_TABLE} (table_name) VALUES (?)`).run(safeName);
    });
    create();
  }

  insertRows(table: string, rows: QueryRow[]): number {
    if (rows.length === 0) return 0;
    const safeTable = validateIdentifier(table);
    const columns = Object.keys(rows[0]).map(validateIdentifier);
    const placeholders = columns.map(() => '?').join(', ');
    const stmt = this.db.prepare(
      `INSERT INTO ${quoteIdent(safeTable)} (${columns.map(quoteIdent).join(', ')}) VALUES (${placeholders})`,
    );

    const insertAll = this.db.transaction((batch: QueryRow[]) => {
      for (const row of batch) {
        stmt.run(...columns.map((column) => row[column] ?? null));
      }
      return batch.length;
    });
    return insertAll(rows);
  }

  updateDescription(table: string, description: string): void {
    this.requireTable(table);
    this.db
      .prepare(
        `INSERT INTO ${META_TABLE} (table_name, description) VALUES (?, ?)
         ON CONFLICT(table_name) DO UPDATE SET description = excluded.description`,
      )
      .run(table, description);
  }

  deleteTable(name: string): void {
    this.requireTable(name);
    const drop = this.db.transaction(() => {
      this.db.exec(`DROP TABLE ${quoteIdent(name)}`);
      this.db.prepare(`DELETE FROM ${META_TABLE} WHERE table_name = ?`).run(name);
    });
    drop();
  }

  /** Drop every user table; returns the dropped names */
  purge(): string[] {
    const tables = this.listTables();
    const dropAll = this.db.transaction(() => {
      for (const name of tables) {
        this.db.exec(`DROP TABLE ${quoteIdent(name)}`);
      }
      this.db.exec(`DELETE FROM ${META_TABLE}`);
    });
    dropAll();
    return tables;
  }

  /** Execute a single raw SQL statement */
  execute(sql: string): SqlResult {
    const start = performance.now();
    const stmt = this.db.prepare<[], QueryRow>(sql);
    if (stmt.reader) {
      const rows = stmt.safeIntegers(true).all().map(exactRow);
      return {
        reader: true,
        columns: stmt.columns().map((column) => column.name),
        rows,
        changes: 0,
        execMs: Math.round(performance.now() - start),
      };
    }

    const run = stmt.run();
    return {
      reader: false,
      columns: [],
      rows: [],
      changes: Number(run.changes ?? 0),
      execMs: Math.round(performance.now() - start),
    };
  }

  /** Whether a statement only reads, as reported by SQLite itself */
  isReader(sql: string): boolean {
    return this.db.prepare(sql).reader;
  }

  private requireTable(name: string): void {
    if (!this.hasTable(name)) {
      throw new CatalogError('TABLE_NOT_FOUND', `Table "${name}" not found.`);
    }
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
