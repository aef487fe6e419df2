/**
 * Database abstraction types for csvcatalog.
 * The search engine only talks to a SearchSource; SqliteCatalog implements it.
 */

/** SQLite type affinity derived from a column's declared type */
export type ColumnAffinity = 'text' | 'integer' | 'real' | 'numeric' | 'blob';

export interface ColumnInfo {
  name: string;
  /** Declared type as written in the CREATE TABLE statement ('' when none) */
  dataType: string;
  affinity: ColumnAffinity;
}

/** Catalog listing entry, as shown by the `tables` command */
export interface TableInfo {
  name: string;
  columns: string[];
  rowCount: number;
  description: string | null;
  createdAt: string | null;
}

export type QueryRow = Record<string, unknown>;

/**
 * Read-side collaborator consumed by the search engine.
 * runQuery must be lazy: rows are pulled one at a time from the store, and
 * the SQL it runs may call FOLD_FUNCTION (see fold.ts).
 */
export interface SearchSource {
  listTables(): string[];
  listColumns(table: string): ColumnInfo[];
  runQuery(sql: string, params?: unknown[]): IterableIterator<QueryRow>;
}

/** Result of a raw SQL statement run through the `sql` command */
export interface SqlResult {
  reader: boolean;
  columns: string[];
  rows: QueryRow[];
  changes: number;
  execMs: number;
}
