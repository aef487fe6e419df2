import type { ColumnInfo, SearchSource } from '../db/types.js';
import type { SchemaInfo } from './types.js';

/**
 * Snapshot the catalog structure once per search.
 * Later schema changes (a concurrent delete or purge) are not reflected.
 */
export function captureSchema(source: Pick<SearchSource, 'listTables' | 'listColumns'>): SchemaInfo {
  const tables = new Map<string, readonly ColumnInfo[]>();
  for (const table of source.listTables()) {
    const columns = source.listColumns(table).map((column) => Object.freeze({ ...column }));
    tables.set(table, Object.freeze(columns));
  }
  return Object.freeze({ tables, capturedAt: new Date() });
}

export function columnNames(schema: SchemaInfo, table: string): string[] {
  return (schema.tables.get(table) ?? []).map((column) => column.name);
}
