/**
 * Expand parsed targets against a schema snapshot into search units.
 *
 * Explicit table and table.column targets must exist; *.column targets skip
 * tables that lack the column. Units are merged per table at the position of
 * the first mention, so a (table, column) pair is never searched twice.
 */

import { UnknownColumnError, UnknownTableError } from './errors.js';
import { columnNames } from './schema.js';
import type { SchemaInfo, SearchUnit, TargetSpec } from './types.js';

export interface ResolveResult {
  units: SearchUnit[];
  warnings: string[];
}

export function resolveTargets(specs: readonly TargetSpec[], schema: SchemaInfo): ResolveResult {
  const merged = new Map<string, Set<string>>();
  const warnings: string[] = [];

  const add = (table: string, columns: readonly string[]): void => {
    const existing = merged.get(table);
    if (existing) {
      for (const column of columns) existing.add(column);
    } else {
      merged.set(table, new Set(columns));
    }
  };

  for (const spec of specs) {
    switch (spec.kind) {
      case 'all-tables':
        for (const table of schema.tables.keys()) {
          add(table, columnNames(schema, table));
        }
        break;
      case 'table':
        add(spec.table, requireTable(schema, spec.table));
        break;
      case 'table-column': {
        const columns = requireTable(schema, spec.table);
        if (!columns.includes(spec.column)) {
          throw new UnknownColumnError(spec.table, spec.column);
        }
        add(spec.table, [spec.column]);
        break;
      }
      case 'any-table-column': {
        let found = false;
        for (const table of schema.tables.keys()) {
          if (columnNames(schema, table).includes(spec.column)) {
            add(table, [spec.column]);
            found = true;
          }
        }
        if (!found) {
          warnings.push(`No table has a column named "${spec.column}" (target "${spec.raw}").`);
        }
        break;
      }
    }
  }

  const units: SearchUnit[] = [];
  for (const [table, columns] of merged) {
    units.push({
      table,
      columns: columnNames(schema, table).filter((column) => columns.has(column)),
    });
  }
  return { units, warnings };
}

function requireTable(schema: SchemaInfo, table: string): string[] {
  if (!schema.tables.has(table)) {
    throw new UnknownTableError(table);
  }
  return columnNames(schema, table);
}
