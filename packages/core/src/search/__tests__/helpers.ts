import { columnAffinity } from '../../db/affinity.js';
import type { ColumnInfo } from '../../db/types.js';
import { SqliteCatalog } from '../../storage/catalog.js';
import type { SchemaInfo } from '../types.js';

/** Build a schema snapshot from `{ table: ['col', 'col:INTEGER'] }` */
export function schemaOf(spec: Record<string, string[]>): SchemaInfo {
  const tables = new Map<string, readonly ColumnInfo[]>();
  for (const [table, columns] of Object.entries(spec)) {
    tables.set(
      table,
      columns.map((entry) => {
        const [name, dataType = 'TEXT'] = entry.split(':');
        return { name, dataType, affinity: columnAffinity(dataType) };
      }),
    );
  }
  return { tables, capturedAt: new Date(0) };
}

/** In-memory catalog with a users/products/orders fixture */
export function fixtureCatalog(): SqliteCatalog {
  const catalog = new SqliteCatalog(':memory:');
  catalog.createTable('users', ['id', 'name', 'email']);
  catalog.insertRows('users', [
    { id: '1', name: 'Jane Doe', email: 'jane@example.com' },
    { id: '2', name: 'John Smith', email: 'john@example.com' },
    { id: '3', name: 'Mary Jane Watson', email: 'mj@example.org' },
  ]);

  catalog.createTable('products', ['id', 'name', 'status']);
  catalog.insertRows('products', [
    { id: '10', name: 'Desk lamp', status: 'active' },
    { id: '11', name: 'Janitor cart', status: 'retired' },
  ]);

  catalog.createTable('orders', [
    { name: 'order_id', type: 'INTEGER' },
    { name: 'qty', type: 'INTEGER' },
    { name: 'note', type: 'TEXT' },
  ]);
  catalog.insertRows('orders', [
    { order_id: 42, qty: 3, note: 'gift for Jane' },
    { order_id: 7, qty: 42, note: null },
    { order_id: 420, qty: 1, note: 'order 42 follow-up' },
  ]);
  return catalog;
}
