import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseTargets } from '../parse.js';
import { resolveTargets } from '../resolve.js';
import { UnknownColumnError, UnknownTableError } from '../errors.js';
import { schemaOf } from './helpers.js';

const schema = schemaOf({
  users: ['id', 'name', 'email'],
  products: ['id', 'name', 'status'],
});

function resolve(targets: string[]) {
  return resolveTargets(parseTargets(targets), schema);
}

describe('resolveTargets', () => {
  it('expands an empty target list to every table in listing order', () => {
    assert.deepEqual(resolve([]).units, [
      { table: 'users', columns: ['id', 'name', 'email'] },
      { table: 'products', columns: ['id', 'name', 'status'] },
    ]);
  });

  it('resolves a bare table to all of its columns', () => {
    assert.deepEqual(resolve(['products']).units, [{ table: 'products', columns: ['id', 'name', 'status'] }]);
  });

  it('resolves table.column to that single column', () => {
    assert.deepEqual(resolve(['users.email']).units, [{ table: 'users', columns: ['email'] }]);
  });

  it('skips tables without the column for *.column', () => {
    const result = resolve(['*.status']);
    assert.deepEqual(result.units, [{ table: 'products', columns: ['status'] }]);
    assert.deepEqual(result.warnings, []);
  });

  it('fans *.column out to every table that has it', () => {
    assert.deepEqual(resolve(['*.name']).units, [
      { table: 'users', columns: ['name'] },
      { table: 'products', columns: ['name'] },
    ]);
  });

  it('warns instead of failing when no table has the wildcard column', () => {
    const result = resolve(['*.missing']);
    assert.deepEqual(result.units, []);
    assert.deepEqual(result.warnings, ['No table has a column named "missing" (target "*.missing").']);
  });

  it('merges a table and one of its columns into a single full unit', () => {
    assert.deepEqual(resolve(['users', 'users.name']).units, [
      { table: 'users', columns: ['id', 'name', 'email'] },
    ]);
    assert.deepEqual(resolve(['users.name', 'users']).units, [
      { table: 'users', columns: ['id', 'name', 'email'] },
    ]);
  });

  it('unions column sets in table column order at the first mention', () => {
    assert.deepEqual(resolve(['users.email', 'products.status', 'users.id', '*.name']).units, [
      { table: 'users', columns: ['id', 'name', 'email'] },
      { table: 'products', columns: ['name', 'status'] },
    ]);
  });

  it('never produces two units for the same table', () => {
    const units = resolve(['*.id', 'users', 'products.name', 'users.email', '*.name']).units;
    const tables = units.map((u) => u.table);
    assert.deepEqual(tables, [...new Set(tables)]);
  });

  it('fails on an unknown table', () => {
    assert.throws(() => resolve(['customers']), (err: unknown) => {
      assert.ok(err instanceof UnknownTableError);
      assert.equal(err.table, 'customers');
      return true;
    });
  });

  it('fails on an unknown table before looking at later targets', () => {
    assert.throws(() => resolve(['ghosts.name', 'users.nope']), UnknownTableError);
  });

  it('fails on an unknown column of a known table', () => {
    assert.throws(() => resolve(['users.status']), (err: unknown) => {
      assert.ok(err instanceof UnknownColumnError);
      assert.equal(err.table, 'users');
      assert.equal(err.column, 'status');
      return true;
    });
  });

  it('matches table names case-sensitively', () => {
    assert.throws(() => resolve(['Users']), UnknownTableError);
  });
});
