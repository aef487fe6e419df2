import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Match, SearchReport, TableInfo } from '@csvcatalog/core';
import { formatTable, formatValue } from '../util/table.js';
import { describeProblems, filterByDescription, renderSearchReport, tableListingRows } from '../render.js';

function emptyReport(overrides: Partial<SearchReport> = {}): SearchReport {
  return {
    value: 'jane',
    tables: [],
    errors: [],
    warnings: [],
    totalMatches: 0,
    cancelled: false,
    durationMs: 5,
    ...overrides,
  };
}

function nameMatch(id: string, name: string): Match {
  return { table: 'users', column: 'name', row: { id, name }, value: name };
}

describe('formatTable', () => {
  it('pads every cell to its column width', () => {
    const out = formatTable(['id', 'name'], [
      { id: '1', name: 'Ana' },
      { id: '22', name: null },
    ]);
    assert.deepEqual(out.split('\n'), ['id | name', '---+-----', '1  | Ana ', '22 | NULL']);
  });

  it('truncates long cells with an ellipsis', () => {
    const out = formatTable(['v'], [{ v: 'x'.repeat(70) }]);
    assert.equal(out.split('\n')[2], `${'x'.repeat(59)}…`);
  });

  it('describes empty input', () => {
    assert.equal(formatTable([], [{ a: 1 }]), '(no columns)');
    assert.equal(formatTable(['a'], []), '(0 rows)');
  });
});

describe('formatValue', () => {
  it('renders SQLite values', () => {
    assert.equal(formatValue(null), 'NULL');
    assert.equal(formatValue(42), '42');
    assert.equal(formatValue(Buffer.from([1, 2, 3])), '<blob 3 bytes>');
    assert.equal(formatValue({ a: 1 }), '{"a":1}');
  });
});

describe('renderSearchReport', () => {
  it('reports no matches', () => {
    assert.equal(renderSearchReport(emptyReport()), 'No matches found for "jane".');
  });

  it('reports a search cancelled before any match', () => {
    assert.equal(
      renderSearchReport(emptyReport({ cancelled: true })),
      'Search for "jane" cancelled before any match was found.',
    );
  });

  it('prints one block per matching column', () => {
    const report = emptyReport({
      totalMatches: 2,
      tables: [
        {
          table: 'users',
          columns: [{ column: 'name', matches: [nameMatch('1', 'Jane Doe'), nameMatch('3', 'Mary Jane')] }],
          matchCount: 2,
          truncated: false,
        },
      ],
    });

    assert.deepEqual(renderSearchReport(report).split('\n'), [
      'Found 2 match(es) for "jane" in 1 table(s) (5ms).',
      '',
      'users.name: 2 match(es)',
      'id | name     ',
      '---+----------',
      '1  | Jane Doe ',
      '3  | Mary Jane',
    ]);
  });
});

describe('describeProblems', () => {
  it('lists warnings, truncation, unit errors and cancellation in order', () => {
    const report = emptyReport({
      warnings: ['No table has a column named "color" (target "*.color").'],
      tables: [
        {
          table: 'users',
          columns: [{ column: 'name', matches: [nameMatch('1', 'Jane Doe')] }],
          matchCount: 1,
          truncated: true,
        },
      ],
      errors: [
        {
          table: 'products',
          columns: ['name'],
          code: 'QUERY_EXECUTION_FAILED',
          message: 'Search in table "products" failed: no such table: products',
        },
      ],
      cancelled: true,
    });

    assert.deepEqual(describeProblems(report), [
      'No table has a column named "color" (target "*.color").',
      'Results for "users" were truncated at the per-table row limit.',
      'Search in table "products" failed: no such table: products',
      'Search interrupted; showing partial results.',
    ]);
  });

  it('is empty for a clean report', () => {
    assert.deepEqual(describeProblems(emptyReport()), []);
  });
});

describe('table listing', () => {
  const tables: TableInfo[] = [
    { name: 'people', columns: ['name', 'city'], rowCount: 2, description: 'Contact list', createdAt: '2026-01-02 03:04:05' },
    { name: 'events', columns: ['id'], rowCount: 0, description: null, createdAt: null },
  ];

  it('builds listing rows', () => {
    assert.deepEqual(tableListingRows(tables), [
      { name: 'people', columns: 'name, city', description: 'Contact list', rows: 2, 'created at': '2026-01-02 03:04:05' },
      { name: 'events', columns: 'id', description: 'n/a', rows: 0, 'created at': '' },
    ]);
  });

  it('filters by description case-insensitively', () => {
    assert.deepEqual(filterByDescription(tables, 'CONTACT').map((t) => t.name), ['people']);
    assert.equal(filterByDescription(tables).length, 2);
    assert.deepEqual(filterByDescription(tables, 'zzz'), []);
  });
});
