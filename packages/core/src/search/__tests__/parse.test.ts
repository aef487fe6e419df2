import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseTarget, parseTargets } from '../parse.js';
import { MalformedTargetError } from '../errors.js';

describe('parseTargets', () => {
  it('returns a single all-tables spec for an empty target list', () => {
    assert.deepEqual(parseTargets([]), [{ kind: 'all-tables', raw: '' }]);
  });

  it('classifies each target shape in order', () => {
    assert.deepEqual(parseTargets(['users', 'users.email', '*.status']), [
      { kind: 'table', raw: 'users', table: 'users' },
      { kind: 'table-column', raw: 'users.email', table: 'users', column: 'email' },
      { kind: 'any-table-column', raw: '*.status', column: 'status' },
    ]);
  });

  it('keeps table names case-sensitive', () => {
    assert.deepEqual(parseTarget('Users.Email'), {
      kind: 'table-column',
      raw: 'Users.Email',
      table: 'Users',
      column: 'Email',
    });
  });

  it('treats bare * and *.* as every table', () => {
    assert.deepEqual(parseTarget('*'), { kind: 'all-tables', raw: '*' });
    assert.deepEqual(parseTarget('*.*'), { kind: 'all-tables', raw: '*.*' });
  });

  it('treats table.* as the whole table', () => {
    assert.deepEqual(parseTarget('orders.*'), { kind: 'table', raw: 'orders.*', table: 'orders' });
  });

  it('rejects targets with more than one dot', () => {
    for (const raw of ['a.b.c', 'main.users.id', '*.a.b', 'a..b']) {
      assert.throws(() => parseTarget(raw), MalformedTargetError, raw);
    }
  });

  it('rejects empty components', () => {
    for (const raw of ['', '.', 'a.', '.b', ' .b', 'users. ']) {
      assert.throws(() => parseTarget(raw), MalformedTargetError, JSON.stringify(raw));
    }
  });

  it('reports the offending token', () => {
    try {
      parseTargets(['users', 'a.b.c']);
      assert.fail('expected MalformedTargetError');
    } catch (err: unknown) {
      assert.ok(err instanceof MalformedTargetError);
      assert.equal(err.target, 'a.b.c');
      assert.equal(err.code, 'MALFORMED_TARGET');
      assert.equal(err.message, 'Malformed target "a.b.c": expected at most one "."');
    }
  });
});
