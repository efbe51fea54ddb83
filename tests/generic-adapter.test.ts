/**
 * Generic Adapter Tests — cursor execution, query heuristic, state machine
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_MAX_QUERY_SIZE,
  GenericAdapter,
  looksLikeQuery,
} from '../src/adapters/generic-adapter.js';
import type { CursorConnection } from '../src/adapters/generic-adapter.js';
import { withAdapter, withTransaction } from '../src/adapters/adapter.js';
import type { SqlAdapter } from '../src/adapters/adapter.js';
import { SqlBatcherError } from '../src/errors.js';
import { FakeConnection } from './helpers/fake-connection.js';

// ─── looksLikeQuery ──────────────────────────────────────────────────────────

describe('looksLikeQuery', () => {
  it.each([
    ['SELECT * FROM users', true],
    ['select 1', true],
    ['  \n\tSELECT 1', true],
    ['select', true],
    ['WITH t AS (SELECT 1) SELECT * FROM t', true],
    ['SHOW TABLES', true],
    ['DESCRIBE users', true],
    ['EXPLAIN SELECT 1', true],
    ['VALUES (1), (2)', true],
    ['select(1)', true],
    ['INSERT INTO users VALUES (1)', false],
    ['SELECTED_ROWS', false],
    ['withdraw', false],
    ['-- leading comment\nSELECT 1', false],
    ['', false],
  ])('%j → %s', (sql, expected) => {
    expect(looksLikeQuery(sql)).toBe(expected);
  });
});

// ─── execute ─────────────────────────────────────────────────────────────────

describe('GenericAdapter.execute', () => {
  it('returns an empty result for non-query text without fetching', async () => {
    const connection = new FakeConnection();
    connection.rows = [[1]];
    const adapter = new GenericAdapter(connection);

    await expect(adapter.execute('INSERT INTO t VALUES (1)')).resolves.toEqual([]);
    expect(connection.fetches).toBe(0);
  });

  it('fetches and returns rows for query text', async () => {
    const connection = new FakeConnection();
    connection.rows = [[1, 'Alice'], [2, 'Bob']];
    const adapter = new GenericAdapter(connection);

    await expect(adapter.execute('SELECT id, name FROM users')).resolves.toEqual([[1, 'Alice'], [2, 'Bob']]);
    expect(connection.fetches).toBe(1);
  });

  it('closes the cursor after every call, including failures', async () => {
    const connection = new FakeConnection();
    connection.failOn = 'BAD';
    const adapter = new GenericAdapter(connection);

    await adapter.execute('INSERT 1');
    await expect(adapter.execute('BAD')).rejects.toThrow(SqlBatcherError);
    expect(connection.cursorsClosed).toBe(2);
  });

  it('normalizes driver errors and keeps the original', async () => {
    const connection = new FakeConnection();
    connection.failOn = 'BAD';
    const adapter = new GenericAdapter(connection, { name: 'test-db' });

    const err = await adapter.execute('BAD').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SqlBatcherError);
    if (!(err instanceof SqlBatcherError)) return;
    expect(err.code).toBe('SYNTAX_ERROR');
    expect(err.adapter).toBe('test-db');
    expect(err.operation).toBe('execute');
    expect(err.originalError).toBeInstanceOf(Error);
  });

  it('works with an async cursor contract', async () => {
    const connection: CursorConnection = {
      cursor: async () => ({
        execute: async () => undefined,
        fetchAll: async () => [{ n: 1 }],
      }),
    };
    const adapter = new GenericAdapter(connection);
    await expect(adapter.execute('SELECT 1 AS n')).resolves.toEqual([{ n: 1 }]);
  });

  it('commits after each execute with autoCommit, but not inside a transaction', async () => {
    const connection = new FakeConnection();
    const adapter = new GenericAdapter(connection, { autoCommit: true });

    await adapter.execute('INSERT 1');
    await adapter.beginTransaction();
    await adapter.execute('INSERT 2');
    await adapter.commitTransaction();

    expect(connection.log).toEqual(['INSERT 1', 'COMMIT', 'BEGIN', 'INSERT 2', 'COMMIT']);
  });
});

// ─── Size limit ──────────────────────────────────────────────────────────────

describe('GenericAdapter.getMaxQuerySize', () => {
  it('uses a conservative default', () => {
    expect(new GenericAdapter(new FakeConnection()).getMaxQuerySize()).toBe(DEFAULT_MAX_QUERY_SIZE);
    expect(DEFAULT_MAX_QUERY_SIZE).toBe(500_000);
  });

  it('honors an override', () => {
    expect(new GenericAdapter(new FakeConnection(), { maxQuerySize: 4096 }).getMaxQuerySize()).toBe(4096);
  });
});

// ─── Lifecycle & transactions ────────────────────────────────────────────────

describe('adapter state machine', () => {
  it('moves open → transaction → open → closed', async () => {
    const adapter = new GenericAdapter(new FakeConnection());
    expect(adapter.state).toBe('open');
    await adapter.beginTransaction();
    expect(adapter.state).toBe('transaction');
    await adapter.rollbackTransaction();
    expect(adapter.state).toBe('open');
    await adapter.close();
    expect(adapter.state).toBe('closed');
  });

  it('closes the connection once when close() is called twice', async () => {
    const connection = new FakeConnection();
    const adapter = new GenericAdapter(connection);
    await adapter.close();
    await expect(adapter.close()).resolves.toBeUndefined();
    expect(connection.closeCalls).toBe(1);
  });

  it('rejects execute after close with CONNECTION_CLOSED', async () => {
    const adapter = new GenericAdapter(new FakeConnection());
    await adapter.close();
    await expect(adapter.execute('SELECT 1')).rejects.toMatchObject({ code: 'CONNECTION_CLOSED' });
    await expect(adapter.beginTransaction()).rejects.toMatchObject({ code: 'CONNECTION_CLOSED' });
  });

  it('rejects a nested beginTransaction', async () => {
    const adapter = new GenericAdapter(new FakeConnection());
    await adapter.beginTransaction();
    await expect(adapter.beginTransaction()).rejects.toMatchObject({ code: 'TRANSACTION_STATE' });
    expect(adapter.state).toBe('transaction');
  });

  it('rejects commit and rollback with no active transaction', async () => {
    const adapter = new GenericAdapter(new FakeConnection());
    await expect(adapter.commitTransaction()).rejects.toMatchObject({ code: 'TRANSACTION_STATE' });
    await expect(adapter.rollbackTransaction()).rejects.toMatchObject({ code: 'TRANSACTION_STATE' });
  });

  it('uses the connection begin() when it has one', async () => {
    const connection = new FakeConnection();
    const begin = vi.fn();
    const adapter = new GenericAdapter(Object.assign(connection, { begin }));
    await adapter.beginTransaction();
    expect(begin).toHaveBeenCalledTimes(1);
    expect(connection.log).toEqual([]);
  });
});

describe('withTransaction', () => {
  it('commits and returns the result', async () => {
    const connection = new FakeConnection();
    const adapter = new GenericAdapter(connection);
    const result = await withTransaction(adapter, async () => {
      await adapter.execute('INSERT 1');
      return 42;
    });
    expect(result).toBe(42);
    expect(connection.log).toEqual(['BEGIN', 'INSERT 1', 'COMMIT']);
  });

  it('rolls back and rethrows the original error', async () => {
    const connection = new FakeConnection();
    const failure = new Error('work failed');
    const adapter = new GenericAdapter(connection);
    await expect(withTransaction(adapter, async () => { throw failure; })).rejects.toBe(failure);
    expect(connection.log).toEqual(['BEGIN', 'ROLLBACK']);
    expect(adapter.state).toBe('open');
  });

  it('reports both errors when the rollback also fails', async () => {
    const connection = new FakeConnection();
    connection.rollback = () => { throw new Error('rollback failed'); };
    const adapter = new GenericAdapter(connection);

    const err = await withTransaction(adapter, async () => { throw new Error('work failed'); })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AggregateError);
    if (!(err instanceof AggregateError)) return;
    expect(err.errors).toHaveLength(2);
    expect(err.errors[0]).toBeInstanceOf(Error);
    expect(err.errors[1]).toMatchObject({ code: 'EXECUTION_ERROR' });
  });

  it('just runs fn for an adapter without transaction methods', async () => {
    const adapter: SqlAdapter = {
      name: 'bare',
      state: 'open',
      execute: async () => [],
      getMaxQuerySize: () => 100,
      close: async () => undefined,
    };
    await expect(withTransaction(adapter, async () => 'done')).resolves.toBe('done');
  });
});

describe('withAdapter', () => {
  it('closes the adapter after success', async () => {
    const connection = new FakeConnection();
    const rows = await withAdapter(new GenericAdapter(connection), adapter => adapter.execute('INSERT 1'));
    expect(rows).toEqual([]);
    expect(connection.closeCalls).toBe(1);
  });

  it('closes the adapter when fn throws', async () => {
    const connection = new FakeConnection();
    const failure = new Error('boom');
    await expect(withAdapter(new GenericAdapter(connection), async () => { throw failure; })).rejects.toBe(failure);
    expect(connection.closeCalls).toBe(1);
  });

  it('reports both errors when closing also fails', async () => {
    const connection = new FakeConnection();
    connection.close = () => { throw new Error('close failed'); };
    const failure = new Error('boom');

    const err = await withAdapter(new GenericAdapter(connection), async () => { throw failure; })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AggregateError);
    if (!(err instanceof AggregateError)) return;
    expect(err.errors).toHaveLength(2);
    expect(err.errors[0]).toBe(failure);
    expect(err.errors[1]).toMatchObject({ code: 'EXECUTION_ERROR', operation: 'close' });
  });

  it('surfaces a close failure after fn succeeds', async () => {
    const connection = new FakeConnection();
    connection.close = () => { throw new Error('close failed'); };

    await expect(withAdapter(new GenericAdapter(connection), async () => 'done'))
      .rejects.toMatchObject({ code: 'EXECUTION_ERROR' });
  });
});
