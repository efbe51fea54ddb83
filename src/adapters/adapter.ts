/**
 * SQL Batcher Adapter Interface
 *
 * Every backend implements SqlAdapter. The batcher only ever borrows an
 * adapter's execute(); opening and closing it belongs to the caller.
 */

import type { AdapterState } from '../types.js';
import { connectionClosedError, mapSqlError, transactionStateError } from '../errors.js';

export interface SqlAdapter {
  readonly name: string;
  readonly state: AdapterState;

  // ─── Execution ────────────────────────────────────────────────────
  /** Run one complete SQL text, possibly a multi-statement batch. Empty for non-queries. */
  execute(sql: string): Promise<unknown[]>;
  /** Advisory. Callers set the batcher's maxBytes at or below this. */
  getMaxQuerySize(): number;

  // ─── Lifecycle ────────────────────────────────────────────────────
  /** Idempotent. */
  close(): Promise<void>;

  // ─── Transactions ────────────────────────────────────────────────
  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

/**
 * State machine shared by the bundled adapters:
 *
 *   open → transaction (begin) → open (commit | rollback) → closed (close)
 *
 * Backends without transactions inherit the no-op begin/commit/rollback
 * hooks, but state is still tracked. A nested beginTransaction() and a
 * commit or rollback without an active transaction throw TRANSACTION_STATE.
 */
export abstract class BaseSqlAdapter implements SqlAdapter {
  abstract readonly name: string;
  private _state: AdapterState = 'open';

  get state(): AdapterState {
    return this._state;
  }

  abstract getMaxQuerySize(): number;

  protected abstract run(sql: string): Promise<unknown[]> | unknown[];
  protected abstract release(): Promise<void> | void;

  protected begin(): Promise<void> | void {}
  protected commit(): Promise<void> | void {}
  protected rollback(): Promise<void> | void {}

  async execute(sql: string): Promise<unknown[]> {
    this.assertOpen('execute');
    try {
      return await this.run(sql);
    } catch (err) {
      throw mapSqlError(err, this.name, 'execute');
    }
  }

  async close(): Promise<void> {
    if (this._state === 'closed') return;
    this._state = 'closed';
    try {
      await this.release();
    } catch (err) {
      throw mapSqlError(err, this.name, 'close');
    }
  }

  async beginTransaction(): Promise<void> {
    this.assertOpen('beginTransaction');
    if (this._state === 'transaction') {
      throw transactionStateError(this.name, 'beginTransaction', this._state);
    }
    try {
      await this.begin();
    } catch (err) {
      throw mapSqlError(err, this.name, 'beginTransaction');
    }
    this._state = 'transaction';
  }

  async commitTransaction(): Promise<void> {
    await this.endTransaction('commitTransaction', () => this.commit());
  }

  async rollbackTransaction(): Promise<void> {
    await this.endTransaction('rollbackTransaction', () => this.rollback());
  }

  private async endTransaction(operation: string, end: () => Promise<void> | void): Promise<void> {
    this.assertOpen(operation);
    if (this._state !== 'transaction') {
      throw transactionStateError(this.name, operation, this._state);
    }
    try {
      await end();
    } catch (err) {
      throw mapSqlError(err, this.name, operation);
    } finally {
      this._state = 'open';
    }
  }

  private assertOpen(operation: string): void {
    if (this._state === 'closed') {
      throw connectionClosedError(this.name, operation);
    }
  }
}

// ─── Scoped Helpers ──────────────────────────────────────────────────────────

/**
 * Run fn inside a transaction: commit when it resolves, roll back and
 * rethrow when it rejects. Adapters without transaction methods just run fn.
 */
export async function withTransaction<T>(adapter: SqlAdapter, fn: () => Promise<T>): Promise<T> {
  await adapter.beginTransaction?.();

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    if (adapter.rollbackTransaction) {
      try {
        await adapter.rollbackTransaction();
      } catch (rollbackErr) {
        throw new AggregateError([err, rollbackErr], `Rollback on the ${adapter.name} adapter failed after an error.`);
      }
    }
    throw err;
  }

  await adapter.commitTransaction?.();
  return result;
}

/**
 * Use an adapter for the duration of fn and close it on every exit path.
 * When fn and close() both fail, an AggregateError carries both errors.
 */
export async function withAdapter<A extends SqlAdapter, T>(adapter: A, fn: (adapter: A) => Promise<T>): Promise<T> {
  let result: T;
  try {
    result = await fn(adapter);
  } catch (err) {
    try {
      await adapter.close();
    } catch (closeErr) {
      throw new AggregateError([err, closeErr], `Closing the ${adapter.name} adapter failed after an error.`);
    }
    throw err;
  }

  await adapter.close();
  return result;
}
