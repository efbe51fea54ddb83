/**
 * SQL Batcher Generic Adapter
 *
 * Makes any cursor-style connection usable without a bespoke adapter:
 * open a cursor, execute text, fetch rows, commit/rollback/close on the
 * connection. Every connection method may be sync or async.
 */

import { BaseSqlAdapter } from './adapter.js';

export interface Cursor {
  execute(sql: string): unknown;
  fetchAll(): unknown[] | Promise<unknown[]>;
  close?(): unknown;
}

export interface CursorConnection {
  cursor(): Cursor | Promise<Cursor>;
  /** When absent, transactions start with a plain BEGIN through a cursor. */
  begin?(): unknown;
  commit?(): unknown;
  rollback?(): unknown;
  close?(): unknown;
}

export interface GenericAdapterOptions {
  /** Defaults to DEFAULT_MAX_QUERY_SIZE. */
  maxQuerySize?: number;
  /** Commit after every execute() issued outside a transaction. */
  autoCommit?: boolean;
  name?: string;
}

export const DEFAULT_MAX_QUERY_SIZE = 500_000;

const READ_KEYWORDS = ['select', 'with', 'show', 'describe', 'explain', 'values'];

/**
 * Keyword-prefix heuristic, not parsing: leading whitespace is trimmed and
 * case ignored, but comments before the keyword are not skipped.
 */
export function looksLikeQuery(sql: string): boolean {
  const head = sql.trimStart().toLowerCase();
  return READ_KEYWORDS.some(keyword => {
    if (!head.startsWith(keyword)) return false;
    const next = head.charAt(keyword.length);
    return next === '' || next === '(' || /\s/.test(next);
  });
}

export class GenericAdapter extends BaseSqlAdapter {
  readonly name: string;
  private readonly connection: CursorConnection;
  private readonly maxQuerySize: number;
  private readonly autoCommit: boolean;

  constructor(connection: CursorConnection, options: GenericAdapterOptions = {}) {
    super();
    this.connection = connection;
    this.name = options.name ?? 'generic';
    this.maxQuerySize = options.maxQuerySize ?? DEFAULT_MAX_QUERY_SIZE;
    this.autoCommit = options.autoCommit ?? false;
  }

  getMaxQuerySize(): number {
    return this.maxQuerySize;
  }

  protected async run(sql: string): Promise<unknown[]> {
    const rows = await this.withCursor(async cursor => {
      await cursor.execute(sql);
      return looksLikeQuery(sql) ? await cursor.fetchAll() : [];
    });

    if (this.autoCommit && this.state !== 'transaction') {
      await this.connection.commit?.();
    }
    return rows;
  }

  protected async begin(): Promise<void> {
    if (this.connection.begin) {
      await this.connection.begin();
      return;
    }
    await this.withCursor(async cursor => {
      await cursor.execute('BEGIN');
    });
  }

  protected async commit(): Promise<void> {
    await this.connection.commit?.();
  }

  protected async rollback(): Promise<void> {
    await this.connection.rollback?.();
  }

  protected async release(): Promise<void> {
    await this.connection.close?.();
  }

  private async withCursor<T>(fn: (cursor: Cursor) => Promise<T>): Promise<T> {
    const cursor = await this.connection.cursor();
    try {
      return await fn(cursor);
    } finally {
      await cursor.close?.();
    }
  }
}
