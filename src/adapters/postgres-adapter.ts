/**
 * SQL Batcher PostgreSQL Adapter
 *
 * Wraps a pg client. Batch text is sent through the simple query protocol,
 * so one execute() can carry many semicolon-delimited statements.
 */

import pg from 'pg';
import type { IsolationLevel } from '../types.js';
import { mapSqlError } from '../errors.js';
import { BaseSqlAdapter } from './adapter.js';

/** The slice of pg.Client / pg.PoolClient this adapter needs. */
export interface PgClient {
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
}

export interface PostgresAdapterOptions {
  /** Defaults to 500 MB. */
  maxQuerySize?: number;
  isolationLevel?: IsolationLevel;
}

export const POSTGRES_MAX_QUERY_SIZE = 500_000_000;

export class PostgresAdapter extends BaseSqlAdapter {
  readonly name = 'postgres';
  private readonly client: PgClient;
  private readonly maxQuerySize: number;
  private readonly isolationLevel?: IsolationLevel;

  constructor(client: PgClient, options: PostgresAdapterOptions = {}) {
    super();
    this.client = client;
    this.maxQuerySize = options.maxQuerySize ?? POSTGRES_MAX_QUERY_SIZE;
    this.isolationLevel = options.isolationLevel;
  }

  /**
   * Open a new pg client and wrap it. The adapter owns that client:
   * close() ends it.
   */
  static async connect(config: pg.ClientConfig, options?: PostgresAdapterOptions): Promise<PostgresAdapter> {
    const client = new pg.Client({ application_name: 'sql-batcher', ...config });
    try {
      await client.connect();
    } catch (err) {
      throw mapSqlError(err, 'postgres', 'connect');
    }
    return new PostgresAdapter(client, options);
  }

  getMaxQuerySize(): number {
    return this.maxQuerySize;
  }

  protected async run(sql: string): Promise<unknown[]> {
    const result = await this.client.query(sql);
    // Multi-statement text resolves to one result per statement
    const results: unknown[] = Array.isArray(result) ? result : [result];
    return results.flatMap(rowsOf);
  }

  protected async begin(): Promise<void> {
    const sql = this.isolationLevel
      ? `BEGIN ISOLATION LEVEL ${this.isolationLevel.toUpperCase()}`
      : 'BEGIN';
    await this.client.query(sql);
  }

  protected async commit(): Promise<void> {
    await this.client.query('COMMIT');
  }

  protected async rollback(): Promise<void> {
    await this.client.query('ROLLBACK');
  }

  protected async release(): Promise<void> {
    await this.client.end();
  }
}

function rowsOf(result: unknown): unknown[] {
  if (typeof result === 'object' && result !== null && 'rows' in result && Array.isArray(result.rows)) {
    return result.rows;
  }
  return [];
}
