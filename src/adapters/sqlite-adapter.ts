/**
 * SQL Batcher SQLite Adapter
 *
 * Wraps a better-sqlite3 database. Single-statement text is prepared, and
 * rows come back when SQLite reports it as a reader. Multi-statement batch
 * text goes through exec(), which runs every statement but returns no rows.
 */

import Database from 'better-sqlite3';
import { BaseSqlAdapter } from './adapter.js';

export interface SqliteAdapterOptions {
  /** Defaults to SQLite's compiled-in SQLITE_MAX_SQL_LENGTH. */
  maxQuerySize?: number;
}

export const SQLITE_MAX_QUERY_SIZE = 1_000_000;

export class SqliteAdapter extends BaseSqlAdapter {
  readonly name = 'sqlite';
  private readonly db: Database.Database;
  private readonly maxQuerySize: number;

  constructor(db: Database.Database, options: SqliteAdapterOptions = {}) {
    super();
    this.db = db;
    this.maxQuerySize = options.maxQuerySize ?? SQLITE_MAX_QUERY_SIZE;
  }

  /** Open a database file (default in-memory) owned by the adapter. */
  static open(filename = ':memory:', options: SqliteAdapterOptions & Database.Options = {}): SqliteAdapter {
    const { maxQuerySize, ...dbOptions } = options;
    return new SqliteAdapter(new Database(filename, dbOptions), { maxQuerySize });
  }

  getMaxQuerySize(): number {
    return this.maxQuerySize;
  }

  protected run(sql: string): unknown[] {
    let statement: Database.Statement;
    try {
      statement = this.db.prepare(sql);
    } catch (err) {
      // prepare() takes exactly one statement
      if (!(err instanceof RangeError)) throw err;
      this.db.exec(sql);
      return [];
    }
    if (statement.reader) {
      return statement.all();
    }
    statement.run();
    return [];
  }

  protected begin(): void {
    this.db.exec('BEGIN');
  }

  protected commit(): void {
    this.db.exec('COMMIT');
  }

  protected rollback(): void {
    this.db.exec('ROLLBACK');
  }

  protected release(): void {
    this.db.close();
  }
}
