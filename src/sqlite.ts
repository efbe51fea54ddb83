/**
 * SQL Batcher — SQLite entry point ('sql-batcher/sqlite')
 */

export { SqliteAdapter, SQLITE_MAX_QUERY_SIZE } from './adapters/sqlite-adapter.js';
export type { SqliteAdapterOptions } from './adapters/sqlite-adapter.js';
