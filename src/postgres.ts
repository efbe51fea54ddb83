/**
 * SQL Batcher — PostgreSQL entry point ('sql-batcher/postgres')
 */

export { PostgresAdapter, POSTGRES_MAX_QUERY_SIZE } from './adapters/postgres-adapter.js';
export type { PgClient, PostgresAdapterOptions } from './adapters/postgres-adapter.js';
