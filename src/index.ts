/**
 * SQL Batcher — Public API Entry Point
 *
 * Pack SQL statements into size- and count-bounded batches and run them
 * through any backend adapter.
 */

// Batcher
export { SqlBatcher } from './batcher.js';
export type { ProcessWithAdapterOptions } from './batcher.js';
export { QueryCollector } from './query-collector.js';
export { BatcherEventEmitter } from './events.js';
export { loadBatcherConfig, resolveConfig } from './config.js';
export { withRetry } from './retry.js';

// Adapters
export { BaseSqlAdapter, withAdapter, withTransaction } from './adapters/adapter.js';
export type { SqlAdapter } from './adapters/adapter.js';
export { GenericAdapter, looksLikeQuery } from './adapters/generic-adapter.js';
export type { Cursor, CursorConnection, GenericAdapterOptions } from './adapters/generic-adapter.js';
// PostgresAdapter and SqliteAdapter load their drivers, so they are exported
// from the 'sql-batcher/postgres' and 'sql-batcher/sqlite' entry points.

// Error class
export { SqlBatcherError, mapSqlError } from './errors.js';

// Types
export type {
  AdapterState,
  Batch,
  BatcherConfig,
  BatcherErrorCode,
  BatcherEvents,
  BatchMetadata,
  CollectedQuery,
  CollectorStats,
  ExecuteFn,
  IsolationLevel,
  QueryCollectorLike,
  ResolvedBatcherConfig,
  RetryConfig,
} from './types.js';
