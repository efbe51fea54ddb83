/**
 * SQL Batcher — All shared types and interfaces
 *
 * Every other module imports its types from here.
 * This file imports nothing.
 */

// ─── Statements & Batches ────────────────────────────────────────────────────

/** Opaque caller-supplied key/value mapping, attached verbatim to every batch. */
export type BatchMetadata = Readonly<Record<string, unknown>>;

/** Runs one complete batch text. May be sync or async; the result is ignored. */
export type ExecuteFn = (sql: string) => unknown;

export interface Batch {
  /** Zero-based position of the batch within one run. */
  index: number;
  sql: string;
  statements: readonly string[];
  /** Size of `sql` as measured by `sizeOf`, UTF-8 bytes by default. */
  bytes: number;
  statementCount: number;
  /** A single statement that alone exceeds `maxBytes`. */
  oversized: boolean;
  metadata?: BatchMetadata;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface BatcherConfig {
  /** Maximum serialized batch size in bytes. 0 means unbounded. */
  maxBytes?: number;
  /** Maximum number of statements per batch. Unset means unbounded. */
  maxStatements?: number;
  /** Produce and collect batches without ever calling `execute`. */
  dryRun?: boolean;
  /** Statement separator. Default `;`. */
  delimiter?: string;
  /** Emit batch events. Default true. */
  logging?: boolean;
  /** Batches taking at least this long emit `slow-batch`. Default 1000. */
  slowBatchMs?: number;
  /** Measures statements and the delimiter against `maxBytes`. Default: UTF-8 byte length. */
  sizeOf?: (text: string) => number;
}

export interface ResolvedBatcherConfig {
  readonly maxBytes: number;
  readonly maxStatements?: number;
  readonly dryRun: boolean;
  readonly delimiter: string;
  readonly logging: boolean;
  readonly slowBatchMs: number;
  readonly sizeOf?: (text: string) => number;
}

export interface RetryConfig {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

// ─── Collector ───────────────────────────────────────────────────────────────

export interface CollectedQuery {
  sql: string;
  metadata?: BatchMetadata;
  bytes: number;
  collectedAt: Date;
}

export interface CollectorStats {
  totalQueries: number;
  totalBytes: number;
  largestBytes: number;
  /** Record counts per value of the `groupBy` metadata key. Empty without one. */
  groups: Record<string, number>;
}

/** Anything the batcher can hand batches to. */
export interface QueryCollectorLike {
  collect(sql: string, metadata?: BatchMetadata): unknown;
}

// ─── Adapters ────────────────────────────────────────────────────────────────

export type AdapterState = 'open' | 'transaction' | 'closed';

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type BatcherErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'EXECUTION_ERROR'
  | 'CONNECTION_CLOSED'
  | 'TRANSACTION_STATE'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'SYNTAX_ERROR'
  | 'SERIALIZATION_FAILURE';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface BatcherEvents {
  batch: {
    index: number;
    statementCount: number;
    bytes: number;
    durationMs: number;
    dryRun: boolean;
    oversized: boolean;
    metadata?: BatchMetadata;
  };
  'slow-batch': { index: number; durationMs: number; threshold: number };
  'oversized-statement': { index: number; bytes: number; maxBytes: number };
  retry: { attempt: number; maxAttempts: number; delayMs: number; code: BatcherErrorCode };
  error: { index: number; code: BatcherErrorCode; message: string; fix: string };
}
