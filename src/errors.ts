/**
 * SQL Batcher Error System — Normalized errors with fix instructions
 *
 * Driver errors raised while executing a batch are normalized into
 * SqlBatcherError instances. The batcher itself never wraps errors coming
 * out of a caller's execute function; adapters do.
 */

import type { AdapterState, BatcherErrorCode } from './types.js';

// ─── SqlBatcherError ─────────────────────────────────────────────────────────

export class SqlBatcherError extends Error {
  readonly code: BatcherErrorCode;
  readonly adapter?: string;
  readonly operation?: string;
  readonly originalError: unknown;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: BatcherErrorCode;
    message: string;
    fix: string;
    adapter?: string;
    operation?: string;
    originalError?: unknown;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'SqlBatcherError';
    this.code = opts.code;
    this.adapter = opts.adapter;
    this.operation = opts.operation;
    this.originalError = opts.originalError;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<BatcherErrorCode, boolean> = {
  CONFIGURATION_ERROR: false,
  EXECUTION_ERROR: false,
  CONNECTION_CLOSED: false,
  TRANSACTION_STATE: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  SYNTAX_ERROR: false,
  SERIALIZATION_FAILURE: true,
};

// ─── Construction Helpers ────────────────────────────────────────────────────

export function configurationError(field: string, detail: string): SqlBatcherError {
  return new SqlBatcherError({
    code: 'CONFIGURATION_ERROR',
    message: `Invalid batcher configuration for "${field}": ${detail}.`,
    fix: `Pass a valid "${field}". maxBytes and slowBatchMs must be non-negative integers, maxStatements a positive integer, delimiter a non-empty string, sizeOf a function returning a non-negative size.`,
  });
}

export function connectionClosedError(adapter: string, operation: string): SqlBatcherError {
  return new SqlBatcherError({
    code: 'CONNECTION_CLOSED',
    message: `Cannot call ${operation}() on the ${adapter} adapter after close().`,
    fix: `Create a new adapter. A closed adapter cannot be reopened.`,
    adapter,
    operation,
  });
}

export function transactionStateError(
  adapter: string,
  operation: string,
  state: AdapterState,
): SqlBatcherError {
  const fix = state === 'transaction'
    ? `Commit or roll back the active transaction before starting another. Nested transactions are not supported.`
    : `Call beginTransaction() first.`;

  return new SqlBatcherError({
    code: 'TRANSACTION_STATE',
    message: `Cannot call ${operation}() on the ${adapter} adapter while in state "${state}".`,
    fix,
    adapter,
    operation,
  });
}

// ─── Driver Error Mapping ────────────────────────────────────────────────────

export function mapSqlError(err: unknown, adapter: string, operation = 'execute'): SqlBatcherError {
  if (err instanceof SqlBatcherError) return err;

  const code = errorCode(err);
  const message = errorMessage(err);

  // Node socket errors
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'ECONNRESET' || message.includes('ECONNREFUSED')) {
    return new SqlBatcherError({
      code: 'CONNECTION_FAILED',
      message: `Cannot reach the ${adapter} backend.`,
      fix: `Verify the connection settings and that the database server is running.`,
      adapter,
      operation,
      originalError: err,
    });
  }

  // PostgreSQL 57014 query_canceled, SQLite busy/locked
  if (
    code === '57014'
    || code === 'ETIMEDOUT'
    || code === 'SQLITE_BUSY'
    || code === 'SQLITE_LOCKED'
    || message.includes('canceling statement due to statement timeout')
  ) {
    return new SqlBatcherError({
      code: 'TIMEOUT',
      message: `${adapter} batch timed out or the database was busy: ${message}`,
      fix: `Lower maxBytes or maxStatements so each batch finishes sooner, or raise the backend timeout.`,
      adapter,
      operation,
      originalError: err,
    });
  }

  // PostgreSQL 28P01 invalid_password, 28000 invalid_authorization_specification
  if (code === '28P01' || code === '28000' || message.includes('password authentication failed')) {
    return new SqlBatcherError({
      code: 'AUTHENTICATION_FAILED',
      message: `${adapter} authentication failed.`,
      fix: `Check the username and password used to open the connection.`,
      adapter,
      operation,
      originalError: err,
    });
  }

  // PostgreSQL 40001 serialization_failure, 40P01 deadlock_detected
  if (code === '40001' || code === '40P01') {
    return new SqlBatcherError({
      code: 'SERIALIZATION_FAILURE',
      message: `${adapter} aborted the batch on a serialization conflict: ${message}`,
      fix: `Retry the batch. Wrap execute with withRetry() to do it automatically.`,
      adapter,
      operation,
      originalError: err,
    });
  }

  // PostgreSQL 42601 syntax_error, SQLite "near ...: syntax error"
  if (code === '42601' || message.includes('syntax error')) {
    return new SqlBatcherError({
      code: 'SYNTAX_ERROR',
      message: `${adapter} rejected the batch as malformed SQL: ${message}`,
      fix: `Check each statement and the delimiter. The batcher joins statements verbatim and does not validate SQL.`,
      adapter,
      operation,
      originalError: err,
    });
  }

  // Fallback
  return new SqlBatcherError({
    code: 'EXECUTION_ERROR',
    message: `${adapter} error during ${operation}: ${message}`,
    fix: `Check the original error for details.`,
    adapter,
    operation,
    originalError: err,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

function errorCode(err: unknown): string {
  if (typeof err !== 'object' || err === null || !('code' in err)) return '';
  const { code } = err;
  return typeof code === 'string' || typeof code === 'number' ? String(code) : '';
}
