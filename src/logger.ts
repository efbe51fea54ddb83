/**
 * SQL Batcher Logger — Structured batch logging
 *
 * Emits one event per delivered batch, with timing and size.
 */

import type { Batch } from './types.js';
import type { BatcherEventEmitter } from './events.js';
import { SqlBatcherError, errorMessage } from './errors.js';

export interface LoggerConfig {
  enabled: boolean;
  slowBatchMs: number;
}

export class BatcherLogger {
  private config: LoggerConfig;
  private emitter: BatcherEventEmitter;

  constructor(config: LoggerConfig, emitter: BatcherEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a delivered batch.
   */
  logBatch(batch: Batch, durationMs: number, dryRun: boolean): void {
    if (!this.config.enabled) return;

    this.emitter.emit('batch', {
      index: batch.index,
      statementCount: batch.statementCount,
      bytes: batch.bytes,
      durationMs,
      dryRun,
      oversized: batch.oversized,
      metadata: batch.metadata,
    });

    if (durationMs >= this.config.slowBatchMs) {
      this.emitter.emit('slow-batch', {
        index: batch.index,
        durationMs,
        threshold: this.config.slowBatchMs,
      });
    }
  }

  logOversized(batch: Batch, maxBytes: number): void {
    if (!this.config.enabled) return;
    this.emitter.emit('oversized-statement', { index: batch.index, bytes: batch.bytes, maxBytes });
  }

  /**
   * Report a failed batch. 'error' is only emitted when someone listens,
   * since an unhandled 'error' event would throw from emit().
   */
  logFailure(batch: Batch, err: unknown): void {
    if (this.emitter.listenerCount('error') === 0) return;

    if (err instanceof SqlBatcherError) {
      this.emitter.emit('error', { index: batch.index, code: err.code, message: err.message, fix: err.fix });
      return;
    }

    this.emitter.emit('error', {
      index: batch.index,
      code: 'EXECUTION_ERROR',
      message: errorMessage(err),
      fix: 'Check the execute function passed to processStatements().',
    });
  }
}
