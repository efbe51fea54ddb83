/**
 * SQL Batcher — size- and count-bounded statement batching
 *
 * Packs statements greedily, in input order, into delimiter-joined batches
 * and delivers each one to an execute function and/or a collector:
 *
 *   statements → packBatches (pure)
 *     → execute(batch.sql)            unless dryRun
 *     → collector.collect(sql, meta)  when a collector is given
 *     → logger (emit event)
 *
 * A single statement larger than maxBytes is never split or dropped; it
 * becomes its own oversized batch. Errors from execute or collect stop the
 * run immediately and propagate unchanged. Batches already executed stay
 * applied unless the caller wrapped the run in a transaction.
 */

import type {
  Batch,
  BatcherConfig,
  BatcherEvents,
  BatchMetadata,
  ExecuteFn,
  QueryCollectorLike,
  ResolvedBatcherConfig,
} from './types.js';
import { resolveConfig } from './config.js';
import { configurationError } from './errors.js';
import { BatcherEventEmitter } from './events.js';
import { BatcherLogger } from './logger.js';
import type { SqlAdapter } from './adapters/adapter.js';
import { withTransaction } from './adapters/adapter.js';

export interface ProcessWithAdapterOptions {
  collector?: QueryCollectorLike;
  metadata?: BatchMetadata;
  /** Wrap the whole run in one adapter transaction. Ignored under dryRun. */
  transaction?: boolean;
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

export class SqlBatcher {
  readonly config: ResolvedBatcherConfig;
  private emitter: BatcherEventEmitter;
  private logger: BatcherLogger;
  private sizeOf: (text: string) => number;
  private delimiterBytes: number;

  constructor(config: BatcherConfig = {}, emitter: BatcherEventEmitter = new BatcherEventEmitter()) {
    this.config = resolveConfig(config);
    this.emitter = emitter;
    this.logger = new BatcherLogger(
      { enabled: this.config.logging, slowBatchMs: this.config.slowBatchMs },
      emitter,
    );
    this.sizeOf = this.config.sizeOf ?? byteLength;
    this.delimiterBytes = this.measure(this.config.delimiter);
  }

  /**
   * Batcher sized for an adapter: maxBytes defaults to the adapter's
   * advertised maximum query size. An explicit maxBytes wins.
   */
  static forAdapter(adapter: SqlAdapter, config: BatcherConfig = {}, emitter?: BatcherEventEmitter): SqlBatcher {
    return new SqlBatcher({ ...config, maxBytes: config.maxBytes ?? adapter.getMaxQuerySize() }, emitter);
  }

  on<E extends keyof BatcherEvents>(event: E, listener: (payload: BatcherEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<E extends keyof BatcherEvents>(event: E, listener: (payload: BatcherEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Pack statements into batches without running anything.
   */
  planBatches(statements: Iterable<string>, metadata?: BatchMetadata): Batch[] {
    return [...this.packBatches(statements, metadata)];
  }

  /**
   * Batch and deliver statements. Returns how many statements were placed
   * into delivered batches, which for a completed run is all of them.
   */
  async processStatements(
    statements: Iterable<string>,
    execute: ExecuteFn,
    collector?: QueryCollectorLike,
    metadata?: BatchMetadata,
  ): Promise<number> {
    let processed = 0;
    for (const batch of this.packBatches(statements, metadata)) {
      await this.deliver(batch, execute, collector);
      processed += batch.statementCount;
    }
    return processed;
  }

  /**
   * Batch and deliver statements to an adapter's execute(). The adapter is
   * borrowed, never closed.
   */
  async processWithAdapter(
    statements: Iterable<string>,
    adapter: SqlAdapter,
    options: ProcessWithAdapterOptions = {},
  ): Promise<number> {
    const run = () => this.processStatements(
      statements,
      sql => adapter.execute(sql),
      options.collector,
      options.metadata,
    );

    if (options.transaction && !this.config.dryRun) {
      return withTransaction(adapter, run);
    }
    return run();
  }

  // ─── Packing ──────────────────────────────────────────────────────

  private *packBatches(statements: Iterable<string>, metadata?: BatchMetadata): Generator<Batch> {
    let pending: string[] = [];
    let pendingBytes = 0;
    let index = 0;

    for (const statement of statements) {
      const size = this.measure(statement);

      if (pending.length > 0 && this.wouldOverflow(pending.length + 1, pendingBytes + this.delimiterBytes + size)) {
        yield this.buildBatch(index++, pending, pendingBytes, metadata);
        pending = [];
        pendingBytes = 0;
      }

      pendingBytes = pending.length === 0 ? size : pendingBytes + this.delimiterBytes + size;
      pending.push(statement);
    }

    if (pending.length > 0) {
      yield this.buildBatch(index, pending, pendingBytes, metadata);
    }
  }

  private measure(text: string): number {
    const size = this.sizeOf(text);
    if (!Number.isFinite(size) || size < 0) {
      throw configurationError('sizeOf', `returned ${size}; sizes must be finite and non-negative`);
    }
    return size;
  }

  private wouldOverflow(count: number, bytes: number): boolean {
    const { maxBytes, maxStatements } = this.config;
    if (maxBytes > 0 && bytes > maxBytes) return true;
    return maxStatements !== undefined && count > maxStatements;
  }

  private buildBatch(index: number, statements: string[], bytes: number, metadata?: BatchMetadata): Batch {
    const { maxBytes, delimiter } = this.config;
    return {
      index,
      sql: statements.join(delimiter),
      statements,
      bytes,
      statementCount: statements.length,
      oversized: statements.length === 1 && maxBytes > 0 && bytes > maxBytes,
      metadata,
    };
  }

  // ─── Delivery ─────────────────────────────────────────────────────

  private async deliver(batch: Batch, execute: ExecuteFn, collector?: QueryCollectorLike): Promise<void> {
    const startTime = Date.now();
    if (batch.oversized) {
      this.logger.logOversized(batch, this.config.maxBytes);
    }

    try {
      if (!this.config.dryRun) {
        await execute(batch.sql);
      }
      if (collector) {
        await collector.collect(batch.sql, batch.metadata);
      }
    } catch (err) {
      this.logger.logFailure(batch, err);
      throw err;
    }

    this.logger.logBatch(batch, Date.now() - startTime, this.config.dryRun);
  }
}
