/**
 * SQL Batcher Retry Wrapper — Exponential backoff around an execute function
 *
 * The batcher never retries on its own. Callers who want retries wrap the
 * execute function they hand to processStatements().
 */

import type { BatcherErrorCode, ExecuteFn, RetryConfig } from './types.js';
import type { BatcherEventEmitter } from './events.js';
import { SqlBatcherError } from './errors.js';

const DEFAULTS: Required<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
};

/**
 * Wrap execute so failures that normalize to a retryable SqlBatcherError
 * are retried with jittered exponential backoff. Anything else, and the
 * last failure, is rethrown as-is.
 */
export function withRetry(
  execute: ExecuteFn,
  config: RetryConfig = {},
  emitter?: BatcherEventEmitter,
): (sql: string) => Promise<unknown> {
  const resolved: Required<RetryConfig> = { ...DEFAULTS, ...config };

  return async (sql: string) => {
    let attempt = 0;
    for (;;) {
      attempt++;
      try {
        return await execute(sql);
      } catch (err) {
        const code = retryableCode(err);
        if (code === null || attempt >= resolved.maxAttempts) throw err;

        const delayMs = calculateDelay(resolved, attempt);
        emitter?.emit('retry', { attempt, maxAttempts: resolved.maxAttempts, delayMs, code });
        await sleep(delayMs);
      }
    }
  };
}

function retryableCode(err: unknown): BatcherErrorCode | null {
  return err instanceof SqlBatcherError && err.retryable ? err.code : null;
}

export function calculateDelay(config: Required<RetryConfig>, attempt: number): number {
  const baseDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  const capped = Math.min(baseDelay, config.maxDelayMs);
  // Add jitter (±25%)
  const jitter = capped * (0.75 + Math.random() * 0.5);
  return Math.round(jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, ms);
  });
}
