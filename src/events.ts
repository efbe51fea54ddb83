/**
 * Batcher events — EventEmitter narrowed to the BatcherEvents payload map
 *
 * The logger and withRetry() publish here; callers subscribe through
 * SqlBatcher.on() or by passing their own emitter.
 */

import { EventEmitter } from 'events';
import type { BatcherEvents } from './types.js';

export class BatcherEventEmitter extends EventEmitter {
  on<E extends keyof BatcherEvents>(
    event: E,
    listener: (payload: BatcherEvents[E]) => void,
  ): this {
    return super.on(event, listener);
  }

  once<E extends keyof BatcherEvents>(
    event: E,
    listener: (payload: BatcherEvents[E]) => void,
  ): this {
    return super.once(event, listener);
  }

  emit<E extends keyof BatcherEvents>(
    event: E,
    payload: BatcherEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof BatcherEvents>(
    event: E,
    listener: (payload: BatcherEvents[E]) => void,
  ): this {
    return super.off(event, listener);
  }
}
