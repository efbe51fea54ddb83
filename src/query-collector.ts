/**
 * SQL Batcher Query Collector — record batches instead of (or as well as) running them
 *
 * Append-only. No eviction, no deduplication, no reordering. Meant for dry
 * runs and tests, one collector per run.
 */

import type { BatchMetadata, CollectedQuery, CollectorStats, QueryCollectorLike } from './types.js';
import { byteLength } from './batcher.js';

export class QueryCollector implements QueryCollectorLike {
  private queries: CollectedQuery[] = [];

  collect(sql: string, metadata?: BatchMetadata): void {
    this.queries.push({
      sql,
      metadata,
      bytes: byteLength(sql),
      collectedAt: new Date(),
    });
  }

  /** Snapshot of every record in submission order. Does not clear. */
  getQueries(): readonly CollectedQuery[] {
    return Object.freeze([...this.queries]);
  }

  get size(): number {
    return this.queries.length;
  }

  clear(): void {
    this.queries = [];
  }

  /** Records whose metadata carries `key` with exactly `value`. */
  filter(key: string, value: unknown): CollectedQuery[] {
    return this.queries.filter(q => q.metadata !== undefined && q.metadata[key] === value);
  }

  getStats(groupBy?: string): CollectorStats {
    const stats: CollectorStats = { totalQueries: 0, totalBytes: 0, largestBytes: 0, groups: {} };
    // Map keys, so values such as "__proto__" count like any other
    const groups = new Map<string, number>();

    for (const query of this.queries) {
      stats.totalQueries++;
      stats.totalBytes += query.bytes;
      stats.largestBytes = Math.max(stats.largestBytes, query.bytes);

      if (groupBy !== undefined) {
        const value = query.metadata?.[groupBy];
        const group = value === undefined || value === null ? 'unknown' : String(value);
        groups.set(group, (groups.get(group) ?? 0) + 1);
      }
    }

    stats.groups = Object.fromEntries(groups);
    return stats;
  }
}
