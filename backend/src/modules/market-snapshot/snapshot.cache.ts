/**
 * Snapshot Cache
 * ==============
 *
 * In-memory TTL cache for reconciled snapshots.
 *
 * - lazy expiry: a stale entry is evicted by the lookup that finds it
 * - put() always overwrites with a fresh storedAt
 * - values are copied in and out; callers never hold cache storage
 */

import { MarketSnapshot, SnapshotCacheKey } from './snapshot.types.js';

export const DEFAULT_SNAPSHOT_TTL_MS = 8_000;

interface CacheEntry {
  value: MarketSnapshot;
  storedAt: number;
}

export interface SnapshotCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * The exchange label is used verbatim: "okx" and "OKX" are separate entries.
 */
export function snapshotCacheKey(key: SnapshotCacheKey): string {
  return JSON.stringify([key.exchange, key.instrumentId, key.timeframe]);
}

export class SnapshotCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SnapshotCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SNAPSHOT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get(key: SnapshotCacheKey): MarketSnapshot | null {
    const cacheKey = snapshotCacheKey(key);
    const entry = this.entries.get(cacheKey);
    if (!entry) return null;

    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(cacheKey);
      return null;
    }

    return { ...entry.value };
  }

  put(key: SnapshotCacheKey, snapshot: MarketSnapshot): void {
    this.entries.set(snapshotCacheKey(key), {
      value: { ...snapshot },
      storedAt: this.now(),
    });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
