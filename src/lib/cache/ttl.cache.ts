/**
 * TTL Cache
 * Key-to-value store where the time-to-live is supplied on each read,
 * so one entry can be checked against different freshness windows.
 *
 * There is no size bound; entries leave on a stale read, `sweep`, `delete`
 * or `clear`. All methods are synchronous, so concurrent callers on the
 * event loop never observe a half-updated map.
 */

import { CacheEntry, NowFn, TTLCacheOptions } from './cache.types';

export class TTLCache<K, V> {
  private cache: Map<K, CacheEntry<V>>;
  private now: NowFn;

  constructor(options: TTLCacheOptions = {}) {
    this.cache = new Map();
    this.now = options.now ?? Date.now;
  }

  /**
   * Get value if it was stored less than `ttlSeconds` ago; stale entries are evicted
   */
  get(key: K, ttlSeconds: number): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.storedAt < ttlSeconds * 1000) {
      return entry.value;
    }

    this.cache.delete(key);
    return undefined;
  }

  /**
   * Store value with the current timestamp, replacing any previous entry
   */
  set(key: K, value: V): void {
    this.cache.set(key, { value, storedAt: this.now() });
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Number of stored entries, including stale ones not yet swept
   */
  size(): number {
    return this.cache.size;
  }

  /**
   * Remove every entry stored `ttlSeconds` ago or earlier
   */
  sweep(ttlSeconds: number): number {
    const now = this.now();
    let evicted = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now - entry.storedAt >= ttlSeconds * 1000) {
        this.cache.delete(key);
        evicted++;
      }
    }

    return evicted;
  }
}
