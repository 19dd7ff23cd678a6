/**
 * Cache Types
 * Type definitions for the in-process TTL cache
 */

/**
 * Cache entry: the stored value and when it was written (epoch ms)
 */
export interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

/**
 * Millisecond clock, injectable for tests
 */
export type NowFn = () => number;

export interface TTLCacheOptions {
  now?: NowFn;
}

/**
 * Values allowed as arguments of a cached function. They serialize to the
 * same key every time, so equal calls share an entry.
 */
export type CacheKeyPart =
  | string
  | number
  | boolean
  | null
  | readonly CacheKeyPart[];

export interface CachedFunctionOptions {
  ttlSeconds?: number;
  /** Key namespace; defaults to the wrapped function's name */
  name?: string;
  now?: NowFn;
}
