/**
 * Cached Function
 * Wraps an async function so repeated calls with the same arguments are
 * served from a TTLCache until the TTL elapses.
 */

import { TTLCache } from './ttl.cache';
import { CacheKeyPart, CachedFunctionOptions } from './cache.types';

export const DEFAULT_FUNCTION_TTL_SECONDS = 900; // 15 minutes

export interface CachedFunction<A extends CacheKeyPart[], R> {
  (...args: A): Promise<R>;
  readonly cache: TTLCache<string, R>;
  clear(): void;
  size(): number;
}

/**
 * Deterministic key for a call: `<name>:<JSON of the argument list>`
 */
export function deriveCacheKey(name: string, args: readonly CacheKeyPart[]): string {
  return `${name}:${JSON.stringify(args)}`;
}

export function cachedWithTtl<A extends CacheKeyPart[], R>(
  fn: (...args: A) => Promise<R>,
  options: CachedFunctionOptions = {}
): CachedFunction<A, R> {
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_FUNCTION_TTL_SECONDS;
  const name = options.name || fn.name || 'anonymous';
  const cache = new TTLCache<string, R>({ now: options.now });

  const wrapper = async (...args: A): Promise<R> => {
    const key = deriveCacheKey(name, args);

    const cached = cache.get(key, ttlSeconds);
    if (cached !== undefined) {
      return cached;
    }

    const result = await fn(...args);
    cache.set(key, result);
    return result;
  };

  return Object.assign(wrapper, {
    cache,
    clear: () => cache.clear(),
    size: () => cache.size(),
  });
}
