/**
 * Cached Weather Provider
 * Serves repeated lookups for a city from an in-process TTL cache.
 * Failed lookups are not cached.
 */

import { env } from '../../config/env';
import { CachedFunction, cachedWithTtl } from '../../lib/cache';
import { NowFn } from '../../lib/cache/cache.types';
import { WeatherProvider, WeatherSummary } from './weather.types';

export interface CachedWeatherProviderOptions {
  ttlSeconds?: number;
  now?: NowFn;
}

export class CachedWeatherProvider implements WeatherProvider {
  private readonly lookup: CachedFunction<[string], WeatherSummary>;
  private readonly ttlSeconds: number;

  constructor(private readonly provider: WeatherProvider, options: CachedWeatherProviderOptions = {}) {
    this.ttlSeconds = options.ttlSeconds ?? env.WEATHER_CACHE_TTL_SECONDS;
    this.lookup = cachedWithTtl((city: string) => this.provider.fetchCurrent(city), {
      ttlSeconds: this.ttlSeconds,
      name: 'weather.fetchCurrent',
      now: options.now,
    });
  }

  async fetchCurrent(city: string): Promise<WeatherSummary> {
    return this.lookup(city.trim().toLowerCase());
  }

  /**
   * Drop entries past the TTL; returns how many were removed
   */
  sweep(): number {
    return this.lookup.cache.sweep(this.ttlSeconds);
  }

  clear(): void {
    this.lookup.clear();
  }

  size(): number {
    return this.lookup.size();
  }
}
