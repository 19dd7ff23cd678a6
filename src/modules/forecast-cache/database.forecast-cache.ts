/**
 * Database Forecast Cache
 * Production backend: text and audio live in one forecast record
 */

import { ForecastStore } from '../forecast/forecast.store';
import {
  AudioRef,
  CacheCleanupResult,
  CacheLookup,
  ForecastCache,
  ForecastCacheStats,
  StoreReceipt,
  readAudio,
} from './forecast-cache.types';

export class DatabaseForecastCache implements ForecastCache {
  readonly backend = 'database';

  constructor(private readonly forecasts: ForecastStore) {}

  async lookup(city: string): Promise<CacheLookup> {
    const current = await this.forecasts.getCurrent(city);
    if (!current.found) {
      return { cached: false };
    }
    return {
      cached: true,
      text: current.text,
      audio: { kind: 'bytes', data: current.audio },
      ageSeconds: current.ageSeconds,
      forecastAt: current.forecastAt,
    };
  }

  async store(city: string, text: string, audio: AudioRef, forecastAt: Date): Promise<StoreReceipt> {
    const result = await this.forecasts.upload({
      city,
      text,
      audio: await readAudio(audio),
      forecastAt,
    });
    return { backend: this.backend, id: result.id, expiresAt: result.expiresAt };
  }

  async stats(): Promise<ForecastCacheStats> {
    return { backend: this.backend, storage: await this.forecasts.stats() };
  }

  async cleanup(): Promise<CacheCleanupResult> {
    const { deletedCount, remainingCount } = await this.forecasts.cleanupExpired();
    return { removed: deletedCount, remaining: remainingCount };
  }
}
