/**
 * Forecast Cache Factory
 * Picks the cache backend from configuration
 */

import { Clock } from '../../lib/clock';
import { ForecastStore } from '../forecast/forecast.store';
import { DatabaseForecastCache } from './database.forecast-cache';
import { FileSystemForecastCache } from './filesystem.forecast-cache';
import { ForecastCache, ForecastCacheBackendName } from './forecast-cache.types';

export interface ForecastCacheConfig {
  backend: ForecastCacheBackendName;
  /** Required by the database backend */
  store?: ForecastStore;
  outputDir: string;
  ttlMinutes: number;
  clock?: Clock;
}

export function createForecastCache(config: ForecastCacheConfig): ForecastCache {
  switch (config.backend) {
    case 'database':
      if (!config.store) {
        throw new Error('The database forecast cache needs a ForecastStore');
      }
      return new DatabaseForecastCache(config.store);
    case 'filesystem':
      return new FileSystemForecastCache({
        outputDir: config.outputDir,
        ttlMinutes: config.ttlMinutes,
        clock: config.clock,
      });
  }
}
