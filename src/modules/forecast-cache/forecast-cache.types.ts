/**
 * Forecast Cache Types
 * The "is there a fresh forecast for this city" contract shared by the
 * database and filesystem backends
 */

import * as fs from 'fs/promises';
import { StorageStats } from '../forecast/forecast.types';

export type ForecastCacheBackendName = 'database' | 'filesystem';

/**
 * Handle on an audio payload: bytes in memory or a file on disk
 */
export type AudioRef =
  | { kind: 'bytes'; data: Buffer }
  | { kind: 'file'; path: string };

export type CacheLookup =
  | { cached: false }
  | {
      cached: true;
      text: string;
      audio: AudioRef;
      ageSeconds: number;
      forecastAt: Date;
    };

export interface StoreReceipt {
  backend: ForecastCacheBackendName;
  /** Database record id */
  id?: string;
  textPath?: string;
  audioPath?: string;
  expiresAt: Date;
}

export type ForecastCacheStats =
  | { backend: 'database'; storage: StorageStats }
  | {
      backend: 'filesystem';
      totalCities: number;
      citiesWithValidCache: number;
      cachedCities: string[];
      ttlSeconds: number;
    };

export interface CacheCleanupResult {
  removed: number;
  remaining: number;
}

export interface ForecastCache {
  readonly backend: ForecastCacheBackendName;

  lookup(city: string): Promise<CacheLookup>;
  store(city: string, text: string, audio: AudioRef, forecastAt: Date): Promise<StoreReceipt>;
  stats(): Promise<ForecastCacheStats>;
  cleanup(): Promise<CacheCleanupResult>;
}

export async function readAudio(ref: AudioRef): Promise<Buffer> {
  return ref.kind === 'bytes' ? ref.data : fs.readFile(ref.path);
}
