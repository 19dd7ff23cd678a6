export * from './forecast-cache.types';
export { DatabaseForecastCache } from './database.forecast-cache';
export { FileSystemForecastCache, PAIRING_WINDOW_MS } from './filesystem.forecast-cache';
export { createForecastCache } from './forecast-cache.factory';
export type { ForecastCacheConfig } from './forecast-cache.factory';
export { purgeStaleFiles } from './file-cleanup';
export type { PurgeOptions, PurgeResult } from './file-cleanup';
