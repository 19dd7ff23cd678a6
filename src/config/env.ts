import dotenv from 'dotenv';
import { TextEncoding, isSupportedEncoding } from '../lib/encoding/encoding.types';

dotenv.config();

export type StoreDriver = 'postgres' | 'memory';
export type ForecastCacheBackend = 'database' | 'filesystem';
export type DefaultEncodingSetting = TextEncoding | 'auto';

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value.toLowerCase() === 'true';
};

const parseChoice = <T extends string>(
  name: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T
): T => {
  if (value === undefined || value === '') {
    return fallback;
  }
  const match = choices.find((choice) => choice === value.toLowerCase());
  if (!match) {
    throw new Error(`Invalid ${name}: "${value}". Expected one of: ${choices.join(', ')}`);
  }
  return match;
};

const parseDefaultEncoding = (value: string | undefined): DefaultEncodingSetting => {
  if (value === undefined || value === '' || value.toLowerCase() === 'auto') {
    return 'auto';
  }
  const normalized = value.toLowerCase();
  if (!isSupportedEncoding(normalized)) {
    throw new Error(`Invalid FORECAST_DEFAULT_ENCODING: "${value}". Expected auto, utf-8, utf-16 or utf-32`);
  }
  return normalized;
};

const DB_HOST = process.env.DB_HOST || 'localhost';
const DB_PORT = parseInt(process.env.DB_PORT || '5432', 10);

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',
  API_VERSION: process.env.API_VERSION || '1.0.0',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || '*',

  // Backing store (PostgreSQL)
  DB_HOST,
  DB_PORT,
  DB_NAME: process.env.DB_NAME || 'weather',
  DB_USER: process.env.DB_USER || 'postgres',
  DB_PASSWORD: process.env.DB_PASSWORD,
  DB_SSL: parseBoolean(process.env.DB_SSL, false),
  DB_POOL_MAX: parseInt(process.env.DB_POOL_MAX || '10', 10),
  DB_INSTANCE_ID: process.env.DB_INSTANCE_ID || `${DB_HOST}:${DB_PORT}`,
  DB_AUTO_MIGRATE: parseBoolean(process.env.DB_AUTO_MIGRATE, true),
  FORECAST_STORE_DRIVER: parseChoice<StoreDriver>(
    'FORECAST_STORE_DRIVER',
    process.env.FORECAST_STORE_DRIVER,
    ['postgres', 'memory'],
    'postgres'
  ),

  // Store behaviour
  STORE_OPERATION_TIMEOUT_MS: parseInt(process.env.STORE_OPERATION_TIMEOUT_MS || '5000', 10),
  FORECAST_TTL_MINUTES: parseInt(process.env.FORECAST_TTL_MINUTES || '30', 10),
  FORECAST_DEFAULT_ENCODING: parseDefaultEncoding(process.env.FORECAST_DEFAULT_ENCODING),

  // Forecast cache facade
  FORECAST_CACHE_BACKEND: parseChoice<ForecastCacheBackend>(
    'FORECAST_CACHE_BACKEND',
    process.env.FORECAST_CACHE_BACKEND,
    ['database', 'filesystem'],
    'database'
  ),
  FORECAST_OUTPUT_DIR: process.env.FORECAST_OUTPUT_DIR || 'output',

  // Maintenance
  FORECAST_CLEANUP_ENABLED: parseBoolean(process.env.FORECAST_CLEANUP_ENABLED, true),
  FORECAST_CLEANUP_INTERVAL_MS: parseInt(process.env.FORECAST_CLEANUP_INTERVAL_MS || '600000', 10), // 10 minutes
  FORECAST_FILE_RETENTION_DAYS: parseInt(process.env.FORECAST_FILE_RETENTION_DAYS || '7', 10),

  // Weather lookup acceleration
  WEATHER_CACHE_TTL_SECONDS: parseInt(process.env.WEATHER_CACHE_TTL_SECONDS || '900', 10), // 15 minutes
} as const;

export default env;
