/**
 * Forecast Module Types
 * Record shapes for the forecast store and its repositories
 */

import { TextEncoding } from '../../lib/encoding/encoding.types';

export const AUDIO_FORMAT = 'wav';
export const MAX_CITY_LENGTH = 100;
export const MAX_LANGUAGE_LENGTH = 10;
export const MAX_LOCALE_LENGTH = 20;
export const DEFAULT_LIST_LIMIT = 10;
export const MAX_LIST_LIMIT = 100;

// ============================================================================
// Repository rows
// ============================================================================

export interface ForecastMetadata {
  ttlMinutes: number;
  characterCount: number;
  encodingUsed: TextEncoding;
}

export interface NewForecastRecord {
  city: string;
  forecastAt: Date;
  expiresAt: Date;
  textBytes: Buffer;
  audioBytes: Buffer;
  textSizeBytes: number;
  audioSizeBytes: number;
  textEncoding: TextEncoding;
  textLanguage: string | null;
  textLocale: string | null;
  audioFormat: typeof AUDIO_FORMAT;
  audioLanguage: string | null;
  metadata: ForecastMetadata;
}

export interface InsertedForecast {
  id: string;
  createdAt: Date;
}

/**
 * Summary columns of a stored forecast (no payloads)
 */
export interface StoredForecastSummary {
  id: string;
  city: string;
  forecastAt: Date;
  expiresAt: Date;
  textSizeBytes: number;
  audioSizeBytes: number | null;
  // Read back as stored; decoding validates it
  textEncoding: string;
  textLanguage: string | null;
  textLocale: string | null;
  createdAt: Date;
}

export interface StoredForecast extends StoredForecastSummary {
  textBytes: Buffer;
  audioBytes: Buffer | null;
  metadata: Record<string, unknown> | null;
}

export interface CleanupCounts {
  deletedCount: number;
  remainingCount: number;
}

export interface CityStatistics {
  city: string;
  forecastCount: number;
  totalTextBytes: number;
  totalAudioBytes: number;
  latestForecast: Date | null;
}

/**
 * Aggregates over forecasts valid at the time of the query
 */
export interface StorageStats {
  totalForecasts: number;
  totalTextBytes: number;
  totalAudioBytes: number;
  encodingsUsed: Record<string, number>;
  languagesUsed: Record<string, number>;
  cityBreakdown: CityStatistics[];
}

export interface ConnectionProbe {
  version: string;
  databaseName: string;
  schemaReady: boolean;
}

export interface RepositoryContext {
  signal?: AbortSignal;
  timeoutMs?: number;
}

// ============================================================================
// Store operations
// ============================================================================

export interface OperationOptions {
  /** Deadline for the whole operation; defaults to the store's configured timeout */
  timeoutMs?: number;
}

export interface UploadForecastInput {
  city: string;
  text: string;
  audio: Buffer;
  /** Date or ISO 8601 string; a string without an offset is read as UTC */
  forecastAt: Date | string;
  ttlMinutes?: number;
  encoding?: string;
  language?: string | null;
  locale?: string | null;
}

export interface ForecastSizes {
  text: number;
  audio: number;
}

export interface UploadResult {
  id: string;
  createdAt: Date;
  expiresAt: Date;
  encodingUsed: TextEncoding;
  language: string | null;
  locale: string | null;
  sizes: ForecastSizes & { total: number };
}

export interface CurrentForecast {
  found: true;
  id: string;
  city: string;
  text: string;
  audio: Buffer;
  forecastAt: Date;
  expiresAt: Date;
  ageSeconds: number;
  encoding: string;
  language: string | null;
  locale: string | null;
  sizes: ForecastSizes;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}

export type CurrentForecastResult = CurrentForecast | { found: false };

export interface ForecastSummary {
  id: string;
  city: string;
  forecastAt: Date;
  expiresAt: Date;
  expired: boolean;
  sizes: ForecastSizes;
  encoding: string;
  language: string | null;
  locale: string | null;
  createdAt: Date;
}

export interface ListForecastsQuery {
  city?: string;
  limit?: number;
}

export interface ConnectionStatus {
  connected: boolean;
  instanceId: string;
  databaseName: string;
  version: string | null;
  schemaReady: boolean;
  error?: string;
}
