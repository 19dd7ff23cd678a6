/**
 * Forecast Store
 * Writes and reads forecast records through a repository. Text is encoded on
 * the way in and decoded on the way out; every operation runs under a
 * deadline and reads "now" once from the injected clock.
 */

import { Clock, systemClock } from '../../lib/clock';
import { countCharacters, decodeText, detectDefaultEncoding, encodeText } from '../../lib/encoding/text.codec';
import { TextEncoding } from '../../lib/encoding/encoding.types';
import { DecodingError, EncodingError } from '../../lib/encoding/encoding.errors';
import {
  CorruptForecastError,
  ForecastStoreError,
  InvalidForecastError,
  StoreUnavailableError,
  TimestampError,
  describeError,
} from '../../lib/errors/store.errors';
import { ForecastRepository } from './forecast.repository';
import {
  AUDIO_FORMAT,
  ConnectionStatus,
  CurrentForecastResult,
  DEFAULT_LIST_LIMIT,
  ForecastSummary,
  ListForecastsQuery,
  MAX_CITY_LENGTH,
  MAX_LANGUAGE_LENGTH,
  MAX_LIST_LIMIT,
  MAX_LOCALE_LENGTH,
  OperationOptions,
  RepositoryContext,
  StorageStats,
  CleanupCounts,
  UploadForecastInput,
  UploadResult,
} from './forecast.types';

export interface ForecastStoreOptions {
  clock?: Clock;
  defaultTtlMinutes?: number;
  /** 'auto' picks an encoding from the text's script mix */
  defaultEncoding?: TextEncoding | 'auto';
  operationTimeoutMs?: number;
}

const DEFAULT_TTL_MINUTES = 30;
const DEFAULT_OPERATION_TIMEOUT_MS = 5000;

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/i;

/**
 * Lower-cased, trimmed city key
 */
export function normalizeCity(city: string): string {
  const normalized = city.trim().toLowerCase();
  if (!normalized) {
    throw new InvalidForecastError('City is required');
  }
  if (normalized.length > MAX_CITY_LENGTH) {
    throw new InvalidForecastError(`City must be at most ${MAX_CITY_LENGTH} characters`);
  }
  return normalized;
}

/**
 * Accepts a Date or an ISO 8601 string. Date-times without an offset are UTC.
 */
export function parseForecastAt(value: Date | string): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new TimestampError('forecastAt is an invalid date');
    }
    return new Date(value);
  }

  const trimmed = value.trim();
  const match = ISO_TIMESTAMP.exec(trimmed);
  if (!match) {
    throw new TimestampError(`forecastAt is not an ISO 8601 timestamp: "${value}"`);
  }

  const hasTime = trimmed.length > 10;
  const hasZone = match[1] !== undefined;
  const parsed = new Date(hasTime && !hasZone ? `${trimmed.replace(' ', 'T')}Z` : trimmed.replace(' ', 'T'));
  if (Number.isNaN(parsed.getTime())) {
    throw new TimestampError(`forecastAt is not a valid timestamp: "${value}"`);
  }
  return parsed;
}

function optionalTag(value: string | null | undefined, label: string, maxLength: number): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  if (trimmed.length > maxLength) {
    throw new InvalidForecastError(`${label} must be at most ${maxLength} characters`);
  }
  return trimmed;
}

export class ForecastStore {
  private readonly clock: Clock;
  private readonly defaultTtlMinutes: number;
  private readonly defaultEncoding: TextEncoding | 'auto';
  private readonly operationTimeoutMs: number;

  constructor(
    private readonly repository: ForecastRepository,
    options: ForecastStoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.defaultTtlMinutes = options.defaultTtlMinutes ?? DEFAULT_TTL_MINUTES;
    this.defaultEncoding = options.defaultEncoding ?? 'auto';
    this.operationTimeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
  }

  get ttlMinutes(): number {
    return this.defaultTtlMinutes;
  }

  /**
   * Encode and persist a new forecast. Nothing is written when validation
   * or encoding fails.
   */
  async upload(input: UploadForecastInput, options: OperationOptions = {}): Promise<UploadResult> {
    const city = normalizeCity(input.city);
    const forecastAt = parseForecastAt(input.forecastAt);

    const ttlMinutes = input.ttlMinutes ?? this.defaultTtlMinutes;
    if (!Number.isFinite(ttlMinutes) || ttlMinutes <= 0) {
      throw new InvalidForecastError('ttlMinutes must be a positive number');
    }
    if (!Buffer.isBuffer(input.audio)) {
      throw new InvalidForecastError('audio must be binary data');
    }

    const language = optionalTag(input.language, 'language', MAX_LANGUAGE_LENGTH);
    const locale = optionalTag(input.locale, 'locale', MAX_LOCALE_LENGTH);
    const requestedEncoding = input.encoding?.trim().toLowerCase();
    const encoded = encodeText(input.text, requestedEncoding || this.resolveDefaultEncoding(input.text));
    const expiresAt = new Date(forecastAt.getTime() + ttlMinutes * 60_000);
    if (expiresAt.getTime() <= forecastAt.getTime()) {
      throw new InvalidForecastError('ttlMinutes is too small to produce a later expiry');
    }

    const inserted = await this.run('upload', options, (context) =>
      this.repository.insert(
        {
          city,
          forecastAt,
          expiresAt,
          textBytes: encoded.bytes,
          audioBytes: input.audio,
          textSizeBytes: encoded.byteLength,
          audioSizeBytes: input.audio.length,
          textEncoding: encoded.encoding,
          textLanguage: language,
          textLocale: locale,
          audioFormat: AUDIO_FORMAT,
          audioLanguage: language,
          metadata: {
            ttlMinutes,
            characterCount: countCharacters(input.text),
            encodingUsed: encoded.encoding,
          },
        },
        context
      )
    );

    return {
      id: inserted.id,
      createdAt: inserted.createdAt,
      expiresAt,
      encodingUsed: encoded.encoding,
      language,
      locale,
      sizes: {
        text: encoded.byteLength,
        audio: input.audio.length,
        total: encoded.byteLength + input.audio.length,
      },
    };
  }

  /**
   * The most recent valid forecast for a city. A miss is a result, not an error.
   */
  async getCurrent(city: string, language?: string | null, options: OperationOptions = {}): Promise<CurrentForecastResult> {
    const key = normalizeCity(city);
    const languageFilter = optionalTag(language, 'language', MAX_LANGUAGE_LENGTH);
    const now = this.clock();

    const record = await this.run('getCurrent', options, (context) =>
      this.repository.findCurrent(key, languageFilter, now, context)
    );
    if (!record) {
      return { found: false };
    }

    let text: string;
    try {
      text = decodeText(record.textBytes, record.textEncoding);
    } catch (error) {
      console.error(`ForecastStore: Forecast ${record.id} could not be decoded:`, describeError(error));
      throw new CorruptForecastError(
        `Stored forecast ${record.id} is not valid ${record.textEncoding}`,
        { cause: error }
      );
    }

    return {
      found: true,
      id: record.id,
      city: record.city,
      text,
      audio: record.audioBytes ?? Buffer.alloc(0),
      forecastAt: record.forecastAt,
      expiresAt: record.expiresAt,
      ageSeconds: Math.max(0, Math.floor((now.getTime() - record.forecastAt.getTime()) / 1000)),
      encoding: record.textEncoding,
      language: record.textLanguage,
      locale: record.textLocale,
      sizes: { text: record.textSizeBytes, audio: record.audioSizeBytes ?? 0 },
      metadata: record.metadata,
      createdAt: record.createdAt,
    };
  }

  /**
   * Newest first, expired records included and flagged
   */
  async list(query: ListForecastsQuery = {}, options: OperationOptions = {}): Promise<ForecastSummary[]> {
    const city = query.city === undefined ? null : normalizeCity(query.city);
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new InvalidForecastError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
    }
    const now = this.clock();

    const rows = await this.run('list', options, (context) => this.repository.list(city, limit, context));

    return rows.map((row) => ({
      id: row.id,
      city: row.city,
      forecastAt: row.forecastAt,
      expiresAt: row.expiresAt,
      expired: row.expiresAt.getTime() < now.getTime(),
      sizes: { text: row.textSizeBytes, audio: row.audioSizeBytes ?? 0 },
      encoding: row.textEncoding,
      language: row.textLanguage,
      locale: row.textLocale,
      createdAt: row.createdAt,
    }));
  }

  async cleanupExpired(options: OperationOptions = {}): Promise<CleanupCounts> {
    const now = this.clock();
    const result = await this.run('cleanupExpired', options, (context) => this.repository.deleteExpired(now, context));
    if (result.deletedCount > 0) {
      console.log(`ForecastStore: Removed ${result.deletedCount} expired forecasts (${result.remainingCount} remaining)`);
    }
    return result;
  }

  async stats(options: OperationOptions = {}): Promise<StorageStats> {
    const now = this.clock();
    return this.run('stats', options, (context) => this.repository.aggregate(now, context));
  }

  /**
   * Liveness and readiness probe. Failures are reported, never thrown.
   */
  async testConnection(options: OperationOptions = {}): Promise<ConnectionStatus> {
    try {
      const probe = await this.run('testConnection', options, (context) => this.repository.probe(context));
      return {
        connected: true,
        instanceId: this.repository.instanceId,
        databaseName: probe.databaseName,
        version: probe.version,
        schemaReady: probe.schemaReady,
      };
    } catch (error) {
      return {
        connected: false,
        instanceId: this.repository.instanceId,
        databaseName: this.repository.databaseName,
        version: null,
        schemaReady: false,
        error: describeError(error),
      };
    }
  }

  private resolveDefaultEncoding(text: string): TextEncoding {
    return this.defaultEncoding === 'auto' ? detectDefaultEncoding(text) : this.defaultEncoding;
  }

  /**
   * Run one repository call under a deadline. On expiry the signal aborts,
   * which makes the repository drop its connection, and the caller gets
   * STORE_TIMEOUT.
   */
  private async run<T>(
    operation: string,
    options: OperationOptions,
    work: (context: RepositoryContext) => Promise<T>
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.operationTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new StoreUnavailableError(`${operation} exceeded its ${timeoutMs}ms deadline`, 'STORE_TIMEOUT'));
      }, timeoutMs);
    });

    const pending = work({ signal: controller.signal, timeoutMs });
    pending.catch((error: unknown) => {
      if (controller.signal.aborted) {
        console.warn(`ForecastStore: ${operation} failed after its deadline:`, describeError(error));
      }
    });

    try {
      return await Promise.race([pending, deadline]);
    } catch (error) {
      const storeError = this.toStoreError(operation, error);
      if (storeError instanceof StoreUnavailableError) {
        console.error(`ForecastStore: ${operation} failed:`, describeError(error));
      }
      throw storeError;
    } finally {
      clearTimeout(timer);
    }
  }

  private toStoreError(operation: string, error: unknown): Error {
    if (error instanceof ForecastStoreError || error instanceof EncodingError || error instanceof DecodingError) {
      return error;
    }
    return new StoreUnavailableError(`${operation} failed: ${describeError(error)}`, 'STORE_UNAVAILABLE', {
      cause: error,
    });
  }
}
