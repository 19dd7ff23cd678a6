/**
 * In-Memory Forecast Repository
 * Single-process repository for local development and tests. Every method
 * completes without yielding between its reads and writes, so each call
 * observes one consistent snapshot.
 */

import { randomUUID } from 'crypto';
import { Clock, systemClock } from '../../lib/clock';
import { StoreUnavailableError } from '../../lib/errors/store.errors';
import { ForecastRepository } from './forecast.repository';
import {
  CityStatistics,
  CleanupCounts,
  ConnectionProbe,
  InsertedForecast,
  NewForecastRecord,
  RepositoryContext,
  StorageStats,
  StoredForecast,
  StoredForecastSummary,
} from './forecast.types';

interface MemoryRow extends StoredForecast {
  sequence: number;
}

export interface InMemoryForecastRepositoryOptions {
  clock?: Clock;
  instanceId?: string;
  databaseName?: string;
}

const newestFirst = (a: MemoryRow, b: MemoryRow): number =>
  b.forecastAt.getTime() - a.forecastAt.getTime() ||
  b.createdAt.getTime() - a.createdAt.getTime() ||
  b.sequence - a.sequence;

const copyBuffer = (buffer: Buffer | null): Buffer | null => (buffer ? Buffer.from(buffer) : null);

function toSummary(row: MemoryRow): StoredForecastSummary {
  return {
    id: row.id,
    city: row.city,
    forecastAt: new Date(row.forecastAt),
    expiresAt: new Date(row.expiresAt),
    textSizeBytes: row.textSizeBytes,
    audioSizeBytes: row.audioSizeBytes,
    textEncoding: row.textEncoding,
    textLanguage: row.textLanguage,
    textLocale: row.textLocale,
    createdAt: new Date(row.createdAt),
  };
}

function toStoredForecast(row: MemoryRow): StoredForecast {
  return {
    ...toSummary(row),
    textBytes: Buffer.from(row.textBytes),
    audioBytes: copyBuffer(row.audioBytes),
    metadata: row.metadata ? { ...row.metadata } : null,
  };
}

function increment(histogram: Record<string, number>, key: string): void {
  histogram[key] = (histogram[key] ?? 0) + 1;
}

export class InMemoryForecastRepository implements ForecastRepository {
  readonly instanceId: string;
  readonly databaseName: string;
  private rows: MemoryRow[] = [];
  private sequence = 0;
  private readonly clock: Clock;

  constructor(options: InMemoryForecastRepositoryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.instanceId = options.instanceId ?? 'memory';
    this.databaseName = options.databaseName ?? 'forecasts';
  }

  /**
   * Total rows held, expired or not
   */
  count(): number {
    return this.rows.length;
  }

  async insert(record: NewForecastRecord, context: RepositoryContext = {}): Promise<InsertedForecast> {
    this.assertActive(context);
    const row: MemoryRow = {
      id: randomUUID(),
      city: record.city,
      forecastAt: new Date(record.forecastAt),
      expiresAt: new Date(record.expiresAt),
      textBytes: Buffer.from(record.textBytes),
      audioBytes: Buffer.from(record.audioBytes),
      textSizeBytes: record.textSizeBytes,
      audioSizeBytes: record.audioSizeBytes,
      textEncoding: record.textEncoding,
      textLanguage: record.textLanguage,
      textLocale: record.textLocale,
      metadata: { ...record.metadata },
      createdAt: this.clock(),
      sequence: ++this.sequence,
    };
    this.rows.push(row);
    return { id: row.id, createdAt: new Date(row.createdAt) };
  }

  async findCurrent(
    city: string,
    language: string | null,
    now: Date,
    context: RepositoryContext = {}
  ): Promise<StoredForecast | null> {
    this.assertActive(context);
    const [current] = this.rows
      .filter((row) => row.city === city && row.expiresAt.getTime() > now.getTime())
      .filter((row) => language === null || row.textLanguage === language)
      .sort(newestFirst);
    return current ? toStoredForecast(current) : null;
  }

  async list(city: string | null, limit: number, context: RepositoryContext = {}): Promise<StoredForecastSummary[]> {
    this.assertActive(context);
    return this.rows
      .filter((row) => city === null || row.city === city)
      .sort(newestFirst)
      .slice(0, limit)
      .map(toSummary);
  }

  async deleteExpired(now: Date, context: RepositoryContext = {}): Promise<CleanupCounts> {
    this.assertActive(context);
    const before = this.rows.length;
    this.rows = this.rows.filter((row) => !(row.expiresAt.getTime() < now.getTime()));
    return { deletedCount: before - this.rows.length, remainingCount: this.rows.length };
  }

  async aggregate(now: Date, context: RepositoryContext = {}): Promise<StorageStats> {
    this.assertActive(context);
    const valid = this.rows.filter((row) => row.expiresAt.getTime() > now.getTime());

    const encodingsUsed: Record<string, number> = {};
    const languagesUsed: Record<string, number> = {};
    const cities = new Map<string, CityStatistics>();

    for (const row of valid) {
      increment(encodingsUsed, row.textEncoding);
      if (row.textLanguage !== null) {
        increment(languagesUsed, row.textLanguage);
      }

      const entry = cities.get(row.city) ?? {
        city: row.city,
        forecastCount: 0,
        totalTextBytes: 0,
        totalAudioBytes: 0,
        latestForecast: null,
      };
      entry.forecastCount++;
      entry.totalTextBytes += row.textSizeBytes;
      entry.totalAudioBytes += row.audioSizeBytes ?? 0;
      if (!entry.latestForecast || row.forecastAt > entry.latestForecast) {
        entry.latestForecast = new Date(row.forecastAt);
      }
      cities.set(row.city, entry);
    }

    return {
      totalForecasts: valid.length,
      totalTextBytes: valid.reduce((sum, row) => sum + row.textSizeBytes, 0),
      totalAudioBytes: valid.reduce((sum, row) => sum + (row.audioSizeBytes ?? 0), 0),
      encodingsUsed,
      languagesUsed,
      cityBreakdown: Array.from(cities.values()).sort(
        (a, b) => b.forecastCount - a.forecastCount || a.city.localeCompare(b.city)
      ),
    };
  }

  async probe(context: RepositoryContext = {}): Promise<ConnectionProbe> {
    this.assertActive(context);
    return { version: 'in-memory', databaseName: this.databaseName, schemaReady: true };
  }

  private assertActive(context: RepositoryContext): void {
    if (context.signal?.aborted) {
      throw new StoreUnavailableError('Operation cancelled before it started', 'STORE_TIMEOUT');
    }
  }
}
