/**
 * Forecast Repository
 * Data access layer for forecast records
 */

import { PostgresConnection, SqlRow } from '../../lib/database/postgres.connection';
import { FORECASTS_TABLE } from '../../lib/database/forecast.schema';
import { CorruptForecastError } from '../../lib/errors/store.errors';
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

/**
 * Persistence contract of the forecast store. Every method runs as one
 * transaction and evaluates validity against the `now` it is given.
 */
export interface ForecastRepository {
  readonly instanceId: string;
  readonly databaseName: string;

  insert(record: NewForecastRecord, context?: RepositoryContext): Promise<InsertedForecast>;
  findCurrent(
    city: string,
    language: string | null,
    now: Date,
    context?: RepositoryContext
  ): Promise<StoredForecast | null>;
  list(city: string | null, limit: number, context?: RepositoryContext): Promise<StoredForecastSummary[]>;
  deleteExpired(now: Date, context?: RepositoryContext): Promise<CleanupCounts>;
  aggregate(now: Date, context?: RepositoryContext): Promise<StorageStats>;
  probe(context?: RepositoryContext): Promise<ConnectionProbe>;
}

// ============================================================================
// Row readers
// ============================================================================

const corrupt = (column: string, value: unknown): CorruptForecastError =>
  new CorruptForecastError(`Unexpected ${typeof value} in column "${column}"`);

function readString(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') {
    return value;
  }
  throw corrupt(column, value);
}

function readOptionalString(row: SqlRow, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : readString(row, column);
}

function readDate(row: SqlRow, column: string): Date {
  const value = row[column];
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw corrupt(column, value);
  }
  return date;
}

function readOptionalDate(row: SqlRow, column: string): Date | null {
  return row[column] === null || row[column] === undefined ? null : readDate(row, column);
}

// BIGINT and NUMERIC columns arrive as strings
function readNumber(row: SqlRow, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw corrupt(column, value);
  }
  return parsed;
}

function readOptionalNumber(row: SqlRow, column: string): number | null {
  return row[column] === null || row[column] === undefined ? null : readNumber(row, column);
}

function readBuffer(row: SqlRow, column: string): Buffer {
  const value = row[column];
  if (Buffer.isBuffer(value)) {
    return value;
  }
  throw corrupt(column, value);
}

function readOptionalBuffer(row: SqlRow, column: string): Buffer | null {
  return row[column] === null || row[column] === undefined ? null : readBuffer(row, column);
}

function readBoolean(row: SqlRow, column: string): boolean {
  const value = row[column];
  if (typeof value === 'boolean') {
    return value;
  }
  throw corrupt(column, value);
}

function readJsonObject(row: SqlRow, column: string): Record<string, unknown> | null {
  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  throw corrupt(column, value);
}

function toSummary(row: SqlRow): StoredForecastSummary {
  return {
    id: readString(row, 'id'),
    city: readString(row, 'city'),
    forecastAt: readDate(row, 'forecast_at'),
    expiresAt: readDate(row, 'expires_at'),
    textSizeBytes: readNumber(row, 'text_size_bytes'),
    audioSizeBytes: readOptionalNumber(row, 'audio_size_bytes'),
    textEncoding: readString(row, 'text_encoding'),
    textLanguage: readOptionalString(row, 'text_language'),
    textLocale: readOptionalString(row, 'text_locale'),
    createdAt: readDate(row, 'created_at'),
  };
}

function toStoredForecast(row: SqlRow): StoredForecast {
  return {
    ...toSummary(row),
    textBytes: readBuffer(row, 'forecast_text'),
    audioBytes: readOptionalBuffer(row, 'audio_file'),
    metadata: readJsonObject(row, 'metadata'),
  };
}

function toHistogram(rows: SqlRow[], keyColumn: string): Record<string, number> {
  const histogram: Record<string, number> = {};
  for (const row of rows) {
    histogram[readString(row, keyColumn)] = readNumber(row, 'count');
  }
  return histogram;
}

function toCityStatistics(row: SqlRow): CityStatistics {
  return {
    city: readString(row, 'city'),
    forecastCount: readNumber(row, 'forecast_count'),
    totalTextBytes: readNumber(row, 'total_text_bytes'),
    totalAudioBytes: readNumber(row, 'total_audio_bytes'),
    latestForecast: readOptionalDate(row, 'latest_forecast'),
  };
}

// ============================================================================
// SQL
// ============================================================================

const SUMMARY_COLUMNS = `id, city, forecast_at, expires_at, text_size_bytes, audio_size_bytes,
  text_encoding, text_language, text_locale, created_at`;

const INSERT_FORECAST = `
  INSERT INTO ${FORECASTS_TABLE} (
    city, forecast_at, expires_at, forecast_text, audio_file,
    text_size_bytes, audio_size_bytes, text_encoding, text_language, text_locale,
    audio_format, audio_language, metadata
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
  RETURNING id, created_at`;

const SELECT_CURRENT = `
  SELECT ${SUMMARY_COLUMNS}, forecast_text, audio_file, metadata
  FROM ${FORECASTS_TABLE}
  WHERE city = $1 AND expires_at > $2 AND ($3::varchar IS NULL OR text_language = $3)
  ORDER BY forecast_at DESC, created_at DESC
  LIMIT 1`;

const SELECT_ALL_SUMMARIES = `
  SELECT ${SUMMARY_COLUMNS}
  FROM ${FORECASTS_TABLE}
  ORDER BY forecast_at DESC, created_at DESC
  LIMIT $1`;

const SELECT_CITY_SUMMARIES = `
  SELECT ${SUMMARY_COLUMNS}
  FROM ${FORECASTS_TABLE}
  WHERE city = $2
  ORDER BY forecast_at DESC, created_at DESC
  LIMIT $1`;

const DELETE_EXPIRED = `DELETE FROM ${FORECASTS_TABLE} WHERE expires_at < $1`;

const COUNT_ALL = `SELECT COUNT(*) AS remaining FROM ${FORECASTS_TABLE}`;

const STATS_TOTALS = `
  SELECT COUNT(*) AS total_forecasts,
         COALESCE(SUM(text_size_bytes), 0) AS total_text_bytes,
         COALESCE(SUM(audio_size_bytes), 0) AS total_audio_bytes
  FROM ${FORECASTS_TABLE}
  WHERE expires_at > $1`;

const STATS_ENCODINGS = `
  SELECT text_encoding, COUNT(*) AS count
  FROM ${FORECASTS_TABLE}
  WHERE expires_at > $1
  GROUP BY text_encoding
  ORDER BY text_encoding`;

const STATS_LANGUAGES = `
  SELECT text_language, COUNT(*) AS count
  FROM ${FORECASTS_TABLE}
  WHERE expires_at > $1 AND text_language IS NOT NULL
  GROUP BY text_language
  ORDER BY text_language`;

const STATS_CITIES = `
  SELECT city,
         COUNT(*) AS forecast_count,
         COALESCE(SUM(text_size_bytes), 0) AS total_text_bytes,
         COALESCE(SUM(audio_size_bytes), 0) AS total_audio_bytes,
         MAX(forecast_at) AS latest_forecast
  FROM ${FORECASTS_TABLE}
  WHERE expires_at > $1
  GROUP BY city
  ORDER BY forecast_count DESC, city ASC`;

const PROBE = `
  SELECT version() AS version,
         current_database() AS database_name,
         EXISTS (
           SELECT 1 FROM information_schema.tables
           WHERE table_schema = current_schema() AND table_name = '${FORECASTS_TABLE}'
         ) AS schema_ready`;

export class PostgresForecastRepository implements ForecastRepository {
  constructor(private readonly connection: PostgresConnection) {}

  get instanceId(): string {
    return this.connection.instanceId;
  }

  get databaseName(): string {
    return this.connection.databaseName;
  }

  /**
   * Insert a forecast; id and created_at are assigned by the database
   */
  async insert(record: NewForecastRecord, context: RepositoryContext = {}): Promise<InsertedForecast> {
    return this.connection.transaction(async (client) => {
      const result = await client.query(INSERT_FORECAST, [
        record.city,
        record.forecastAt,
        record.expiresAt,
        record.textBytes,
        record.audioBytes,
        record.textSizeBytes,
        record.audioSizeBytes,
        record.textEncoding,
        record.textLanguage,
        record.textLocale,
        record.audioFormat,
        record.audioLanguage,
        JSON.stringify(record.metadata),
      ]);
      const [row] = result.rows;
      if (!row) {
        throw new CorruptForecastError('Insert returned no row');
      }
      return { id: readString(row, 'id'), createdAt: readDate(row, 'created_at') };
    }, this.options(context));
  }

  /**
   * Latest valid forecast for a city, optionally restricted to one language
   */
  async findCurrent(
    city: string,
    language: string | null,
    now: Date,
    context: RepositoryContext = {}
  ): Promise<StoredForecast | null> {
    return this.connection.transaction(async (client) => {
      const result = await client.query(SELECT_CURRENT, [city, now, language]);
      const [row] = result.rows;
      return row ? toStoredForecast(row) : null;
    }, { ...this.options(context), readOnly: true });
  }

  async list(city: string | null, limit: number, context: RepositoryContext = {}): Promise<StoredForecastSummary[]> {
    return this.connection.transaction(async (client) => {
      const result = city === null
        ? await client.query(SELECT_ALL_SUMMARIES, [limit])
        : await client.query(SELECT_CITY_SUMMARIES, [limit, city]);
      return result.rows.map(toSummary);
    }, { ...this.options(context), readOnly: true });
  }

  /**
   * Delete expired rows and count the survivors in the same transaction
   */
  async deleteExpired(now: Date, context: RepositoryContext = {}): Promise<CleanupCounts> {
    return this.connection.transaction(async (client) => {
      const deleted = await client.query(DELETE_EXPIRED, [now]);
      const remaining = await client.query(COUNT_ALL);
      const [row] = remaining.rows;
      return {
        deletedCount: deleted.rowCount,
        remainingCount: row ? readNumber(row, 'remaining') : 0,
      };
    }, this.options(context));
  }

  /**
   * Statistics over valid forecasts, read from one snapshot
   */
  async aggregate(now: Date, context: RepositoryContext = {}): Promise<StorageStats> {
    return this.connection.transaction(async (client) => {
      const totals = await client.query(STATS_TOTALS, [now]);
      const encodings = await client.query(STATS_ENCODINGS, [now]);
      const languages = await client.query(STATS_LANGUAGES, [now]);
      const cities = await client.query(STATS_CITIES, [now]);

      const [totalsRow] = totals.rows;
      return {
        totalForecasts: totalsRow ? readNumber(totalsRow, 'total_forecasts') : 0,
        totalTextBytes: totalsRow ? readNumber(totalsRow, 'total_text_bytes') : 0,
        totalAudioBytes: totalsRow ? readNumber(totalsRow, 'total_audio_bytes') : 0,
        encodingsUsed: toHistogram(encodings.rows, 'text_encoding'),
        languagesUsed: toHistogram(languages.rows, 'text_language'),
        cityBreakdown: cities.rows.map(toCityStatistics),
      };
    }, { ...this.options(context), isolation: 'repeatable read', readOnly: true });
  }

  async probe(context: RepositoryContext = {}): Promise<ConnectionProbe> {
    return this.connection.transaction(async (client) => {
      const result = await client.query(PROBE);
      const [row] = result.rows;
      if (!row) {
        throw new CorruptForecastError('Connection probe returned no row');
      }
      return {
        version: readString(row, 'version'),
        databaseName: readString(row, 'database_name'),
        schemaReady: readBoolean(row, 'schema_ready'),
      };
    }, { ...this.options(context), readOnly: true });
  }

  private options(context: RepositoryContext) {
    return { signal: context.signal, statementTimeoutMs: context.timeoutMs };
  }
}
