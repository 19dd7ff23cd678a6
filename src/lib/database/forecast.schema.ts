/**
 * Forecast Schema
 * DDL applied by PostgresConnection.migrate(). Requires PostgreSQL 13+
 * for the built-in gen_random_uuid().
 */

export const FORECASTS_TABLE = 'forecasts';

export const FORECAST_SCHEMA: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS ${FORECASTS_TABLE} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    city VARCHAR(100) NOT NULL,
    forecast_at TIMESTAMPTZ NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL,
    forecast_text BYTEA NOT NULL,
    audio_file BYTEA,
    text_size_bytes INTEGER NOT NULL,
    audio_size_bytes INTEGER,
    text_encoding VARCHAR(20) NOT NULL DEFAULT 'utf-8',
    text_language VARCHAR(10),
    text_locale VARCHAR(20),
    audio_format VARCHAR(10) NOT NULL DEFAULT 'wav',
    audio_language VARCHAR(10),
    metadata JSONB,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT forecasts_expiry_after_forecast CHECK (expires_at > forecast_at)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_forecasts_city_expires ON ${FORECASTS_TABLE} (city, expires_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_forecasts_expires ON ${FORECASTS_TABLE} (expires_at)`,
  `CREATE INDEX IF NOT EXISTS idx_forecasts_forecast_at ON ${FORECASTS_TABLE} (forecast_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_forecasts_language ON ${FORECASTS_TABLE} (text_language)`,
];
