/**
 * Forecast Store Errors
 * Typed failures surfaced by the store and its backing-store adapters
 */

export type StoreErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'STORE_TIMEOUT'
  | 'DATA_CORRUPTED'
  | 'INVALID_TIMESTAMP'
  | 'INVALID_FORECAST';

export class ForecastStoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ForecastStoreError';
  }
}

/**
 * Backing store unreachable, failed mid-operation, or missed its deadline.
 * Callers may retry with backoff.
 */
export class StoreUnavailableError extends ForecastStoreError {
  constructor(
    message: string,
    code: 'STORE_UNAVAILABLE' | 'STORE_TIMEOUT' | 'DATA_CORRUPTED' = 'STORE_UNAVAILABLE',
    options?: { cause?: unknown }
  ) {
    super(message, code, code !== 'DATA_CORRUPTED', options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A stored payload could not be decoded with its declared encoding
 */
export class CorruptForecastError extends StoreUnavailableError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DATA_CORRUPTED', options);
    this.name = 'CorruptForecastError';
  }
}

export class TimestampError extends ForecastStoreError {
  constructor(message: string) {
    super(message, 'INVALID_TIMESTAMP', false);
    this.name = 'TimestampError';
  }
}

export class InvalidForecastError extends ForecastStoreError {
  constructor(message: string) {
    super(message, 'INVALID_FORECAST', false);
    this.name = 'InvalidForecastError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
