/**
 * Forecast Request Validation
 * Parses route params, query strings and upload bodies into store inputs
 */

import { ApiError } from '../../middleware/error-handler';
import {
  DEFAULT_LIST_LIMIT,
  MAX_CITY_LENGTH,
  MAX_LIST_LIMIT,
  MAX_LOCALE_LENGTH,
  UploadForecastInput,
} from './forecast.types';

const LANGUAGE_PATTERN = /^[A-Za-z-]{2,10}$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const INTEGER_PATTERN = /^\d+$/;

export type UploadForecastBody = Omit<UploadForecastInput, 'city'>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function parseCity(value: unknown): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ApiError(400, 'City is required', 'INVALID_CITY');
  }
  const city = value.trim();
  if (city.length > MAX_CITY_LENGTH) {
    throw new ApiError(400, `City must be at most ${MAX_CITY_LENGTH} characters`, 'INVALID_CITY');
  }
  return city;
}

export function parseLanguage(value: unknown): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !LANGUAGE_PATTERN.test(value)) {
    throw new ApiError(400, 'language must be 2-10 letters or hyphens', 'INVALID_LANGUAGE');
  }
  return value;
}

export function parseLimit(value: unknown, fallback: number = DEFAULT_LIST_LIMIT): number {
  if (value === undefined) {
    return fallback;
  }
  const limit = typeof value === 'string' && INTEGER_PATTERN.test(value) ? parseInt(value, 10) : NaN;
  if (!(limit >= 1 && limit <= MAX_LIST_LIMIT)) {
    throw new ApiError(400, `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 'INVALID_LIMIT');
  }
  return limit;
}

export function parseBooleanFlag(value: unknown, name: string, fallback = false): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  throw new ApiError(400, `${name} must be true or false`, 'INVALID_FLAG');
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ApiError(400, `${field} must be a string`, 'INVALID_BODY');
  }
  return value;
}

function decodeAudio(value: unknown): Buffer {
  if (typeof value !== 'string') {
    throw new ApiError(400, 'audioBase64 is required', 'INVALID_AUDIO');
  }
  const compact = value.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ApiError(400, 'audioBase64 is not valid base64', 'INVALID_AUDIO');
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Body of POST /forecast/:city
 */
export function parseUploadBody(body: unknown): UploadForecastBody {
  if (!isRecord(body)) {
    throw new ApiError(400, 'Request body must be a JSON object', 'INVALID_BODY');
  }

  const { text, forecastAt, ttlMinutes } = body;
  if (typeof text !== 'string') {
    throw new ApiError(400, 'text is required', 'INVALID_BODY');
  }
  if (typeof forecastAt !== 'string' || !forecastAt.trim()) {
    throw new ApiError(400, 'forecastAt is required', 'INVALID_BODY');
  }
  let ttl: number | undefined;
  if (ttlMinutes !== undefined) {
    if (typeof ttlMinutes !== 'number' || !Number.isFinite(ttlMinutes) || ttlMinutes <= 0) {
      throw new ApiError(400, 'ttlMinutes must be a positive number', 'INVALID_BODY');
    }
    ttl = ttlMinutes;
  }

  const locale = optionalString(body, 'locale');
  if (locale !== undefined && locale.length > MAX_LOCALE_LENGTH) {
    throw new ApiError(400, `locale must be at most ${MAX_LOCALE_LENGTH} characters`, 'INVALID_BODY');
  }

  return {
    text,
    audio: decodeAudio(body.audioBase64),
    forecastAt,
    ttlMinutes: ttl,
    encoding: optionalString(body, 'encoding'),
    language: parseLanguage(body.language ?? undefined),
    locale,
  };
}
