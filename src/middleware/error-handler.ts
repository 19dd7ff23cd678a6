/**
 * Error Handler Middleware
 * Async route wrapper and the terminal error handler for the API
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';
import { DecodingError, EncodingError } from '../lib/encoding/encoding.errors';
import {
  ForecastStoreError,
  InvalidForecastError,
  StoreUnavailableError,
  TimestampError,
} from '../lib/errors/store.errors';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
}

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections from async handlers to the error middleware
 */
export const asyncHandler =
  (handler: AsyncRouteHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

interface ResolvedError {
  status: number;
  body: ErrorResponse;
}

function resolveError(error: unknown): ResolvedError {
  if (error instanceof ApiError) {
    return { status: error.statusCode, body: { success: false, error: error.message, code: error.code } };
  }

  if (error instanceof EncodingError || error instanceof DecodingError) {
    return { status: 400, body: { success: false, error: error.message, code: error.code } };
  }

  if (error instanceof TimestampError || error instanceof InvalidForecastError) {
    return { status: 400, body: { success: false, error: error.message, code: error.code } };
  }

  // Backing-store details stay in the logs
  if (error instanceof StoreUnavailableError) {
    const message = error.code === 'STORE_TIMEOUT'
      ? 'Forecast store timed out'
      : error.code === 'DATA_CORRUPTED'
        ? 'Stored forecast data is unreadable'
        : 'Forecast store is unavailable';
    return { status: 503, body: { success: false, error: message, code: error.code } };
  }

  if (error instanceof ForecastStoreError) {
    return { status: 500, body: { success: false, error: 'Forecast store error', code: error.code } };
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    return { status: 400, body: { success: false, error: 'Malformed JSON body' } };
  }

  // Other body-parser rejections (oversized body, unsupported charset) carry a 4xx status
  const status = clientErrorStatus(error);
  if (status !== null) {
    const message = status === 413 ? 'Request body too large' : 'Invalid request body';
    return { status, body: { success: false, error: message } };
  }

  return { status: 500, body: { success: false, error: 'Internal server error' } };
}

function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its arity
  _next: NextFunction
): void => {
  const { status, body } = resolveError(error);

  if (status >= 500) {
    const detail = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(`❌ ${req.method} ${req.originalUrl} failed (${status}):`, detail);
  } else if (env.NODE_ENV === 'development') {
    console.warn(`⚠️  ${req.method} ${req.originalUrl} rejected (${status}): ${body.error}`);
  }

  res.status(status).json(body);
};
