/**
 * Forecast Controller
 * HTTP request/response handling for forecast, stats and health endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { env } from '../../config/env';
import { ForecastStore } from './forecast.store';
import { CurrentForecast } from './forecast.types';
import {
  parseBooleanFlag,
  parseCity,
  parseLanguage,
  parseLimit,
  parseUploadBody,
} from './forecast.validation';

const toForecastResponse = (forecast: CurrentForecast) => {
  const { found: _found, audio, ...rest } = forecast;
  return { ...rest, audioBase64: audio.toString('base64') };
};

export class ForecastController {
  constructor(private readonly store: ForecastStore) {}

  /**
   * GET /forecast/:city
   * Current forecast for a city, optionally in one language
   */
  getCurrent = asyncHandler(async (req: Request, res: Response) => {
    const city = parseCity(req.params.city);
    const language = parseLanguage(req.query.language);

    const result = await this.store.getCurrent(city, language);
    if (!result.found) {
      throw new ApiError(404, `No current forecast for ${city}`, 'FORECAST_NOT_FOUND');
    }

    res.json({ success: true, forecast: toForecastResponse(result) });
  });

  /**
   * GET /forecast/:city/history
   * Forecast history for a city, newest first
   */
  getHistory = asyncHandler(async (req: Request, res: Response) => {
    const city = parseCity(req.params.city);
    const limit = parseLimit(req.query.limit);
    const includeExpired = parseBooleanFlag(req.query.includeExpired, 'includeExpired');

    const forecasts = await this.store.list({ city, limit });
    const visible = includeExpired ? forecasts : forecasts.filter((forecast) => !forecast.expired);

    res.json({ success: true, city: city.toLowerCase(), count: visible.length, forecasts: visible });
  });

  /**
   * GET /forecast
   * Recent forecasts across all cities
   */
  getRecent = asyncHandler(async (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit);
    const forecasts = await this.store.list({ limit });

    res.json({ success: true, count: forecasts.length, forecasts });
  });

  /**
   * POST /forecast/:city
   * Store a new forecast
   */
  upload = asyncHandler(async (req: Request, res: Response) => {
    const city = parseCity(req.params.city);
    const body = parseUploadBody(req.body);

    const forecast = await this.store.upload({ city, ...body });

    res.status(201).json({ success: true, forecast });
  });

  /**
   * DELETE /forecast/expired
   * Remove expired forecasts
   */
  cleanupExpired = asyncHandler(async (_req: Request, res: Response) => {
    const result = await this.store.cleanupExpired();
    res.json({ success: true, ...result });
  });

  /**
   * GET /stats
   * Storage statistics over valid forecasts
   */
  getStats = asyncHandler(async (_req: Request, res: Response) => {
    const stats = await this.store.stats();
    res.json({ success: true, stats });
  });

  /**
   * GET /health
   * Backing store liveness and schema readiness
   */
  health = asyncHandler(async (_req: Request, res: Response) => {
    const { error, ...database } = await this.store.testConnection();
    const healthy = database.connected && database.schemaReady;

    if (error) {
      console.error('Health check failed:', error);
    }

    res.status(healthy ? 200 : 503).json({
      success: healthy,
      status: healthy ? 'healthy' : 'unhealthy',
      database,
      version: env.API_VERSION,
      environment: env.NODE_ENV,
      timestamp: new Date().toISOString(),
    });
  });
}
