/**
 * Forecast Router
 * Route definitions for forecast endpoints
 */

import { Router } from 'express';
import { ForecastController } from './forecast.controller';

export const createForecastRouter = (controller: ForecastController): Router => {
  const router = Router();

  /**
   * @route   GET /forecast
   * @desc    List recent forecasts across all cities
   * @access  Public
   */
  router.get('/', controller.getRecent);

  /**
   * @route   DELETE /forecast/expired
   * @desc    Delete expired forecasts
   * @access  Public (can add authentication middleware)
   */
  router.delete('/expired', controller.cleanupExpired);

  /**
   * @route   GET /forecast/:city/history
   * @desc    Forecast history for a city
   * @access  Public
   */
  router.get('/:city/history', controller.getHistory);

  /**
   * @route   GET /forecast/:city
   * @desc    Current forecast for a city
   * @access  Public
   */
  router.get('/:city', controller.getCurrent);

  /**
   * @route   POST /forecast/:city
   * @desc    Store a new forecast for a city
   * @access  Public (can add authentication middleware)
   */
  router.post('/:city', controller.upload);

  return router;
};
