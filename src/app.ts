/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { ForecastStore } from './modules/forecast/forecast.store';
import { ForecastController } from './modules/forecast/forecast.controller';
import { createForecastRouter } from './modules/forecast/forecast.router';

export interface AppDependencies {
  store: ForecastStore;
}

export const createApp = ({ store }: AppDependencies): Application => {
  const app = express();
  const forecastController = new ForecastController(store);

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  // Helmet for security headers
  app.use(helmet());

  // CORS configuration
  app.use(
    cors({
      origin: env.CLIENT_URL,
      methods: ['GET', 'POST', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // Audio arrives base64-encoded in JSON bodies
  app.use(express.json({ limit: '25mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', forecastController.health);
  app.get('/stats', forecastController.getStats);
  app.use('/forecast', createForecastRouter(forecastController));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
