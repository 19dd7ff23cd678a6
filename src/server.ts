/**
 * Server Entry Point
 * Opens the forecast store, starts the HTTP server and the cleanup schedule
 */

import { createServer } from 'http';
import * as path from 'path';
import { createApp } from './app';
import { env } from './config/env';
import { PostgresConnection } from './lib/database/postgres.connection';
import { CleanupScheduler, CleanupTask } from './lib/scheduler/cleanup.scheduler';
import { ForecastRepository, PostgresForecastRepository } from './modules/forecast/forecast.repository';
import { InMemoryForecastRepository } from './modules/forecast/forecast.memory-repository';
import { ForecastStore } from './modules/forecast/forecast.store';
import { createForecastCache, purgeStaleFiles } from './modules/forecast-cache';

const startServer = async (): Promise<void> => {
  let connection: PostgresConnection | null = null;

  try {
    let repository: ForecastRepository;
    if (env.FORECAST_STORE_DRIVER === 'postgres') {
      console.log('🐘 Connecting to PostgreSQL...');
      connection = new PostgresConnection({
        host: env.DB_HOST,
        port: env.DB_PORT,
        database: env.DB_NAME,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        ssl: env.DB_SSL,
        maxConnections: env.DB_POOL_MAX,
        instanceId: env.DB_INSTANCE_ID,
        autoMigrate: env.DB_AUTO_MIGRATE,
      });
      await connection.open();
      repository = new PostgresForecastRepository(connection);
    } else {
      console.log('⚠️  Using the in-memory forecast store; data is lost on restart');
      repository = new InMemoryForecastRepository();
    }

    const store = new ForecastStore(repository, {
      defaultTtlMinutes: env.FORECAST_TTL_MINUTES,
      defaultEncoding: env.FORECAST_DEFAULT_ENCODING,
      operationTimeoutMs: env.STORE_OPERATION_TIMEOUT_MS,
    });

    const status = await store.testConnection();
    if (status.connected && status.schemaReady) {
      console.log(`✅ Forecast store ready (${status.instanceId}/${status.databaseName})`);
    } else if (status.connected) {
      console.log('⚠️  Forecast store reachable but the forecasts table is missing');
    } else {
      console.log(`⚠️  Forecast store unreachable: ${status.error}`);
    }

    const outputDir = path.resolve(process.cwd(), env.FORECAST_OUTPUT_DIR);
    const forecastCache = createForecastCache({
      backend: env.FORECAST_CACHE_BACKEND,
      store,
      outputDir,
      ttlMinutes: env.FORECAST_TTL_MINUTES,
    });

    const tasks: CleanupTask[] = [
      { name: `${forecastCache.backend} forecast cache`, run: () => forecastCache.cleanup() },
      {
        name: 'stale forecast files',
        run: () => purgeStaleFiles({ outputDir, maxAgeDays: env.FORECAST_FILE_RETENTION_DAYS }),
      },
    ];
    const scheduler = new CleanupScheduler({ intervalMs: env.FORECAST_CLEANUP_INTERVAL_MS, tasks });
    if (env.FORECAST_CLEANUP_ENABLED) {
      scheduler.start();
    }

    const app = createApp({ store });
    const httpServer = createServer(app);

    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('🚀 Forecast Cache Service is running');
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 Store: ${env.FORECAST_STORE_DRIVER} (${repository.instanceId})`);
      console.log(`🚀 Cache backend: ${forecastCache.backend}`);
      console.log(`🚀 Cleanup: ${env.FORECAST_CLEANUP_ENABLED ? 'enabled' : 'disabled'}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      console.log(`${signal} signal received: closing HTTP server`);
      httpServer.close(() => {
        console.log('HTTP server closed');
        scheduler
          .stop()
          .then(() => connection?.close())
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error('Shutdown failed:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    await connection?.close().catch((closeError: unknown) => {
      console.error('Failed to close database pool:', closeError);
    });
    process.exit(1);
  }
};

// Start the server
void startServer();
