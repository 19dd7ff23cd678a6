/**
 * Forecast API Integration Tests
 * HTTP round trips through the Express app over the in-memory store
 */

import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../app';
import { ForecastStore } from '../../modules/forecast/forecast.store';
import { InMemoryForecastRepository } from '../../modules/forecast/forecast.memory-repository';
import { ConnectionProbe, StoredForecast } from '../../modules/forecast/forecast.types';
import { createTestForecastStore, TestForecastStore } from '../helpers/database';
import { FIXED_NOW, MINUTE_MS, createTestClock, sampleAudio, sampleTexts } from '../helpers/fixtures';

class UnreachableRepository extends InMemoryForecastRepository {
  async findCurrent(): Promise<StoredForecast | null> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }

  async probe(): Promise<ConnectionProbe> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }
}

const uploadBody = (overrides: Record<string, unknown> = {}) => ({
  text: sampleTexts.english,
  audioBase64: sampleAudio.toString('base64'),
  forecastAt: '2025-06-01T12:00:00Z',
  language: 'en',
  ...overrides,
});

describe('Forecast API Integration Tests', () => {
  let context: TestForecastStore;
  let app: Application;
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    context = createTestForecastStore();
    app = createApp({ store: context.store });
    consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  describe('POST /forecast/:city', () => {
    it('should store a forecast and return 201', async () => {
      const response = await request(app).post('/forecast/Chicago').send(uploadBody({ locale: 'en-US' }));

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.forecast).toMatchObject({
        createdAt: '2025-06-01T12:00:00.000Z',
        expiresAt: '2025-06-01T12:30:00.000Z',
        encodingUsed: 'utf-8',
        language: 'en',
        locale: 'en-US',
        sizes: { text: 12, audio: 20, total: 32 },
      });
      expect(context.repository.count()).toBe(1);
    });

    it('should reject audio that is not base64', async () => {
      const response = await request(app).post('/forecast/chicago').send(uploadBody({ audioBase64: 'not base64!' }));

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: 'audioBase64 is not valid base64',
        code: 'INVALID_AUDIO',
      });
      expect(context.repository.count()).toBe(0);
    });

    it('should reject an unparseable forecast time', async () => {
      const response = await request(app).post('/forecast/chicago').send(uploadBody({ forecastAt: 'yesterday' }));

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('INVALID_TIMESTAMP');
    });

    it('should reject an unsupported encoding', async () => {
      const response = await request(app).post('/forecast/chicago').send(uploadBody({ encoding: 'latin-1' }));

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('ENCODING_ERROR');
      expect(context.repository.count()).toBe(0);
    });

    it('should reject a malformed JSON body', async () => {
      const response = await request(app)
        .post('/forecast/chicago')
        .set('Content-Type', 'application/json')
        .send('{"text":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, error: 'Malformed JSON body' });
    });

    it('should reject a body in an unsupported charset as a client error', async () => {
      const response = await request(app)
        .post('/forecast/chicago')
        .set('Content-Type', 'application/json; charset=latin1')
        .send('{}');

      expect(response.status).toBe(415);
      expect(response.body).toEqual({ success: false, error: 'Invalid request body' });
      expect(consoleError).not.toHaveBeenCalled();
    });
  });

  describe('GET /forecast/:city', () => {
    it('should return the current forecast with its audio', async () => {
      await request(app).post('/forecast/beijing').send(uploadBody({ text: sampleTexts.chinese, language: 'zh' }));
      context.clock.advance(90 * 1000);

      const response = await request(app).get('/forecast/Beijing');

      expect(response.status).toBe(200);
      expect(response.body.forecast).toMatchObject({
        city: 'beijing',
        text: sampleTexts.chinese,
        audioBase64: sampleAudio.toString('base64'),
        forecastAt: '2025-06-01T12:00:00.000Z',
        ageSeconds: 90,
        encoding: 'utf-16',
        language: 'zh',
        sizes: { text: 28, audio: 20 },
      });
      expect(response.body.forecast.found).toBeUndefined();
    });

    it('should return 404 when no forecast matches the language', async () => {
      await request(app).post('/forecast/chicago').send(uploadBody());

      const response = await request(app).get('/forecast/Chicago').query({ language: 'es' });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        error: 'No current forecast for Chicago',
        code: 'FORECAST_NOT_FOUND',
      });
    });

    it('should return 404 once the forecast has expired', async () => {
      await request(app).post('/forecast/chicago').send(uploadBody());
      context.clock.advance(30 * MINUTE_MS);

      const response = await request(app).get('/forecast/chicago');

      expect(response.status).toBe(404);
    });

    it('should return 503 when the store is unreachable', async () => {
      const clock = createTestClock();
      const store = new ForecastStore(new UnreachableRepository({ clock }), { clock });

      const response = await request(createApp({ store })).get('/forecast/chicago');

      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        success: false,
        error: 'Forecast store is unavailable',
        code: 'STORE_UNAVAILABLE',
      });
    });
  });

  describe('GET /forecast/:city/history', () => {
    beforeEach(async () => {
      const earlier = new Date(FIXED_NOW.getTime() - 40 * MINUTE_MS).toISOString();
      await request(app).post('/forecast/chicago').send(uploadBody({ forecastAt: earlier }));
      await request(app).post('/forecast/chicago').send(uploadBody());
    });

    it('should hide expired forecasts by default', async () => {
      const response = await request(app).get('/forecast/Chicago/history');

      expect(response.status).toBe(200);
      expect(response.body.city).toBe('chicago');
      expect(response.body.count).toBe(1);
      expect(response.body.forecasts[0]).toMatchObject({ forecastAt: '2025-06-01T12:00:00.000Z', expired: false });
    });

    it('should include expired forecasts on request', async () => {
      const response = await request(app).get('/forecast/chicago/history').query({ includeExpired: 'true' });

      expect(response.body.count).toBe(2);
      expect(response.body.forecasts[1]).toMatchObject({ forecastAt: '2025-06-01T11:20:00.000Z', expired: true });
    });

    it('should reject a limit out of range', async () => {
      const response = await request(app).get('/forecast/chicago/history').query({ limit: '0' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: 'limit must be an integer between 1 and 100',
        code: 'INVALID_LIMIT',
      });
    });
  });

  describe('GET /forecast', () => {
    it('should list recent forecasts across cities', async () => {
      await request(app).post('/forecast/chicago').send(uploadBody());
      await request(app).post('/forecast/beijing').send(uploadBody({ forecastAt: '2025-06-01T12:05:00Z' }));

      const response = await request(app).get('/forecast').query({ limit: '1' });

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(1);
      expect(response.body.forecasts[0].city).toBe('beijing');
    });
  });

  describe('DELETE /forecast/expired', () => {
    it('should delete expired forecasts and count the rest', async () => {
      const earlier = new Date(FIXED_NOW.getTime() - 40 * MINUTE_MS).toISOString();
      await request(app).post('/forecast/chicago').send(uploadBody({ forecastAt: earlier }));
      await request(app).post('/forecast/chicago').send(uploadBody());

      const response = await request(app).delete('/forecast/expired');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, deletedCount: 1, remainingCount: 1 });
    });
  });

  describe('GET /stats', () => {
    it('should aggregate valid forecasts', async () => {
      await request(app).post('/forecast/chicago').send(uploadBody());

      const response = await request(app).get('/stats');

      expect(response.status).toBe(200);
      expect(response.body.stats).toMatchObject({
        totalForecasts: 1,
        totalTextBytes: 12,
        totalAudioBytes: 20,
        encodingsUsed: { 'utf-8': 1 },
        languagesUsed: { en: 1 },
      });
    });
  });

  describe('GET /health', () => {
    it('should report a healthy store', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        status: 'healthy',
        database: {
          connected: true,
          instanceId: 'test-instance',
          databaseName: 'weather_test',
          version: 'in-memory',
          schemaReady: true,
        },
        environment: 'test',
      });
    });

    it('should return 503 without exposing the failure', async () => {
      const clock = createTestClock();
      const store = new ForecastStore(new UnreachableRepository({ clock, instanceId: 'db-1' }), { clock });

      const response = await request(createApp({ store })).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('unhealthy');
      expect(response.body.database).toEqual({
        connected: false,
        instanceId: 'db-1',
        databaseName: 'forecasts',
        version: null,
        schemaReady: false,
      });
    });
  });

  describe('unknown routes', () => {
    it('should return a JSON 404', async () => {
      const response = await request(app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, error: 'Route not found', path: '/nope' });
    });
  });
});
