/**
 * Database Forecast Cache Tests
 */

import { DatabaseForecastCache } from '../database.forecast-cache';
import { FileSystemForecastCache } from '../filesystem.forecast-cache';
import { createForecastCache } from '../forecast-cache.factory';
import { createTestForecastStore, TestForecastStore } from '../../../__tests__/helpers/database';
import { FIXED_NOW, MINUTE_MS, sampleAudio } from '../../../__tests__/helpers/fixtures';

describe('DatabaseForecastCache', () => {
  let context: TestForecastStore;
  let cache: DatabaseForecastCache;

  beforeEach(() => {
    context = createTestForecastStore();
    cache = new DatabaseForecastCache(context.store);
  });

  it('should store one record and hand back its id', async () => {
    const receipt = await cache.store('Chicago', 'Sunny', { kind: 'bytes', data: sampleAudio }, FIXED_NOW);

    expect(receipt.backend).toBe('database');
    expect(typeof receipt.id).toBe('string');
    expect(receipt.expiresAt).toEqual(new Date('2025-06-01T12:30:00.000Z'));
    expect(context.repository.count()).toBe(1);
  });

  it('should find the current forecast with its audio bytes', async () => {
    await cache.store('chicago', 'Sunny', { kind: 'bytes', data: sampleAudio }, FIXED_NOW);
    context.clock.advance(2 * MINUTE_MS);

    await expect(cache.lookup('Chicago')).resolves.toEqual({
      cached: true,
      text: 'Sunny',
      audio: { kind: 'bytes', data: sampleAudio },
      ageSeconds: 120,
      forecastAt: FIXED_NOW,
    });
  });

  it('should miss once the forecast has expired', async () => {
    await cache.store('chicago', 'Sunny', { kind: 'bytes', data: sampleAudio }, FIXED_NOW);
    context.clock.advance(30 * MINUTE_MS);

    await expect(cache.lookup('chicago')).resolves.toEqual({ cached: false });
  });

  it('should report store statistics', async () => {
    await cache.store('chicago', 'Sunny', { kind: 'bytes', data: sampleAudio }, FIXED_NOW);

    const stats = await cache.stats();

    expect(stats.backend).toBe('database');
    expect(stats.backend === 'database' && stats.storage.totalForecasts).toBe(1);
  });

  it('should map cleanup counts', async () => {
    await cache.store('chicago', 'Sunny', { kind: 'bytes', data: sampleAudio }, FIXED_NOW);
    await cache.store('beijing', 'Cloudy', { kind: 'bytes', data: sampleAudio }, new Date(FIXED_NOW.getTime() + 10 * MINUTE_MS));
    context.clock.advance(31 * MINUTE_MS);

    await expect(cache.cleanup()).resolves.toEqual({ removed: 1, remaining: 1 });
  });
});

describe('createForecastCache', () => {
  it('should build the database backend over a store', () => {
    const { store } = createTestForecastStore();

    expect(createForecastCache({ backend: 'database', store, outputDir: 'output', ttlMinutes: 30 })).toBeInstanceOf(
      DatabaseForecastCache
    );
  });

  it('should refuse the database backend without a store', () => {
    expect(() => createForecastCache({ backend: 'database', outputDir: 'output', ttlMinutes: 30 })).toThrow(
      'The database forecast cache needs a ForecastStore'
    );
  });

  it('should build the filesystem backend', () => {
    const cache = createForecastCache({ backend: 'filesystem', outputDir: 'output', ttlMinutes: 15 });

    expect(cache).toBeInstanceOf(FileSystemForecastCache);
    expect(cache.backend).toBe('filesystem');
  });
});
