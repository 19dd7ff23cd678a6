/**
 * Test Database Helper
 * Builds a forecast store over the in-memory repository, the in-process
 * stand-in for PostgreSQL
 */

import { InMemoryForecastRepository } from '../../modules/forecast/forecast.memory-repository';
import { ForecastStore, ForecastStoreOptions } from '../../modules/forecast/forecast.store';
import { TestClock, createTestClock } from './fixtures';

export interface TestForecastStore {
  clock: TestClock;
  repository: InMemoryForecastRepository;
  store: ForecastStore;
}

export function createTestForecastStore(options: Omit<ForecastStoreOptions, 'clock'> = {}): TestForecastStore {
  const clock = createTestClock();
  const repository = new InMemoryForecastRepository({ clock, instanceId: 'test-instance', databaseName: 'weather_test' });
  const store = new ForecastStore(repository, { defaultTtlMinutes: 30, ...options, clock });
  return { clock, repository, store };
}
