/**
 * Cached Weather Provider Tests
 */

import { CachedWeatherProvider } from '../cached-weather.provider';
import { WeatherProvider, WeatherSummary } from '../weather.types';

const chicagoWeather: WeatherSummary = {
  city: 'Chicago',
  country: 'US',
  temperature: 75,
  feelsLike: 77,
  humidity: 40,
  description: 'clear sky',
  windSpeed: 8,
  units: 'imperial',
};

describe('CachedWeatherProvider', () => {
  let now: number;
  let fetchCurrent: jest.Mock<Promise<WeatherSummary>, [string]>;
  let provider: CachedWeatherProvider;

  beforeEach(() => {
    now = 1_000_000;
    fetchCurrent = jest.fn(async (_city: string) => chicagoWeather);
    const upstream: WeatherProvider = { fetchCurrent };
    provider = new CachedWeatherProvider(upstream, { ttlSeconds: 600, now: () => now });
  });

  it('should serve repeated lookups from the cache', async () => {
    await expect(provider.fetchCurrent('chicago')).resolves.toEqual(chicagoWeather);
    await expect(provider.fetchCurrent('chicago')).resolves.toEqual(chicagoWeather);

    expect(fetchCurrent).toHaveBeenCalledTimes(1);
    expect(fetchCurrent).toHaveBeenCalledWith('chicago');
  });

  it('should share one entry across case and surrounding whitespace', async () => {
    await provider.fetchCurrent('Chicago');
    await provider.fetchCurrent('  CHICAGO ');

    expect(fetchCurrent).toHaveBeenCalledTimes(1);
    expect(provider.size()).toBe(1);
  });

  it('should fetch again once the TTL has elapsed', async () => {
    await provider.fetchCurrent('chicago');
    now += 600_000;
    await provider.fetchCurrent('chicago');

    expect(fetchCurrent).toHaveBeenCalledTimes(2);
  });

  it('should default to the configured weather cache TTL', async () => {
    const defaults = new CachedWeatherProvider({ fetchCurrent }, { now: () => now });

    await defaults.fetchCurrent('chicago');
    now += 899_999;
    await defaults.fetchCurrent('chicago');
    now += 1;
    await defaults.fetchCurrent('chicago');

    expect(fetchCurrent).toHaveBeenCalledTimes(2);
  });

  it('should not cache failures', async () => {
    fetchCurrent.mockRejectedValueOnce(new Error('upstream unavailable'));

    await expect(provider.fetchCurrent('chicago')).rejects.toThrow('upstream unavailable');
    await expect(provider.fetchCurrent('chicago')).resolves.toEqual(chicagoWeather);
    expect(fetchCurrent).toHaveBeenCalledTimes(2);
  });

  it('should sweep stale entries and clear on demand', async () => {
    await provider.fetchCurrent('chicago');
    now += 300_000;
    await provider.fetchCurrent('beijing');
    now += 300_000;

    expect(provider.sweep()).toBe(1);
    expect(provider.size()).toBe(1);

    provider.clear();
    expect(provider.size()).toBe(0);
  });
});
