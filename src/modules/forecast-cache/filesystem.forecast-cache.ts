/**
 * Filesystem Forecast Cache
 * Zero-dependency backend for local development. Text and audio are separate
 * files paired by the timestamps in their names, so a text file only counts
 * as cached when an audio file stamped within a minute of it is also fresh.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Clock, systemClock } from '../../lib/clock';
import { normalizeCity, parseForecastAt } from '../forecast/forecast.store';
import {
  ForecastFile,
  cityDirectoryName,
  forecastFileName,
  parseForecastFileName,
  readDirectory,
  removeIfEmpty,
} from './forecast-files';
import {
  AudioRef,
  CacheCleanupResult,
  CacheLookup,
  ForecastCache,
  ForecastCacheStats,
  StoreReceipt,
} from './forecast-cache.types';

export const PAIRING_WINDOW_MS = 60_000;

export interface FileSystemForecastCacheOptions {
  outputDir: string;
  ttlMinutes?: number;
  clock?: Clock;
}

const newestFirst = (a: ForecastFile, b: ForecastFile): number =>
  b.timestamp.getTime() - a.timestamp.getTime() || b.name.localeCompare(a.name);

export class FileSystemForecastCache implements ForecastCache {
  readonly backend = 'filesystem';
  private readonly outputDir: string;
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: FileSystemForecastCacheOptions) {
    this.outputDir = options.outputDir;
    this.ttlMs = (options.ttlMinutes ?? 30) * 60_000;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Newest fresh text file with a fresh audio file stamped within a minute of it
   */
  async lookup(city: string): Promise<CacheLookup> {
    const now = this.clock().getTime();
    const files = await this.listForecastFiles(this.cityDirectory(city));
    const fresh = files.filter((file) => now - file.timestamp.getTime() < this.ttlMs);

    const text = fresh.filter((file) => file.kind === 'text').sort(newestFirst)[0];
    if (!text) {
      return { cached: false };
    }

    const audio = fresh
      .filter((file) => file.kind === 'audio')
      .sort(newestFirst)
      .find((file) => Math.abs(file.timestamp.getTime() - text.timestamp.getTime()) < PAIRING_WINDOW_MS);
    if (!audio) {
      return { cached: false };
    }

    return {
      cached: true,
      text: await fs.readFile(text.path, 'utf-8'),
      audio: { kind: 'file', path: audio.path },
      ageSeconds: Math.max(0, Math.floor((now - text.timestamp.getTime()) / 1000)),
      forecastAt: text.timestamp,
    };
  }

  async store(city: string, text: string, audio: AudioRef, forecastAt: Date): Promise<StoreReceipt> {
    const timestamp = parseForecastAt(forecastAt);
    const directory = this.cityDirectory(city);
    await fs.mkdir(directory, { recursive: true });

    const textPath = path.join(directory, forecastFileName('text', timestamp));
    const audioPath = path.join(directory, forecastFileName('audio', timestamp));

    // Write to a temporary name, then rename into place
    await fs.writeFile(`${textPath}.tmp`, text, 'utf-8');
    await fs.rename(`${textPath}.tmp`, textPath);

    if (audio.kind === 'file') {
      await fs.copyFile(audio.path, `${audioPath}.tmp`);
    } else {
      await fs.writeFile(`${audioPath}.tmp`, audio.data);
    }
    await fs.rename(`${audioPath}.tmp`, audioPath);

    return {
      backend: this.backend,
      textPath,
      audioPath,
      expiresAt: new Date(timestamp.getTime() + this.ttlMs),
    };
  }

  async stats(): Promise<ForecastCacheStats> {
    const cities = (await readDirectory(this.outputDir))
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    const cachedCities: string[] = [];
    for (const city of cities) {
      const result = await this.lookup(city);
      if (result.cached) {
        cachedCities.push(city);
      }
    }

    return {
      backend: this.backend,
      totalCities: cities.length,
      citiesWithValidCache: cachedCities.length,
      cachedCities,
      ttlSeconds: this.ttlMs / 1000,
    };
  }

  /**
   * Delete forecast files at least a TTL old, then empty city directories
   */
  async cleanup(): Promise<CacheCleanupResult> {
    const now = this.clock().getTime();
    let removed = 0;
    let remaining = 0;

    for (const entry of await readDirectory(this.outputDir)) {
      if (!entry.isDirectory()) {
        continue;
      }
      const directory = path.join(this.outputDir, entry.name);

      for (const file of await this.listForecastFiles(directory)) {
        if (now - file.timestamp.getTime() >= this.ttlMs) {
          await fs.rm(file.path, { force: true });
          removed++;
        } else {
          remaining++;
        }
      }
      await removeIfEmpty(directory);
    }

    if (removed > 0) {
      console.log(`FileSystemForecastCache: Removed ${removed} expired files (${remaining} remaining)`);
    }
    return { removed, remaining };
  }

  private cityDirectory(city: string): string {
    return path.join(this.outputDir, cityDirectoryName(normalizeCity(city)));
  }

  private async listForecastFiles(directory: string): Promise<ForecastFile[]> {
    const files: ForecastFile[] = [];
    for (const entry of await readDirectory(directory)) {
      const parsed = entry.isFile() ? parseForecastFileName(entry.name) : null;
      if (parsed) {
        files.push({ ...parsed, name: entry.name, path: path.join(directory, entry.name) });
      }
    }
    return files;
  }
}
