/**
 * Forecast File Cleanup
 * Removes local forecast files older than the retention period, whatever
 * their name, and drops city directories left empty.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describeError } from '../../lib/errors/store.errors';
import { isMissingFileError, readDirectory, removeIfEmpty } from './forecast-files';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PurgeOptions {
  outputDir: string;
  maxAgeDays: number;
  now?: Date;
}

export interface PurgeResult {
  deletedFiles: number;
  bytesFreed: number;
  removedDirectories: number;
}

export async function purgeStaleFiles(options: PurgeOptions): Promise<PurgeResult> {
  const now = (options.now ?? new Date()).getTime();
  const maxAgeMs = options.maxAgeDays * DAY_MS;
  const result: PurgeResult = { deletedFiles: 0, bytesFreed: 0, removedDirectories: 0 };

  for (const cityEntry of await readDirectory(options.outputDir)) {
    if (!cityEntry.isDirectory()) {
      continue;
    }
    const cityPath = path.join(options.outputDir, cityEntry.name);

    for (const entry of await readDirectory(cityPath)) {
      if (!entry.isFile()) {
        continue;
      }
      const filePath = path.join(cityPath, entry.name);
      try {
        const stats = await fs.stat(filePath);
        if (now - stats.mtimeMs > maxAgeMs) {
          await fs.unlink(filePath);
          result.deletedFiles++;
          result.bytesFreed += stats.size;
        }
      } catch (error) {
        // Another sweep may have removed it first
        if (!isMissingFileError(error)) {
          console.warn(`File cleanup: Failed to delete ${filePath}:`, describeError(error));
        }
      }
    }

    try {
      if (await removeIfEmpty(cityPath)) {
        result.removedDirectories++;
      }
    } catch (error) {
      console.warn(`File cleanup: Failed to remove directory ${cityPath}:`, describeError(error));
    }
  }

  if (result.deletedFiles > 0) {
    console.log(
      `🧹 File cleanup: ${result.deletedFiles} files deleted, ` +
        `${(result.bytesFreed / 1024).toFixed(2)} KB freed (older than ${options.maxAgeDays} days)`
    );
  }
  return result;
}
