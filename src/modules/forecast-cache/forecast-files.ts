/**
 * Forecast Files
 * Naming and directory helpers for forecasts kept on disk:
 * OUTPUT_DIR/<city>/forecast_text_YYYY-MM-DD_HHMMSS.txt and
 * forecast_audio_YYYY-MM-DD_HHMMSS.wav, stamped in UTC.
 */

import { Dirent } from 'fs';
import * as fs from 'fs/promises';

export type ForecastFileKind = 'text' | 'audio';

export interface ForecastFile {
  kind: ForecastFileKind;
  name: string;
  path: string;
  timestamp: Date;
}

const FILE_PATTERN = /^forecast_(text|audio)_(\d{4})-(\d{2})-(\d{2})_(\d{2})(\d{2})(\d{2})\.(txt|wav)$/;
const EXTENSIONS: Record<ForecastFileKind, string> = { text: 'txt', audio: 'wav' };

const pad = (value: number): string => String(value).padStart(2, '0');

// fs errors may come from another realm, so no instanceof Error
export const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * YYYY-MM-DD_HHMMSS in UTC
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

export function forecastFileName(kind: ForecastFileKind, timestamp: Date): string {
  return `forecast_${kind}_${formatFileTimestamp(timestamp)}.${EXTENSIONS[kind]}`;
}

/**
 * Kind and timestamp encoded in a forecast file name, or null for any other file
 */
export function parseForecastFileName(name: string): { kind: ForecastFileKind; timestamp: Date } | null {
  const match = FILE_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const [, kind, year, month, day, hours, minutes, seconds, extension] = match;
  if (kind !== 'text' && kind !== 'audio') {
    return null;
  }
  if (EXTENSIONS[kind] !== extension) {
    return null;
  }

  const timestamp = new Date(Date.UTC(+year, +month - 1, +day, +hours, +minutes, +seconds));
  // Reject rolled-over dates such as 2025-02-30
  if (formatFileTimestamp(timestamp) !== `${year}-${month}-${day}_${hours}${minutes}${seconds}`) {
    return null;
  }
  return { kind, timestamp };
}

/**
 * Directory name for a city: lower-cased, with anything but letters,
 * digits and hyphens collapsed to underscores
 */
export function cityDirectoryName(city: string): string {
  return city.trim().toLowerCase().replace(/[^\p{L}\p{N}-]+/gu, '_');
}

/**
 * Directory entries, or none when the directory does not exist
 */
export async function readDirectory(directory: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Remove a directory if nothing is left in it
 */
export async function removeIfEmpty(directory: string): Promise<boolean> {
  const entries = await readDirectory(directory);
  if (entries.length > 0) {
    return false;
  }
  try {
    await fs.rmdir(directory);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}
