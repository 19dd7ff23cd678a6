/**
 * Forecast File Naming Tests
 */

import * as os from 'os';
import * as path from 'path';
import {
  cityDirectoryName,
  forecastFileName,
  formatFileTimestamp,
  isMissingFileError,
  parseForecastFileName,
  readDirectory,
} from '../forecast-files';

describe('forecast files', () => {
  describe('formatFileTimestamp', () => {
    it('should format in UTC with zero padding', () => {
      expect(formatFileTimestamp(new Date('2025-03-04T05:06:07.890Z'))).toBe('2025-03-04_050607');
    });
  });

  describe('forecastFileName', () => {
    it('should pick the extension from the kind', () => {
      const timestamp = new Date('2025-06-01T12:00:00.000Z');

      expect(forecastFileName('text', timestamp)).toBe('forecast_text_2025-06-01_120000.txt');
      expect(forecastFileName('audio', timestamp)).toBe('forecast_audio_2025-06-01_120000.wav');
    });
  });

  describe('parseForecastFileName', () => {
    it('should read kind and timestamp', () => {
      expect(parseForecastFileName('forecast_audio_2025-06-01_115930.wav')).toEqual({
        kind: 'audio',
        timestamp: new Date('2025-06-01T11:59:30.000Z'),
      });
    });

    it('should reject a kind with the wrong extension', () => {
      expect(parseForecastFileName('forecast_text_2025-06-01_120000.wav')).toBeNull();
    });

    it('should reject dates that do not exist', () => {
      expect(parseForecastFileName('forecast_text_2025-02-30_120000.txt')).toBeNull();
      expect(parseForecastFileName('forecast_text_2025-06-01_246000.txt')).toBeNull();
    });

    it('should ignore unrelated files', () => {
      expect(parseForecastFileName('notes.txt')).toBeNull();
      expect(parseForecastFileName('forecast_text_2025-06-01_120000.txt.tmp')).toBeNull();
    });
  });

  describe('cityDirectoryName', () => {
    it('should lower-case and replace separators', () => {
      expect(cityDirectoryName('  New York ')).toBe('new_york');
      expect(cityDirectoryName('St. Louis')).toBe('st_louis');
    });

    it('should keep letters outside ASCII and hyphens', () => {
      expect(cityDirectoryName('São Paulo')).toBe('são_paulo');
      expect(cityDirectoryName('Winston-Salem')).toBe('winston-salem');
    });
  });

  describe('isMissingFileError', () => {
    it('should match ENOENT by code alone', () => {
      expect(isMissingFileError({ code: 'ENOENT', message: 'no such file or directory' })).toBe(true);
      expect(isMissingFileError(Object.assign(new Error('scandir failed'), { code: 'ENOENT' }))).toBe(true);
    });

    it('should not match other failures', () => {
      expect(isMissingFileError({ code: 'EACCES' })).toBe(false);
      expect(isMissingFileError(new Error('ENOENT'))).toBe(false);
      expect(isMissingFileError(null)).toBe(false);
    });
  });

  describe('readDirectory', () => {
    it('should return no entries for a directory that does not exist', async () => {
      await expect(readDirectory(path.join(os.tmpdir(), 'forecast-files-absent', 'chicago'))).resolves.toEqual([]);
    });
  });
});
