/**
 * Test Fixtures
 * Reusable test data
 */

import { Clock } from '../../lib/clock';

export const FIXED_NOW = new Date('2025-06-01T12:00:00.000Z');

export const MINUTE_MS = 60 * 1000;

export const sampleTexts = {
  english: 'Sunny, 75°F',
  // 12 of 13 code points are CJK ideographs
  chinese: '今天天气晴朗，气温二十五度',
  japanese: 'きょうははれです',
  korean: '오늘은 맑음',
  emoji: 'Clear skies \u{1F324}\u{FE0F} tonight',
};

// Placeholder bytes; the store never parses audio
export const sampleAudio = Buffer.from('RIFF test-audio WAVE');

export interface TestClock extends Clock {
  advance(ms: number): void;
  set(date: Date): void;
}

/**
 * Manually advanced clock starting at FIXED_NOW
 */
export function createTestClock(start: Date = FIXED_NOW): TestClock {
  let current = start.getTime();
  const clock = (): Date => new Date(current);
  return Object.assign(clock, {
    advance: (ms: number) => {
      current += ms;
    },
    set: (date: Date) => {
      current = date.getTime();
    },
  });
}
