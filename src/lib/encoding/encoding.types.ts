/**
 * Encoding Types
 * Supported text encodings and codec result shapes
 */

export const SUPPORTED_ENCODINGS = {
  'utf-8': 'Universal (recommended for most languages)',
  'utf-16': 'Denser for Chinese, Japanese and Korean text',
  'utf-32': 'Fixed-width unicode',
} as const;

export type TextEncoding = keyof typeof SUPPORTED_ENCODINGS;

export const UNIVERSAL_ENCODING: TextEncoding = 'utf-8';
export const WIDE_ENCODING: TextEncoding = 'utf-16';

export function isSupportedEncoding(value: unknown): value is TextEncoding {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SUPPORTED_ENCODINGS, value);
}

export interface EncodedText {
  bytes: Buffer;
  byteLength: number;
  encoding: TextEncoding;
}

/**
 * Result of a best-effort decode. `substituted` is true when invalid
 * sequences were replaced with U+FFFD.
 */
export interface LenientDecodeResult {
  text: string;
  substituted: boolean;
}
