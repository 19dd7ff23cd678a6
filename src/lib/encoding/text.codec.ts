/**
 * Text Codec
 * Lossless conversion between unicode text and the supported byte encodings,
 * plus the heuristic that picks a default encoding for a piece of text.
 *
 * utf-16 and utf-32 output carries a little-endian byte order mark. Decoding
 * honours either byte order mark and assumes little-endian when none is present.
 */

import {
  EncodedText,
  LenientDecodeResult,
  SUPPORTED_ENCODINGS,
  TextEncoding,
  UNIVERSAL_ENCODING,
  WIDE_ENCODING,
  isSupportedEncoding,
} from './encoding.types';
import { DecodingError, EncodingError } from './encoding.errors';

const REPLACEMENT_CHARACTER = '\uFFFD';
const UTF16_LE_BOM = Buffer.from([0xff, 0xfe]);
const UTF32_LE_BOM = Buffer.from([0xff, 0xfe, 0x00, 0x00]);
const CJK_THRESHOLD = 0.5;

// Chinese ideographs, hiragana, katakana, hangul syllables
const DENSE_SCRIPT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x4e00, 0x9fff],
  [0x3040, 0x309f],
  [0x30a0, 0x30ff],
  [0xac00, 0xd7af],
];

const supportedList = (): string => Object.keys(SUPPORTED_ENCODINGS).join(', ');

const toBuffer = (bytes: Uint8Array): Buffer =>
  Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff;
const isLowSurrogate = (unit: number): boolean => unit >= 0xdc00 && unit <= 0xdfff;

/**
 * Index of the first unpaired surrogate code unit, or -1.
 */
function findLoneSurrogate(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    if (isHighSurrogate(unit)) {
      if (i + 1 < text.length && isLowSurrogate(text.charCodeAt(i + 1))) {
        i++;
        continue;
      }
      return i;
    }
    if (isLowSurrogate(unit)) {
      return i;
    }
  }
  return -1;
}

function encodeUtf32(text: string): Buffer {
  const codePoints = Array.from(text, (char) => char.codePointAt(0) ?? 0);
  const buffer = Buffer.alloc(UTF32_LE_BOM.length + codePoints.length * 4);
  UTF32_LE_BOM.copy(buffer, 0);
  codePoints.forEach((codePoint, index) => {
    buffer.writeUInt32LE(codePoint, UTF32_LE_BOM.length + index * 4);
  });
  return buffer;
}

function encodeBytes(text: string, encoding: TextEncoding): Buffer {
  switch (encoding) {
    case 'utf-8':
      return Buffer.from(text, 'utf8');
    case 'utf-16':
      return Buffer.concat([UTF16_LE_BOM, Buffer.from(text, 'utf16le')]);
    case 'utf-32':
      return encodeUtf32(text);
  }
}

function decodeUtf8(bytes: Buffer, strict: boolean): LenientDecodeResult {
  const decoder = new TextDecoder('utf-8', { fatal: strict, ignoreBOM: true });
  try {
    const text = decoder.decode(bytes);
    return { text, substituted: !strict && text.includes(REPLACEMENT_CHARACTER) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodingError(`Cannot decode text with utf-8. Data may be corrupted: ${reason}`, 'utf-8');
  }
}

function decodeUtf16(bytes: Buffer, strict: boolean): LenientDecodeResult {
  let offset = 0;
  let littleEndian = true;
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    offset = 2;
  } else if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    offset = 2;
    littleEndian = false;
  }

  const fail = (reason: string): never => {
    throw new DecodingError(`Cannot decode text with utf-16. Data may be corrupted: ${reason}`, 'utf-16');
  };

  let substituted = false;
  const payloadLength = bytes.length - offset;
  if (payloadLength % 2 !== 0) {
    if (strict) fail(`odd byte length ${bytes.length}`);
    substituted = true;
  }

  const unitCount = Math.floor(payloadLength / 2);
  const units: number[] = [];
  for (let i = 0; i < unitCount; i++) {
    const position = offset + i * 2;
    units.push(littleEndian ? bytes.readUInt16LE(position) : bytes.readUInt16BE(position));
  }

  const parts: string[] = [];
  for (let i = 0; i < units.length; i++) {
    const unit = units[i];
    if (isHighSurrogate(unit) && i + 1 < units.length && isLowSurrogate(units[i + 1])) {
      parts.push(String.fromCharCode(unit, units[i + 1]));
      i++;
    } else if (isHighSurrogate(unit) || isLowSurrogate(unit)) {
      if (strict) fail(`unpaired surrogate 0x${unit.toString(16)} at code unit ${i}`);
      parts.push(REPLACEMENT_CHARACTER);
      substituted = true;
    } else {
      parts.push(String.fromCharCode(unit));
    }
  }
  if (payloadLength % 2 !== 0) {
    parts.push(REPLACEMENT_CHARACTER);
  }

  return { text: parts.join(''), substituted };
}

function decodeUtf32(bytes: Buffer, strict: boolean): LenientDecodeResult {
  let offset = 0;
  let littleEndian = true;
  if (bytes.length >= 4 && bytes.readUInt32LE(0) === 0xfeff) {
    offset = 4;
  } else if (bytes.length >= 4 && bytes.readUInt32BE(0) === 0xfeff) {
    offset = 4;
    littleEndian = false;
  }

  const fail = (reason: string): never => {
    throw new DecodingError(`Cannot decode text with utf-32. Data may be corrupted: ${reason}`, 'utf-32');
  };

  let substituted = false;
  const payloadLength = bytes.length - offset;
  if (payloadLength % 4 !== 0) {
    if (strict) fail(`byte length ${bytes.length} is not a multiple of 4`);
    substituted = true;
  }

  const parts: string[] = [];
  const count = Math.floor(payloadLength / 4);
  for (let i = 0; i < count; i++) {
    const position = offset + i * 4;
    const codePoint = littleEndian ? bytes.readUInt32LE(position) : bytes.readUInt32BE(position);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      if (strict) fail(`invalid code point 0x${codePoint.toString(16)} at index ${i}`);
      parts.push(REPLACEMENT_CHARACTER);
      substituted = true;
    } else {
      parts.push(String.fromCodePoint(codePoint));
    }
  }
  if (payloadLength % 4 !== 0) {
    parts.push(REPLACEMENT_CHARACTER);
  }

  return { text: parts.join(''), substituted };
}

function decodeWith(bytes: Uint8Array, encoding: string, strict: boolean): LenientDecodeResult {
  if (!isSupportedEncoding(encoding)) {
    throw new DecodingError(`Unsupported encoding: ${encoding}. Supported: ${supportedList()}`, encoding);
  }
  const buffer = toBuffer(bytes);
  switch (encoding) {
    case 'utf-8':
      return decodeUtf8(buffer, strict);
    case 'utf-16':
      return decodeUtf16(buffer, strict);
    case 'utf-32':
      return decodeUtf32(buffer, strict);
  }
}

/**
 * Encode text for storage.
 *
 * @throws EncodingError when the encoding is unsupported or the text holds
 * code units no supported encoding can represent (unpaired surrogates)
 */
export function encodeText(text: string, encoding: string = UNIVERSAL_ENCODING): EncodedText {
  if (!isSupportedEncoding(encoding)) {
    throw new EncodingError(`Unsupported encoding: ${encoding}. Supported: ${supportedList()}`, encoding);
  }

  const loneSurrogate = findLoneSurrogate(text);
  if (loneSurrogate !== -1) {
    throw new EncodingError(
      `Cannot encode text with ${encoding}: unpaired surrogate at index ${loneSurrogate}`,
      encoding
    );
  }

  const bytes = encodeBytes(text, encoding);

  return { bytes, byteLength: bytes.length, encoding };
}

/**
 * Decode stored bytes. Any invalid sequence is a DecodingError.
 */
export function decodeText(bytes: Uint8Array, encoding: string = UNIVERSAL_ENCODING): string {
  return decodeWith(bytes, encoding, true).text;
}

/**
 * Decode stored bytes, falling back to replacement characters when the
 * strict decode fails. Unsupported encodings still throw.
 */
export function decodeTextLenient(bytes: Uint8Array, encoding: string = UNIVERSAL_ENCODING): LenientDecodeResult {
  try {
    return decodeWith(bytes, encoding, true);
  } catch (error) {
    if (!(error instanceof DecodingError) || !isSupportedEncoding(encoding)) {
      throw error;
    }
    const fallback = decodeWith(bytes, encoding, false);
    return { text: fallback.text, substituted: true };
  }
}

/**
 * Pick utf-16 when more than half of the code points are CJK, utf-8 otherwise.
 */
export function detectDefaultEncoding(text: string): TextEncoding {
  let total = 0;
  let dense = 0;
  for (const char of text) {
    total++;
    const codePoint = char.codePointAt(0) ?? 0;
    if (DENSE_SCRIPT_RANGES.some(([start, end]) => codePoint >= start && codePoint <= end)) {
      dense++;
    }
  }

  if (total > 0 && dense / total > CJK_THRESHOLD) {
    return WIDE_ENCODING;
  }
  return UNIVERSAL_ENCODING;
}

/**
 * Number of unicode code points (not UTF-16 code units).
 */
export function countCharacters(text: string): number {
  return Array.from(text).length;
}
