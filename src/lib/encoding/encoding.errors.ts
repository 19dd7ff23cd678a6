/**
 * Codec Errors
 */

export class EncodingError extends Error {
  readonly code = 'ENCODING_ERROR';

  constructor(message: string, public readonly encoding: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

export class DecodingError extends Error {
  readonly code = 'DECODING_ERROR';

  constructor(message: string, public readonly encoding: string) {
    super(message);
    this.name = 'DecodingError';
  }
}
