/**
 * Base64url encoding/decoding (RFC 4648 §5, no padding)
 *
 * The canonical text form of every binary artifact this package produces.
 * Decoding is strict: exactly one string decodes to a given byte sequence,
 * so any other runtime implementing the same rules stays byte-compatible.
 */

import { EncodingError } from './errors.js';

const ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * Encode bytes to base64url string (no padding)
 */
export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Decode base64url string to bytes
 *
 * @throws {EncodingError} `CRYPTO_INVALID_ENCODING_CHARACTER` for characters
 *   outside `A-Za-z0-9-_` (padding `=` included), `CRYPTO_INVALID_ENCODING_LENGTH`
 *   when no byte sequence encodes to that length, `CRYPTO_NONCANONICAL_ENCODING`
 *   when the last character carries non-zero unused bits
 */
export function base64urlDecode(str: string): Uint8Array {
  if (!ALPHABET.test(str)) {
    throw new EncodingError(
      'CRYPTO_INVALID_ENCODING_CHARACTER',
      'base64url input contains a character outside the url-safe alphabet'
    );
  }
  if (str.length % 4 === 1) {
    throw new EncodingError(
      'CRYPTO_INVALID_ENCODING_LENGTH',
      `base64url input length ${str.length} is not a valid encoded length`
    );
  }

  const bytes = new Uint8Array(Buffer.from(str, 'base64url'));

  // Buffer ignores unused trailing bits; re-encoding exposes them
  if (base64urlEncode(bytes) !== str) {
    throw new EncodingError(
      'CRYPTO_NONCANONICAL_ENCODING',
      'base64url input has non-zero trailing bits'
    );
  }

  return bytes;
}

/**
 * Encode UTF-8 string to base64url
 */
export function base64urlEncodeString(str: string): string {
  return base64urlEncode(new TextEncoder().encode(str));
}

/**
 * Decode base64url to UTF-8 string
 */
export function base64urlDecodeString(str: string): string {
  return new TextDecoder().decode(base64urlDecode(str));
}
