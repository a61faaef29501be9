/**
 * Multibase and multicodec helpers for public keys
 *
 * Only the base64url multibase (`u`) and the two public-key codecs bound
 * by this package are supported.
 */

import { base64urlDecode, base64urlEncode } from './base64url.js';
import { EncodingError } from './errors.js';

/** Multibase prefix for base64url without padding */
export const MULTIBASE_BASE64URL = 'u';

/** Multicodec codes for the public-key types of this package */
export const MULTICODEC = {
  'ed25519-pub': 0xed,
  'x25519-pub': 0xec,
} as const;

export type MulticodecName = keyof typeof MULTICODEC;

/**
 * Encode bytes as multibase base64url (`u` + base64url)
 */
export function encodeMultibase(bytes: Uint8Array): string {
  return MULTIBASE_BASE64URL + base64urlEncode(bytes);
}

/**
 * Decode a multibase string
 *
 * @throws {EncodingError} `CRYPTO_UNSUPPORTED_MULTIBASE` for any prefix
 *   other than `u`, or the base64url decode error of the remainder
 */
export function decodeMultibase(text: string): Uint8Array {
  if (!text.startsWith(MULTIBASE_BASE64URL)) {
    throw new EncodingError(
      'CRYPTO_UNSUPPORTED_MULTIBASE',
      `unsupported multibase prefix: ${JSON.stringify(text.slice(0, 1))}`
    );
  }
  return base64urlDecode(text.slice(1));
}

/**
 * Unsigned LEB128 varint, as used for multicodec prefixes
 */
export function encodeVarint(value: number): Uint8Array {
  const out: number[] = [];
  let rest = value;
  while (rest >= 0x80) {
    out.push((rest & 0x7f) | 0x80);
    rest >>>= 7;
  }
  out.push(rest);
  return Uint8Array.from(out);
}

/**
 * Read an unsigned varint from the start of bytes
 *
 * Only the minimal encoding is accepted: a trailing zero continuation byte
 * is rejected as `CRYPTO_NONCANONICAL_ENCODING`.
 *
 * @returns The value and the number of bytes it occupied
 */
export function decodeVarint(bytes: Uint8Array): { value: number; length: number } {
  let value = 0;
  let shift = 0;
  for (let i = 0; i < bytes.length && i < 4; i++) {
    const byte = bytes[i];
    value |= (byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) {
      if (byte === 0 && i > 0) {
        throw new EncodingError('CRYPTO_NONCANONICAL_ENCODING', 'multicodec varint is not minimally encoded');
      }
      return { value: value >>> 0, length: i + 1 };
    }
    shift += 7;
  }
  throw new EncodingError('CRYPTO_UNSUPPORTED_MULTICODEC', 'truncated or oversized multicodec varint');
}

/**
 * Prefix key bytes with their multicodec code
 */
export function encodeMulticodec(codec: MulticodecName, bytes: Uint8Array): Uint8Array {
  const prefix = encodeVarint(MULTICODEC[codec]);
  const out = new Uint8Array(prefix.length + bytes.length);
  out.set(prefix, 0);
  out.set(bytes, prefix.length);
  return out;
}

/**
 * Split multicodec-prefixed bytes into codec name and payload
 *
 * @throws {EncodingError} `CRYPTO_UNSUPPORTED_MULTICODEC` for unknown codes
 */
export function decodeMulticodec(bytes: Uint8Array): { codec: MulticodecName; bytes: Uint8Array } {
  const { value, length } = decodeVarint(bytes);
  for (const name of Object.keys(MULTICODEC)) {
    if (isMulticodecName(name) && MULTICODEC[name] === value) {
      return { codec: name, bytes: bytes.slice(length) };
    }
  }
  throw new EncodingError('CRYPTO_UNSUPPORTED_MULTICODEC', `unsupported multicodec code 0x${value.toString(16)}`);
}

function isMulticodecName(name: string): name is MulticodecName {
  return Object.prototype.hasOwnProperty.call(MULTICODEC, name);
}
