/**
 * Byte helpers shared by the algorithm modules
 */

import { EncodingError } from './errors.js';

/**
 * Compare two byte arrays without an early exit on the first difference
 *
 * Runs in time that depends only on the lengths, never on where the
 * contents differ.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * True when every byte is zero, evaluated over the whole array
 */
export function isAllZero(bytes: Uint8Array): boolean {
  let acc = 0;
  for (let i = 0; i < bytes.length; i++) {
    acc |= bytes[i];
  }
  return acc === 0;
}

/**
 * Convert hex string to Uint8Array
 *
 * @param hex - Hex string, either case
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new EncodingError('CRYPTO_INVALID_ENCODING_CHARACTER', 'Invalid hex string');
  }
  if (hex.length % 2 !== 0) {
    throw new EncodingError('CRYPTO_INVALID_ENCODING_LENGTH', 'Invalid hex string');
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}
