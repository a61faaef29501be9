/**
 * Process-wide secure randomness
 *
 * Backed by the platform CSPRNG (`crypto.getRandomValues`) through
 * @noble/hashes. There is no way to seed it; the deterministic generator
 * used by tests lives in the separate testkit entry point.
 */

import { randomBytes as nobleRandomBytes } from '@noble/hashes/utils.js';
import { RandomnessError } from './errors.js';
import type { RandomSource } from './traits.js';

/**
 * Generate `length` cryptographically secure random bytes
 *
 * @throws {RandomnessError} When the platform CSPRNG is unavailable
 */
export function randomBytes(length: number): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = nobleRandomBytes(length);
  } catch (error) {
    throw new RandomnessError(
      `secure random source unavailable: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (bytes.length !== length) {
    throw new RandomnessError(`expected ${length} random bytes, got ${bytes.length}`);
  }
  return bytes;
}

/**
 * The process-wide secure random source
 *
 * Stateless; safe to share between any number of callers.
 */
export const systemRandom: RandomSource = {
  fillBytes(dest: Uint8Array): void {
    dest.set(randomBytes(dest.length));
  },
};

/**
 * Draw exactly `length` bytes from a random source
 */
export function drawBytes(source: RandomSource, length: number): Uint8Array {
  const out = new Uint8Array(length);
  source.fillBytes(out);
  return out;
}
