/**
 * Stratum Crypto Test Kit
 *
 * This module contains utilities for TEST FIXTURES ONLY.
 * These functions are NOT exported from the main entry point.
 *
 * Import path: @stratum/crypto/testkit
 *
 * SECURITY: Never use these in production. Every key produced through this
 * module is predictable by anyone who knows the seed.
 */

import { chacha20 } from '@noble/ciphers/chacha.js';
import { Ed25519Keypair } from './ed25519.js';
import { KeyError, RandomnessError } from './errors.js';
import type { RandomSource } from './traits.js';
import { X25519Keypair } from './x25519.js';

const SEED_LENGTH = 32;

function checkSeed(seed: Uint8Array): void {
  if (seed.length !== SEED_LENGTH) {
    throw new KeyError('CRYPTO_INVALID_SEED_LENGTH', `seed must be ${SEED_LENGTH} bytes, got ${seed.length}`);
  }
}

/**
 * Deterministic random source for reproducible tests
 *
 * WARNING: FOR TEST FIXTURES ONLY. DO NOT USE IN PRODUCTION.
 *
 * Each call to `fillBytes` takes a fresh ChaCha20 keystream under the seed,
 * with the call number as nonce, so two sources built from the same seed
 * return the same bytes for the same sequence of requests.
 */
export function createSeededRandom(seed: Uint8Array): RandomSource {
  checkSeed(seed);
  const key = Uint8Array.from(seed);
  let calls = 0;
  return {
    fillBytes(dest: Uint8Array): void {
      const nonce = new Uint8Array(12);
      new DataView(nonce.buffer).setUint32(0, calls, true);
      calls += 1;
      dest.set(chacha20(key, nonce, new Uint8Array(dest.length)));
    },
  };
}

/**
 * Random source that replays fixed bytes and then fails
 *
 * WARNING: FOR TEST FIXTURES ONLY. DO NOT USE IN PRODUCTION.
 */
export function createFixedRandom(bytes: Uint8Array): RandomSource {
  const pool = Uint8Array.from(bytes);
  let offset = 0;
  return {
    fillBytes(dest: Uint8Array): void {
      if (offset + dest.length > pool.length) {
        throw new RandomnessError(
          `fixed random source exhausted: ${pool.length - offset} bytes left, ${dest.length} requested`
        );
      }
      dest.set(pool.subarray(offset, offset + dest.length));
      offset += dest.length;
    },
  };
}

/**
 * Generate an Ed25519 key pair whose secret key is exactly `seed`
 *
 * WARNING: FOR TEST FIXTURES ONLY. DO NOT USE IN PRODUCTION.
 *
 * @example
 * ```ts
 * import { ed25519KeypairFromSeed } from '@stratum/crypto/testkit';
 *
 * const seed = Uint8Array.from({ length: 32 }, (_, i) => i + 1);
 * const keypair = ed25519KeypairFromSeed(seed);
 * ```
 */
export function ed25519KeypairFromSeed(seed: Uint8Array): Ed25519Keypair {
  checkSeed(seed);
  return Ed25519Keypair.generate(createFixedRandom(seed));
}

/**
 * Generate an X25519 key pair whose (unclamped) scalar is exactly `seed`
 *
 * WARNING: FOR TEST FIXTURES ONLY. DO NOT USE IN PRODUCTION.
 */
export function x25519KeypairFromSeed(seed: Uint8Array): X25519Keypair {
  checkSeed(seed);
  return X25519Keypair.generate(createFixedRandom(seed));
}
