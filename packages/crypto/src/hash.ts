/**
 * Cryptographic hash functions (SHA-256, BLAKE2b-256)
 *
 * Both produce 32-byte digests and sit behind the same {@link Hasher}
 * contract. The free functions call through the default instances, so
 * there is one implementation per algorithm.
 *
 * @packageDocumentation
 */

import { sha256 as nobleSha256 } from '@noble/hashes/sha2.js';
import { blake2b } from '@noble/hashes/blake2.js';
import { bytesToHex } from './bytes.js';
import type { Digest, HashAlgorithm, Hasher } from './traits.js';

/** Digest length in bytes for every bound hash algorithm */
export const DIGEST_LENGTH: 32 = 32;

/**
 * SHA-256 (FIPS 180-4)
 */
export class Sha256Hasher implements Hasher {
  readonly algorithm: HashAlgorithm = 'sha-256';
  readonly outputLength: 32 = DIGEST_LENGTH;

  hash(data: Uint8Array): Digest {
    return nobleSha256(data);
  }
}

/**
 * BLAKE2b with a 32-byte output (RFC 7693), unkeyed
 */
export class Blake2b256Hasher implements Hasher {
  readonly algorithm: HashAlgorithm = 'blake2b-256';
  readonly outputLength: 32 = DIGEST_LENGTH;

  hash(data: Uint8Array): Digest {
    return blake2b(data, { dkLen: DIGEST_LENGTH });
  }
}

const defaultSha256 = new Sha256Hasher();
const defaultBlake2b256 = new Blake2b256Hasher();

const HASHERS: Record<HashAlgorithm, Hasher> = {
  'sha-256': defaultSha256,
  'blake2b-256': defaultBlake2b256,
};

/**
 * Compute the SHA-256 digest of data
 */
export function sha256(data: Uint8Array): Digest {
  return defaultSha256.hash(data);
}

/**
 * Compute the BLAKE2b-256 digest of data
 */
export function blake2b256(data: Uint8Array): Digest {
  return defaultBlake2b256.hash(data);
}

/**
 * Look up the hasher for an algorithm name
 */
export function getHasher(algorithm: HashAlgorithm): Hasher {
  return HASHERS[algorithm];
}

/**
 * Type guard for algorithm names coming from untyped input
 */
export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return Object.prototype.hasOwnProperty.call(HASHERS, value);
}

/**
 * Hash data and return the digest as lowercase hex (64 characters)
 */
export function hashHex(data: Uint8Array, algorithm: HashAlgorithm = 'sha-256'): string {
  return bytesToHex(getHasher(algorithm).hash(data));
}
