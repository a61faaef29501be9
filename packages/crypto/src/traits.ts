/**
 * Capability contracts
 *
 * One interface per cryptographic capability. Concrete algorithm types
 * implement the subset that applies to them, and generic code is written
 * against these interfaces instead of a concrete algorithm:
 *
 * ```ts
 * function attest<S>(signer: Signer<S, SigningError>, body: Uint8Array) {
 *   return signer.sign(body);
 * }
 * ```
 *
 * Each contract carries its output and error types as parameters, so an
 * algorithm returns its own signature or public key type and the error
 * kind shows up in the signature of every call.
 *
 * @packageDocumentation
 */

import type { Result } from './result.js';

/** 32-byte hash output */
export type Digest = Uint8Array;

/**
 * 32-byte Diffie-Hellman output
 *
 * Not a symmetric key: pass it through a KDF before using it as one.
 */
export type SharedSecret = Uint8Array;

/** Names of the hash algorithms bound by this package */
export type HashAlgorithm = 'sha-256' | 'blake2b-256';

/**
 * Produce signatures over arbitrary messages
 *
 * Any byte sequence is a valid message; `sign` fails only on an internal
 * error.
 */
export interface Signer<TSignature, E extends Error> {
  sign(message: Uint8Array): Result<TSignature, E>;
}

/**
 * Check signatures using public material only
 *
 * Mismatch, malformed input and wrong length are one and the same failure.
 */
export interface Verifier<TSignature, E extends Error> {
  verify(message: Uint8Array, signature: TSignature): Result<void, E>;
}

/**
 * Fixed-output hash function; pure and total
 */
export interface Hasher {
  readonly algorithm: HashAlgorithm;
  readonly outputLength: 32;
  hash(data: Uint8Array): Digest;
}

/**
 * Diffie-Hellman key agreement
 *
 * Fails only when `theirPublicKey` is not usable (including low-order
 * points, which must be rejected).
 */
export interface KeyAgreement<TPublicKey, E extends Error> {
  diffieHellman(theirPublicKey: TPublicKey): Result<SharedSecret, E>;
}

/**
 * Mutable byte container for in-place AEAD
 *
 * `encrypt` replaces `data` with ciphertext ‖ tag; `decrypt` replaces it
 * with the plaintext, or zeroes and empties it on failure.
 */
export interface AeadBuffer {
  data: Uint8Array;
}

/**
 * Authenticated encryption with associated data
 *
 * The caller supplies key and nonce and must never reuse a nonce under the
 * same key. Implementations neither generate nor track nonces.
 */
export interface Aead<E extends Error> {
  readonly keyLength: number;
  readonly nonceLength: number;
  readonly tagLength: number;
  encrypt(key: Uint8Array, nonce: Uint8Array, aad: Uint8Array, buffer: AeadBuffer): Result<void, E>;
  decrypt(key: Uint8Array, nonce: Uint8Array, aad: Uint8Array, buffer: AeadBuffer): Result<void, E>;
}

/**
 * Owned key material with a cached public half
 */
export interface KeyPair<TPublicKey> {
  readonly publicKey: TPublicKey;
  publicKeyBytes(): Uint8Array;
  /** Copy of the secret key bytes; the caller owns the copy */
  secretKeyBytes(): Uint8Array;
}

/**
 * Entropy source for key generation
 */
export interface RandomSource {
  /** Fill `dest` entirely with random bytes */
  fillBytes(dest: Uint8Array): void;
}
