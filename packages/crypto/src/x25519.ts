/**
 * X25519 Diffie-Hellman key agreement (RFC 7748)
 *
 * Scalar multiplication comes from @noble/curves. Low-order public keys are
 * rejected here before the library is called, and an all-zero result is
 * rejected after it; either would otherwise hand the caller a shared secret
 * an attacker can predict.
 */

import { x25519 } from '@noble/curves/ed25519.js';
import { base64urlEncode } from './base64url.js';
import { constantTimeEqual, hexToBytes, isAllZero } from './bytes.js';
import { KeyAgreementError, KeyError } from './errors.js';
import { drawBytes, systemRandom } from './random.js';
import { err, ok, type Result } from './result.js';
import type { KeyAgreement, KeyPair, RandomSource, SharedSecret } from './traits.js';

export const X25519_SECRET_KEY_LENGTH = 32;
export const X25519_PUBLIC_KEY_LENGTH = 32;
export const X25519_SHARED_SECRET_LENGTH = 32;

/**
 * u-coordinates of small-order points, top bit cleared
 *
 * 0 and 1, the two order-8 points, and p-1, p, p+1.
 */
const LOW_ORDER_POINTS: readonly Uint8Array[] = [
  '0000000000000000000000000000000000000000000000000000000000000000',
  '0100000000000000000000000000000000000000000000000000000000000000',
  'e0eb7a7c3b41b8ae1656e3faf19fc46ada098deb9c32b1fd866205165f49b800',
  '5f9c95bca3508c24b1d0b1559c83ef5b04445cc4581c8e86d8224eddd09f1157',
  'ecffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  'edffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  'eeffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
].map(hexToBytes);

/**
 * True when the encoded u-coordinate is one of the small-order points
 *
 * Compares against every entry so the time taken does not depend on which
 * one (if any) matched.
 */
export function isLowOrderPoint(publicKey: Uint8Array): boolean {
  const masked = Uint8Array.from(publicKey);
  masked[masked.length - 1] &= 0x7f;
  let found = false;
  for (const point of LOW_ORDER_POINTS) {
    found = constantTimeEqual(masked, point) || found;
  }
  return found;
}

/**
 * Apply RFC 7748 §5 clamping to a copy of a 32-byte scalar
 */
export function clampScalar(scalar: Uint8Array): Uint8Array {
  const k = Uint8Array.from(scalar);
  k[0] &= 248;
  k[31] &= 127;
  k[31] |= 64;
  return k;
}

/**
 * X25519 public key (Montgomery u-coordinate)
 */
export class X25519PublicKey {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Import a 32-byte public key
   *
   * Only the length is checked here; point validity is checked by
   * {@link X25519Keypair.diffieHellman}.
   *
   * @throws {KeyError} `CRYPTO_INVALID_KEY_LENGTH` unless exactly 32 bytes
   */
  static fromBytes(bytes: Uint8Array): X25519PublicKey {
    if (bytes.length !== X25519_PUBLIC_KEY_LENGTH) {
      throw new KeyError(
        'CRYPTO_INVALID_KEY_LENGTH',
        `X25519 public key must be ${X25519_PUBLIC_KEY_LENGTH} bytes, got ${bytes.length}`
      );
    }
    return new X25519PublicKey(Uint8Array.from(bytes));
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toBase64url(): string {
    return base64urlEncode(this.bytes);
  }

  equals(other: X25519PublicKey): boolean {
    return constantTimeEqual(this.bytes, other.toBytes());
  }
}

/**
 * X25519 key pair
 *
 * The secret scalar is clamped on construction, so the stored bytes are
 * already in the form RFC 7748 multiplies by.
 */
export class X25519Keypair
  implements KeyPair<X25519PublicKey>, KeyAgreement<X25519PublicKey, KeyAgreementError>
{
  private readonly secretKey: Uint8Array;
  readonly publicKey: X25519PublicKey;

  private constructor(secretKey: Uint8Array) {
    this.secretKey = clampScalar(secretKey);
    this.publicKey = X25519PublicKey.fromBytes(x25519.getPublicKey(this.secretKey));
  }

  /**
   * Generate a key pair from exactly 32 bytes of the random source
   */
  static generate(random: RandomSource = systemRandom): X25519Keypair {
    return new X25519Keypair(drawBytes(random, X25519_SECRET_KEY_LENGTH));
  }

  /**
   * Rebuild a key pair from a stored 32-byte scalar (clamped on import)
   *
   * @throws {KeyError} `CRYPTO_INVALID_KEY_LENGTH` unless exactly 32 bytes
   */
  static fromSecretKey(secretKey: Uint8Array): X25519Keypair {
    if (secretKey.length !== X25519_SECRET_KEY_LENGTH) {
      throw new KeyError(
        'CRYPTO_INVALID_KEY_LENGTH',
        `X25519 secret key must be ${X25519_SECRET_KEY_LENGTH} bytes, got ${secretKey.length}`
      );
    }
    return new X25519Keypair(secretKey);
  }

  /**
   * Compute the 32-byte shared secret with another party's public key
   *
   * Fails with {@link KeyAgreementError} for low-order points and for any
   * key that yields an all-zero secret.
   */
  diffieHellman(theirPublicKey: X25519PublicKey): Result<SharedSecret, KeyAgreementError> {
    const theirs = theirPublicKey.toBytes();
    if (isLowOrderPoint(theirs)) {
      return err(new KeyAgreementError('public key is a low-order point'));
    }
    let shared: Uint8Array;
    try {
      shared = x25519.getSharedSecret(this.secretKey, theirs);
    } catch {
      return err(new KeyAgreementError());
    }
    if (isAllZero(shared)) {
      return err(new KeyAgreementError('key agreement produced an all-zero secret'));
    }
    return ok(shared);
  }

  publicKeyBytes(): Uint8Array {
    return this.publicKey.toBytes();
  }

  /** Copy of the clamped secret scalar */
  secretKeyBytes(): Uint8Array {
    return Uint8Array.from(this.secretKey);
  }
}

/**
 * Generate a random X25519 key pair
 */
export function generateX25519Keypair(): X25519Keypair {
  return X25519Keypair.generate();
}

/**
 * Diffie-Hellman over raw bytes: our secret scalar, their public key
 *
 * @throws {KeyError} When either input is not 32 bytes
 */
export function x25519SharedSecret(
  secretKey: Uint8Array,
  theirPublicKey: Uint8Array
): Result<SharedSecret, KeyAgreementError> {
  return X25519Keypair.fromSecretKey(secretKey).diffieHellman(X25519PublicKey.fromBytes(theirPublicKey));
}
