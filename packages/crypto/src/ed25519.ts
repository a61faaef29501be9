/**
 * Ed25519 signatures (RFC 8032)
 *
 * Wraps the synchronous surface of @noble/ed25519. In noble v3 the sync
 * methods need an explicit SHA-512; it is installed here from @noble/hashes
 * when this module loads. All other modules MUST import Ed25519 from this
 * file, never directly from '@noble/ed25519'.
 *
 * Key material handling:
 * - Secret keys are the 32-byte RFC 8032 seed
 * - Public keys are 32-byte compressed Edwards points
 * - JavaScript cannot guarantee memory zeroization; callers should
 *   avoid holding key pairs longer than necessary and never log key bytes
 */

import * as ed from '@noble/ed25519';
import { sha512 } from '@noble/hashes/sha2.js';
import { base64urlEncode } from './base64url.js';
import { constantTimeEqual } from './bytes.js';
import { KeyError, SigningError, VerificationError } from './errors.js';
import { systemRandom, drawBytes } from './random.js';
import { err, ok, type Result } from './result.js';
import type { KeyPair, RandomSource, Signer, Verifier } from './traits.js';

ed.hashes.sha512 = sha512;

export const ED25519_SECRET_KEY_LENGTH = 32;
export const ED25519_PUBLIC_KEY_LENGTH = 32;
export const ED25519_SIGNATURE_LENGTH = 64;

/**
 * A 64-byte Ed25519 signature
 *
 * Only meaningful together with the message and public key it was
 * produced against.
 */
export class Ed25519Signature {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Wrap raw signature bytes
   *
   * @throws {KeyError} `CRYPTO_INVALID_SIGNATURE_LENGTH` unless exactly 64 bytes
   */
  static fromBytes(bytes: Uint8Array): Ed25519Signature {
    if (bytes.length !== ED25519_SIGNATURE_LENGTH) {
      throw new KeyError(
        'CRYPTO_INVALID_SIGNATURE_LENGTH',
        `Ed25519 signature must be ${ED25519_SIGNATURE_LENGTH} bytes, got ${bytes.length}`
      );
    }
    return new Ed25519Signature(Uint8Array.from(bytes));
  }

  /** Copy of the signature bytes */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toBase64url(): string {
    return base64urlEncode(this.bytes);
  }
}

/**
 * Ed25519 verifying key
 *
 * Verification needs nothing else, so any holder of the 32 public bytes
 * can check signatures.
 */
export class Ed25519PublicKey implements Verifier<Ed25519Signature | Uint8Array, VerificationError> {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Import a 32-byte public key
   *
   * @throws {KeyError} `CRYPTO_INVALID_KEY_LENGTH` unless exactly 32 bytes
   */
  static fromBytes(bytes: Uint8Array): Ed25519PublicKey {
    if (bytes.length !== ED25519_PUBLIC_KEY_LENGTH) {
      throw new KeyError(
        'CRYPTO_INVALID_KEY_LENGTH',
        `Ed25519 public key must be ${ED25519_PUBLIC_KEY_LENGTH} bytes, got ${bytes.length}`
      );
    }
    return new Ed25519PublicKey(Uint8Array.from(bytes));
  }

  /**
   * Verify a signature over message
   *
   * Accepts the typed signature or raw bytes. A wrong length, a malformed
   * encoding and a mismatch all return the same {@link VerificationError}.
   */
  verify(message: Uint8Array, signature: Ed25519Signature | Uint8Array): Result<void, VerificationError> {
    const sig = signature instanceof Ed25519Signature ? signature.toBytes() : signature;
    if (sig.length !== ED25519_SIGNATURE_LENGTH) {
      return err(new VerificationError());
    }
    let valid: boolean;
    try {
      valid = ed.verify(sig, message, this.bytes);
    } catch {
      // noble throws on non-canonical points and scalars
      valid = false;
    }
    return valid ? ok(undefined) : err(new VerificationError());
  }

  /** Copy of the public key bytes */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toBase64url(): string {
    return base64urlEncode(this.bytes);
  }

  equals(other: Ed25519PublicKey): boolean {
    return constantTimeEqual(this.bytes, other.toBytes());
  }
}

/**
 * Ed25519 signing key pair
 *
 * Immutable after construction. The public key is derived once and the
 * same {@link Ed25519PublicKey} instance is returned on every access.
 */
export class Ed25519Keypair
  implements
    KeyPair<Ed25519PublicKey>,
    Signer<Ed25519Signature, SigningError>,
    Verifier<Ed25519Signature | Uint8Array, VerificationError>
{
  private readonly secretKey: Uint8Array;
  readonly publicKey: Ed25519PublicKey;

  private constructor(secretKey: Uint8Array) {
    this.secretKey = secretKey;
    this.publicKey = Ed25519PublicKey.fromBytes(ed.getPublicKey(secretKey));
  }

  /**
   * Generate a key pair from exactly 32 bytes of the random source
   *
   * @param random - Entropy source; the process-wide CSPRNG unless given
   */
  static generate(random: RandomSource = systemRandom): Ed25519Keypair {
    return new Ed25519Keypair(drawBytes(random, ED25519_SECRET_KEY_LENGTH));
  }

  /**
   * Rebuild a key pair from a stored 32-byte secret key (seed)
   *
   * The input is copied so the caller's array is not retained.
   *
   * @throws {KeyError} `CRYPTO_INVALID_KEY_LENGTH` unless exactly 32 bytes
   */
  static fromSecretKey(secretKey: Uint8Array): Ed25519Keypair {
    if (secretKey.length !== ED25519_SECRET_KEY_LENGTH) {
      throw new KeyError(
        'CRYPTO_INVALID_KEY_LENGTH',
        `Ed25519 secret key must be ${ED25519_SECRET_KEY_LENGTH} bytes, got ${secretKey.length}`
      );
    }
    return new Ed25519Keypair(Uint8Array.from(secretKey));
  }

  /**
   * Sign message; deterministic in (secret key, message)
   */
  sign(message: Uint8Array): Result<Ed25519Signature, SigningError> {
    try {
      return ok(Ed25519Signature.fromBytes(ed.sign(message, this.secretKey)));
    } catch (error) {
      return err(
        new SigningError(`Ed25519 signing failed: ${error instanceof Error ? error.message : String(error)}`)
      );
    }
  }

  verify(message: Uint8Array, signature: Ed25519Signature | Uint8Array): Result<void, VerificationError> {
    return this.publicKey.verify(message, signature);
  }

  publicKeyBytes(): Uint8Array {
    return this.publicKey.toBytes();
  }

  secretKeyBytes(): Uint8Array {
    return Uint8Array.from(this.secretKey);
  }
}

/**
 * Generate a random Ed25519 key pair
 */
export function generateEd25519Keypair(): Ed25519Keypair {
  return Ed25519Keypair.generate();
}

/**
 * Verify a raw signature against raw public key bytes
 *
 * Never throws: a public key of the wrong size fails like any other
 * verification.
 */
export function verifyEd25519(
  message: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array
): Result<void, VerificationError> {
  if (publicKey.length !== ED25519_PUBLIC_KEY_LENGTH) {
    return err(new VerificationError());
  }
  return Ed25519PublicKey.fromBytes(publicKey).verify(message, signature);
}
