/**
 * ChaCha20-Poly1305 AEAD (RFC 8439, IETF sizing)
 *
 * 32-byte key, 12-byte nonce, 16-byte tag appended to the ciphertext.
 *
 * NONCE REUSE: the caller MUST use each nonce at most once per key. This
 * module never generates, stores or checks nonces. Encrypting two messages
 * under the same (key, nonce) reuses the ChaCha20 keystream, so the XOR of
 * the two ciphertexts is the XOR of the two plaintexts, and the Poly1305
 * key repeats as well.
 */

import { chacha20poly1305 } from '@noble/ciphers/chacha.js';
import { AeadError } from './errors.js';
import { err, ok, type Result } from './result.js';
import type { Aead, AeadBuffer } from './traits.js';

export const AEAD_KEY_LENGTH = 32;
export const AEAD_NONCE_LENGTH = 12;
export const AEAD_TAG_LENGTH = 16;

function checkSizes(key: Uint8Array, nonce: Uint8Array): AeadError | undefined {
  if (key.length !== AEAD_KEY_LENGTH) {
    return new AeadError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `ChaCha20-Poly1305 key must be ${AEAD_KEY_LENGTH} bytes, got ${key.length}`
    );
  }
  if (nonce.length !== AEAD_NONCE_LENGTH) {
    return new AeadError(
      'CRYPTO_INVALID_NONCE_LENGTH',
      `ChaCha20-Poly1305 nonce must be ${AEAD_NONCE_LENGTH} bytes, got ${nonce.length}`
    );
  }
  return undefined;
}

/**
 * ChaCha20-Poly1305 behind the {@link Aead} contract
 */
export class ChaCha20Poly1305Cipher implements Aead<AeadError> {
  readonly keyLength = AEAD_KEY_LENGTH;
  readonly nonceLength = AEAD_NONCE_LENGTH;
  readonly tagLength = AEAD_TAG_LENGTH;

  /**
   * Replace `buffer.data` with ciphertext ‖ tag
   *
   * Fails only on a wrong-size key or nonce; the buffer is left untouched.
   */
  encrypt(key: Uint8Array, nonce: Uint8Array, aad: Uint8Array, buffer: AeadBuffer): Result<void, AeadError> {
    const sizeError = checkSizes(key, nonce);
    if (sizeError) {
      return err(sizeError);
    }
    buffer.data = chacha20poly1305(key, nonce, aad).encrypt(buffer.data);
    return ok(undefined);
  }

  /**
   * Replace `buffer.data` (ciphertext ‖ tag) with the plaintext
   *
   * On authentication failure the buffer is zeroed and emptied before the
   * error is returned, so no partial plaintext reaches the caller.
   */
  decrypt(key: Uint8Array, nonce: Uint8Array, aad: Uint8Array, buffer: AeadBuffer): Result<void, AeadError> {
    const sizeError = checkSizes(key, nonce);
    if (sizeError) {
      return err(sizeError);
    }
    try {
      buffer.data = chacha20poly1305(key, nonce, aad).decrypt(buffer.data);
      return ok(undefined);
    } catch {
      buffer.data.fill(0);
      buffer.data = new Uint8Array(0);
      return err(new AeadError('CRYPTO_AEAD_AUTHENTICATION_FAILED', 'AEAD authentication failed'));
    }
  }
}

const defaultCipher = new ChaCha20Poly1305Cipher();

/**
 * Encrypt `buffer.data` in place with ChaCha20-Poly1305
 *
 * @see ChaCha20Poly1305Cipher.encrypt
 */
export function encrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  aad: Uint8Array,
  buffer: AeadBuffer
): Result<void, AeadError> {
  return defaultCipher.encrypt(key, nonce, aad, buffer);
}

/**
 * Decrypt `buffer.data` in place with ChaCha20-Poly1305
 *
 * @see ChaCha20Poly1305Cipher.decrypt
 */
export function decrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  aad: Uint8Array,
  buffer: AeadBuffer
): Result<void, AeadError> {
  return defaultCipher.decrypt(key, nonce, aad, buffer);
}
