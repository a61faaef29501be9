/**
 * Export surface tests for @stratum/crypto
 *
 * Test-only utilities must NOT be reachable from the main entry point, so
 * production code cannot pick up a deterministic key path by accident.
 */

import { describe, it, expect } from 'vitest';
import * as crypto from '../src/index.js';
import * as testkit from '../src/testkit.js';

describe('@stratum/crypto export surface', () => {
  it('should NOT export seeded or fixed random sources from main entry', () => {
    expect('createSeededRandom' in crypto).toBe(false);
    expect('createFixedRandom' in crypto).toBe(false);
    expect('ed25519KeypairFromSeed' in crypto).toBe(false);
    expect('x25519KeypairFromSeed' in crypto).toBe(false);
  });

  it('should export them from the testkit entry', () => {
    expect(Object.keys(testkit).sort()).toEqual([
      'createFixedRandom',
      'createSeededRandom',
      'ed25519KeypairFromSeed',
      'x25519KeypairFromSeed',
    ]);
  });

  it('should export the concrete algorithm types', () => {
    for (const name of [
      'Ed25519Keypair',
      'Ed25519PublicKey',
      'Ed25519Signature',
      'X25519Keypair',
      'X25519PublicKey',
      'Sha256Hasher',
      'Blake2b256Hasher',
      'ChaCha20Poly1305Cipher',
    ]) {
      expect(name in crypto).toBe(true);
    }
  });

  it('should export the convenience functions', () => {
    for (const name of ['sha256', 'blake2b256', 'encrypt', 'decrypt', 'base64urlEncode', 'base64urlDecode', 'randomBytes']) {
      expect(name in crypto).toBe(true);
    }
  });

  it('should export one error class per capability', () => {
    for (const name of [
      'CryptoError',
      'SigningError',
      'VerificationError',
      'KeyAgreementError',
      'AeadError',
      'EncodingError',
      'KeyError',
      'RandomnessError',
    ]) {
      expect(name in crypto).toBe(true);
    }
  });

  it('should make every capability error a CryptoError', () => {
    expect(new crypto.VerificationError()).toBeInstanceOf(crypto.CryptoError);
    expect(new crypto.AeadError('CRYPTO_AEAD_AUTHENTICATION_FAILED', 'x')).toBeInstanceOf(Error);
    expect(crypto.isCryptoError(new crypto.SigningError())).toBe(true);
    expect(crypto.isCryptoError(new Error('plain'))).toBe(false);
  });
});
