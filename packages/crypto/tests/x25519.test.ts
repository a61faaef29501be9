/**
 * X25519 key agreement tests
 *
 * Low-order point rejection is a security requirement, not an edge case:
 * every point on the list must fail, whatever the local secret.
 */

import { describe, it, expect } from 'vitest';
import { bytesToHex, hexToBytes } from '../src/bytes.js';
import { KeyAgreementError, KeyError } from '../src/errors.js';
import { unwrap } from '../src/result.js';
import { createFixedRandom, x25519KeypairFromSeed } from '../src/testkit.js';
import {
  X25519Keypair,
  X25519PublicKey,
  clampScalar,
  generateX25519Keypair,
  isLowOrderPoint,
  x25519SharedSecret,
} from '../src/x25519.js';

const LOW_ORDER_HEX = [
  '0000000000000000000000000000000000000000000000000000000000000000',
  '0100000000000000000000000000000000000000000000000000000000000000',
  'e0eb7a7c3b41b8ae1656e3faf19fc46ada098deb9c32b1fd866205165f49b800',
  '5f9c95bca3508c24b1d0b1559c83ef5b04445cc4581c8e86d8224eddd09f1157',
  'ecffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  'edffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  'eeffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff7f',
  // same points with the ignored top bit set
  '0000000000000000000000000000000000000000000000000000000000000080',
  '0100000000000000000000000000000000000000000000000000000000000080',
  'e0eb7a7c3b41b8ae1656e3faf19fc46ada098deb9c32b1fd866205165f49b880',
  'ecffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff',
];

describe('X25519Keypair', () => {
  it('should agree on the same secret from both sides', () => {
    const alice = X25519Keypair.generate();
    const bob = generateX25519Keypair();

    const fromAlice = unwrap(alice.diffieHellman(bob.publicKey));
    const fromBob = unwrap(bob.diffieHellman(alice.publicKey));

    expect(fromAlice).toEqual(fromBob);
    expect(fromAlice.length).toBe(32);
  });

  it('should give different secrets with different peers', () => {
    const alice = X25519Keypair.generate();
    const bob = X25519Keypair.generate();
    const carol = X25519Keypair.generate();
    expect(unwrap(alice.diffieHellman(bob.publicKey))).not.toEqual(unwrap(alice.diffieHellman(carol.publicKey)));
  });

  it('should return the same cached public key instance on every access', () => {
    const keypair = X25519Keypair.generate();
    expect(keypair.publicKey).toBe(keypair.publicKey);
  });

  it('should draw exactly 32 bytes from the random source', () => {
    const seed = new Uint8Array(32).fill(0x42);
    const keypair = X25519Keypair.generate(createFixedRandom(seed));
    expect(keypair.secretKeyBytes()).toEqual(clampScalar(seed));
  });

  it('should clamp the secret scalar before first use', () => {
    const keypair = x25519KeypairFromSeed(new Uint8Array(32).fill(0xff));
    const secret = keypair.secretKeyBytes();
    expect(secret[0]).toBe(0xf8);
    expect(secret[31]).toBe(0x7f);
  });

  it('should clamp imported scalars (RFC 7748 alice key)', () => {
    const keypair = X25519Keypair.fromSecretKey(
      hexToBytes('77076d0a7318a57d3c16c17251b26645df4c2f87ebc0992ab177fba51db92c2a')
    );
    const secret = keypair.secretKeyBytes();
    expect(secret[0]).toBe(0x70);
    expect(secret[31]).toBe(0x6a);
  });

  it('should rebuild the same public key from stored secret bytes', () => {
    const original = X25519Keypair.generate();
    const restored = X25519Keypair.fromSecretKey(original.secretKeyBytes());
    expect(restored.publicKey.equals(original.publicKey)).toBe(true);
  });

  it('should reject secret and public keys that are not 32 bytes', () => {
    expect(() => X25519Keypair.fromSecretKey(new Uint8Array(31))).toThrow(KeyError);
    expect(() => X25519PublicKey.fromBytes(new Uint8Array(33))).toThrow(KeyError);
  });
});

describe('clampScalar', () => {
  it('should clear the low three bits and the top bit, and set bit 254', () => {
    const clamped = clampScalar(new Uint8Array(32).fill(0xff));
    expect(clamped[0]).toBe(0xf8);
    expect(clamped[31]).toBe(0x7f);
    expect(clampScalar(new Uint8Array(32))[31]).toBe(0x40);
  });

  it('should not modify its input', () => {
    const input = new Uint8Array(32).fill(0xff);
    clampScalar(input);
    expect(input[0]).toBe(0xff);
  });
});

describe('low-order point rejection', () => {
  const local = X25519Keypair.generate();

  for (const hex of LOW_ORDER_HEX) {
    it(`should reject ${hex.slice(0, 8)}…${hex.slice(-4)}`, () => {
      const result = local.diffieHellman(X25519PublicKey.fromBytes(hexToBytes(hex)));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(KeyAgreementError);
        expect(result.error.code).toBe('CRYPTO_INVALID_PUBLIC_KEY');
      }
    });
  }

  it('should flag every listed point', () => {
    expect(LOW_ORDER_HEX.every(hex => isLowOrderPoint(hexToBytes(hex)))).toBe(true);
  });

  it('should not flag an honest public key', () => {
    expect(isLowOrderPoint(X25519Keypair.generate().publicKeyBytes())).toBe(false);
  });
});

describe('x25519SharedSecret', () => {
  it('should match the key pair method', () => {
    const alice = X25519Keypair.generate();
    const bob = X25519Keypair.generate();
    const raw = unwrap(x25519SharedSecret(alice.secretKeyBytes(), bob.publicKeyBytes()));
    expect(bytesToHex(raw)).toBe(bytesToHex(unwrap(alice.diffieHellman(bob.publicKey))));
  });

  it('should fail on the identity point', () => {
    const alice = X25519Keypair.generate();
    expect(x25519SharedSecret(alice.secretKeyBytes(), new Uint8Array(32)).ok).toBe(false);
  });
});
