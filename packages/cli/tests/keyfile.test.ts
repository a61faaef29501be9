import { describe, it, expect } from 'vitest';
import { base64urlEncode, hexToBytes } from '@stratum/crypto';
import { ed25519KeypairFromSeed, x25519KeypairFromSeed } from '@stratum/crypto/testkit';
import { KeyFileError, loadKeypair, parseKeyFile, serializeKeyFile } from '../src/keyfile.js';

const SEED = Uint8Array.from({ length: 32 }, (_, i) => i + 1);

describe('key files', () => {
  it('round-trips an Ed25519 key pair', () => {
    const keypair = ed25519KeypairFromSeed(SEED);
    const text = serializeKeyFile('ed25519', keypair);

    expect(text.endsWith('\n')).toBe(true);
    const file = parseKeyFile(text);
    expect(file).toEqual({
      version: 1,
      algorithm: 'ed25519',
      publicKey: keypair.publicKey.toBase64url(),
      secretKey: base64urlEncode(SEED),
    });

    const loaded = loadKeypair(file);
    expect(loaded.algorithm).toBe('ed25519');
    expect(loaded.keypair.publicKey.toBase64url()).toBe(keypair.publicKey.toBase64url());
  });

  it('round-trips an X25519 key pair', () => {
    const keypair = x25519KeypairFromSeed(SEED);
    const loaded = loadKeypair(parseKeyFile(serializeKeyFile('x25519', keypair)));
    expect(loaded.algorithm).toBe('x25519');
    expect(loaded.keypair.publicKey.toBase64url()).toBe(keypair.publicKey.toBase64url());
  });

  it('derives the RFC 8032 public key from a stored secret key', () => {
    const loaded = loadKeypair({
      version: 1,
      algorithm: 'ed25519',
      publicKey: base64urlEncode(hexToBytes('d75a980182b10ab7d54bfed3c964073a0ee172f3daa62325af021a68f707511a')),
      secretKey: base64urlEncode(hexToBytes('9d61b19deffd5a60ba844af492ec2cc44449c5697b326919703bac031cae7f60')),
    });
    expect(loaded.algorithm).toBe('ed25519');
  });

  it('rejects a public key that does not match the secret key', () => {
    const file = parseKeyFile(serializeKeyFile('ed25519', ed25519KeypairFromSeed(SEED)));
    const other = ed25519KeypairFromSeed(new Uint8Array(32).fill(7));
    expect(() => loadKeypair({ ...file, publicKey: other.publicKey.toBase64url() })).toThrow(
      'public key does not match secret key'
    );
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseKeyFile('not json')).toThrow(KeyFileError);
    expect(() => parseKeyFile('not json')).toThrow('key file is not valid JSON');
  });

  it('rejects an unknown version', () => {
    const text = JSON.stringify({ version: 2, algorithm: 'ed25519', publicKey: 'AA', secretKey: 'AA' });
    expect(() => parseKeyFile(text)).toThrow(/^invalid key file: version: /);
  });

  it('rejects an unknown algorithm', () => {
    const text = JSON.stringify({ version: 1, algorithm: 'rsa', publicKey: 'AA', secretKey: 'AA' });
    expect(() => parseKeyFile(text)).toThrow(/^invalid key file: algorithm: /);
  });

  it('rejects padded base64url', () => {
    const text = JSON.stringify({ version: 1, algorithm: 'ed25519', publicKey: 'AA==', secretKey: 'AA' });
    expect(() => parseKeyFile(text)).toThrow('invalid key file: publicKey: must be base64url without padding');
  });
});
