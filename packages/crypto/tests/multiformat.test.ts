import { describe, it, expect } from 'vitest';
import { Ed25519Keypair } from '../src/ed25519.js';
import { EncodingError } from '../src/errors.js';
import {
  decodeMultibase,
  decodeMulticodec,
  decodeVarint,
  encodeMultibase,
  encodeMulticodec,
  encodeVarint,
} from '../src/multiformat.js';

describe('multibase', () => {
  it('should prefix base64url with u', () => {
    expect(encodeMultibase(new Uint8Array([0xfb, 0xff]))).toBe('u-_8');
  });

  it('should decode u-prefixed text', () => {
    expect(Array.from(decodeMultibase('uSGVsbG8'))).toEqual([72, 101, 108, 108, 111]);
  });

  it('should reject other multibase prefixes', () => {
    expect(() => decodeMultibase('zQmHash')).toThrow('unsupported multibase prefix: "z"');
  });

  it('should pass through base64url errors', () => {
    expect(() => decodeMultibase('uYQ==')).toThrow(EncodingError);
  });
});

describe('varint', () => {
  it('should encode single-byte values', () => {
    expect(Array.from(encodeVarint(0x7f))).toEqual([0x7f]);
  });

  it('should encode the public-key codes as two bytes', () => {
    expect(Array.from(encodeVarint(0xed))).toEqual([0xed, 0x01]);
    expect(Array.from(encodeVarint(0xec))).toEqual([0xec, 0x01]);
  });

  it('should decode what it encodes', () => {
    expect(decodeVarint(encodeVarint(300))).toEqual({ value: 300, length: 2 });
  });

  it('should reject an overlong encoding', () => {
    expect(() => decodeVarint(new Uint8Array([0xed, 0x81, 0x00]))).toThrow(
      'multicodec varint is not minimally encoded'
    );
    expect(() => decodeMulticodec(new Uint8Array([0xed, 0x81, 0x00, 0x01]))).toThrow(EncodingError);
  });

  it('should accept a single zero byte', () => {
    expect(decodeVarint(new Uint8Array([0x00]))).toEqual({ value: 0, length: 1 });
  });

  it('should reject a truncated varint', () => {
    expect(() => decodeVarint(new Uint8Array([0x80]))).toThrow(EncodingError);
  });
});

describe('multicodec', () => {
  it('should prefix an Ed25519 public key with 0xed 0x01', () => {
    const keypair = Ed25519Keypair.generate();
    const prefixed = encodeMulticodec('ed25519-pub', keypair.publicKeyBytes());

    expect(prefixed.length).toBe(34);
    expect(Array.from(prefixed.slice(0, 2))).toEqual([0xed, 0x01]);
  });

  it('should split prefixed bytes back into codec and key', () => {
    const key = new Uint8Array(32).fill(5);
    const decoded = decodeMulticodec(encodeMulticodec('x25519-pub', key));

    expect(decoded.codec).toBe('x25519-pub');
    expect(decoded.bytes).toEqual(key);
  });

  it('should reject unknown codes', () => {
    expect(() => decodeMulticodec(new Uint8Array([0x12, 0x20]))).toThrow('unsupported multicodec code 0x12');
  });
});
