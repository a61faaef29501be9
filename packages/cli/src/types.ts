/**
 * Types for Stratum CLI
 */

import type { HashAlgorithm } from '@stratum/crypto';

export type KeyAlgorithm = 'ed25519' | 'x25519';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  timing?: {
    started: number;
    completed: number;
    duration: number;
  };
}

export interface KeygenResult {
  algorithm: KeyAlgorithm;
  public_key: string;
  key_file: string;
}

export interface PublicKeyResult {
  algorithm: KeyAlgorithm;
  public_key: string;
  multibase: string;
}

export interface SignResult {
  algorithm: 'ed25519';
  signature: string;
  public_key: string;
  message_size: number;
}

export interface VerifyResult {
  valid: boolean;
  public_key: string;
}

export interface HashResult {
  algorithm: HashAlgorithm;
  digest_hex: string;
  digest_b64u: string;
  input_size: number;
}

export interface AgreeResult {
  shared_secret: string;
}

export interface EncryptResult {
  algorithm: 'chacha20-poly1305';
  ciphertext: string;
  plaintext_size: number;
}

export interface DecryptResult {
  encoding: 'utf-8' | 'hex';
  plaintext: string;
  plaintext_size: number;
}

export interface EncodeResult {
  encoded: string;
  input_size: number;
}

export interface DecodeResult {
  encoding: 'utf-8' | 'hex';
  decoded: string;
  output_size: number;
}

export interface DemoResult {
  signature: { msg_b64u: string; pub_b64u: string; sig_b64u: string; verified: boolean };
  key_agreement: { shared_secret_b64u: string; symmetric: boolean };
  aead: { ciphertext_b64u: string; tag_appended: boolean; decrypted: string };
}
