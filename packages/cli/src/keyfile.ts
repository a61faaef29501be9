/**
 * Key file format
 *
 * A key file is JSON holding one key pair as base64url:
 * `{ "version": 1, "algorithm": "ed25519", "publicKey": "...", "secretKey": "..." }`.
 * Storage policy (permissions, encryption at rest, rotation) belongs to
 * the caller; this module only serializes and validates.
 */

import { z } from 'zod';
import {
  Ed25519Keypair,
  X25519Keypair,
  base64urlDecode,
  base64urlEncode,
} from '@stratum/crypto';
import type { KeyAlgorithm } from './types.js';

const base64url = z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be base64url without padding');

export const KeyFileSchema = z.object({
  version: z.literal(1),
  algorithm: z.enum(['ed25519', 'x25519']),
  publicKey: base64url,
  secretKey: base64url,
});

export type KeyFile = z.infer<typeof KeyFileSchema>;

export type LoadedKey =
  | { algorithm: 'ed25519'; keypair: Ed25519Keypair }
  | { algorithm: 'x25519'; keypair: X25519Keypair };

export class KeyFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyFileError';
  }
}

/**
 * Parse and validate key file JSON
 *
 * @throws {KeyFileError} on malformed JSON or a schema mismatch
 */
export function parseKeyFile(text: string): KeyFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new KeyFileError('key file is not valid JSON');
  }
  const parsed = KeyFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new KeyFileError(`invalid key file: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`);
  }
  return parsed.data;
}

/**
 * Rebuild the key pair a key file describes
 *
 * The stored public key must match the one derived from the secret key.
 */
export function loadKeypair(file: KeyFile): LoadedKey {
  const secret = base64urlDecode(file.secretKey);
  const loaded: LoadedKey =
    file.algorithm === 'ed25519'
      ? { algorithm: 'ed25519', keypair: Ed25519Keypair.fromSecretKey(secret) }
      : { algorithm: 'x25519', keypair: X25519Keypair.fromSecretKey(secret) };

  if (loaded.keypair.publicKey.toBase64url() !== file.publicKey) {
    throw new KeyFileError('public key does not match secret key');
  }
  return loaded;
}

/**
 * Serialize a key pair to key file JSON
 */
export function serializeKeyFile(algorithm: KeyAlgorithm, keypair: Ed25519Keypair | X25519Keypair): string {
  const file: KeyFile = {
    version: 1,
    algorithm,
    publicKey: keypair.publicKey.toBase64url(),
    secretKey: base64urlEncode(keypair.secretKeyBytes()),
  };
  return JSON.stringify(file, null, 2) + '\n';
}
