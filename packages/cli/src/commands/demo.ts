/**
 * stratum demo command
 * Walks through signing, key agreement and sealing a payload
 */

import {
  AEAD_NONCE_LENGTH,
  AEAD_TAG_LENGTH,
  Ed25519Keypair,
  X25519Keypair,
  base64urlEncode,
  constantTimeEqual,
  decrypt,
  encrypt,
  sha256,
  unwrap,
  type AeadBuffer,
} from '@stratum/crypto';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, DemoResult } from '../types.js';
import { handleError, timing } from '../utils.js';

const encoder = new TextEncoder();

export const DEMO_MESSAGE = 'hello stratum';
export const DEMO_PLAINTEXT = 'secret payload';
export const DEMO_AAD = 'envelope metadata';

export class DemoCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(): Promise<CommandResult<DemoResult>> {
    const timer = timing();

    try {
      const signer = Ed25519Keypair.generate();
      const message = encoder.encode(DEMO_MESSAGE);
      const signature = unwrap(signer.sign(message));
      const verified = signer.publicKey.verify(message, signature).ok;

      const alice = X25519Keypair.generate();
      const bob = X25519Keypair.generate();
      const aliceShared = unwrap(alice.diffieHellman(bob.publicKey));
      const bobShared = unwrap(bob.diffieHellman(alice.publicKey));

      // Demo only: a fixed key and an all-zero nonce must never be reused in practice
      const key = sha256(encoder.encode('key material'));
      const nonce = new Uint8Array(AEAD_NONCE_LENGTH);
      const aad = encoder.encode(DEMO_AAD);
      const plaintext = encoder.encode(DEMO_PLAINTEXT);

      const buffer: AeadBuffer = { data: plaintext.slice() };
      unwrap(encrypt(key, nonce, aad, buffer));
      const ciphertext = buffer.data.slice();
      unwrap(decrypt(key, nonce, aad, buffer));

      this.logger.info({ command: 'demo', verified }, 'demo complete');

      return {
        success: true,
        data: {
          signature: {
            msg_b64u: base64urlEncode(message),
            pub_b64u: signer.publicKey.toBase64url(),
            sig_b64u: signature.toBase64url(),
            verified,
          },
          key_agreement: {
            shared_secret_b64u: base64urlEncode(aliceShared),
            symmetric: constantTimeEqual(aliceShared, bobShared),
          },
          aead: {
            ciphertext_b64u: base64urlEncode(ciphertext),
            tag_appended: ciphertext.length === plaintext.length + AEAD_TAG_LENGTH,
            decrypted: new TextDecoder().decode(buffer.data),
          },
        },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'demo', err: error }, 'demo failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
