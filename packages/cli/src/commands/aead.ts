/**
 * stratum encrypt / decrypt commands
 * ChaCha20-Poly1305 with a base64url key and nonce
 *
 * The caller owns nonce uniqueness: reusing a (key, nonce) pair leaks the
 * XOR of the two plaintexts.
 */

import { base64urlDecode, base64urlEncode, decrypt, encrypt, unwrap, type AeadBuffer } from '@stratum/crypto';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, DecryptResult, EncryptResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import { describeBytes, readInput } from './io.js';

export interface AeadOptions {
  key: string;
  nonce: string;
  aad?: string;
}

const encoder = new TextEncoder();

function aadBytes(options: AeadOptions): Uint8Array {
  return encoder.encode(options.aad ?? '');
}

export class EncryptCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(plaintextPath: string, options: AeadOptions): Promise<CommandResult<EncryptResult>> {
    const timer = timing();

    try {
      const key = base64urlDecode(options.key);
      const nonce = base64urlDecode(options.nonce);
      const buffer: AeadBuffer = { data: await readInput(plaintextPath) };
      const plaintextSize = buffer.data.length;

      unwrap(encrypt(key, nonce, aadBytes(options), buffer));
      this.logger.debug({ command: 'encrypt', plaintext_size: plaintextSize }, 'payload sealed');

      return {
        success: true,
        data: {
          algorithm: 'chacha20-poly1305',
          ciphertext: base64urlEncode(buffer.data),
          plaintext_size: plaintextSize,
        },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'encrypt', err: error }, 'encryption failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}

export class DecryptCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(ciphertext: string, options: AeadOptions): Promise<CommandResult<DecryptResult>> {
    const timer = timing();

    try {
      const key = base64urlDecode(options.key);
      const nonce = base64urlDecode(options.nonce);
      const buffer: AeadBuffer = { data: base64urlDecode(ciphertext) };

      unwrap(decrypt(key, nonce, aadBytes(options), buffer));
      const { encoding, text } = describeBytes(buffer.data);
      this.logger.debug({ command: 'decrypt', plaintext_size: buffer.data.length, encoding }, 'payload opened');

      return {
        success: true,
        data: {
          encoding,
          plaintext: text,
          plaintext_size: buffer.data.length,
        },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'decrypt', err: error }, 'decryption failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
