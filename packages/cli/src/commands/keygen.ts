/**
 * stratum keygen command
 * Generate an Ed25519 or X25519 key pair and write it as a key file
 */

import { writeFile } from 'fs/promises';
import { Ed25519Keypair, X25519Keypair } from '@stratum/crypto';
import { config } from '../config.js';
import { serializeKeyFile } from '../keyfile.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, KeyAlgorithm, KeygenResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export interface KeygenOptions {
  algorithm?: KeyAlgorithm;
  out: string;
}

export class KeygenCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(options: KeygenOptions): Promise<CommandResult<KeygenResult>> {
    const timer = timing();
    const algorithm = options.algorithm ?? config.keyAlgorithm;

    try {
      const keypair = algorithm === 'ed25519' ? Ed25519Keypair.generate() : X25519Keypair.generate();
      const publicKey = keypair.publicKey.toBase64url();

      // Owner read/write only, never over an existing file
      await writeFile(options.out, serializeKeyFile(algorithm, keypair), { mode: 0o600, flag: 'wx' });

      this.logger.info({ command: 'keygen', algorithm, public_key: publicKey, key_file: options.out }, 'key pair generated');

      return {
        success: true,
        data: { algorithm, public_key: publicKey, key_file: options.out },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'keygen', err: error }, 'key generation failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
