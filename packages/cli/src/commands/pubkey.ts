/**
 * stratum pubkey <keyfile> command
 */

import { readFile } from 'fs/promises';
import { encodeMulticodec, encodeMultibase } from '@stratum/crypto';
import { loadKeypair, parseKeyFile } from '../keyfile.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, PublicKeyResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export class PublicKeyCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(keyFilePath: string): Promise<CommandResult<PublicKeyResult>> {
    const timer = timing();

    try {
      const loaded = loadKeypair(parseKeyFile(await readFile(keyFilePath, 'utf-8')));
      const codec = loaded.algorithm === 'ed25519' ? 'ed25519-pub' : 'x25519-pub';
      this.logger.debug({ command: 'pubkey', algorithm: loaded.algorithm }, 'public key read');

      return {
        success: true,
        data: {
          algorithm: loaded.algorithm,
          public_key: loaded.keypair.publicKey.toBase64url(),
          multibase: encodeMultibase(encodeMulticodec(codec, loaded.keypair.publicKeyBytes())),
        },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'pubkey', err: error }, 'reading public key failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
