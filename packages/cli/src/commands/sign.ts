/**
 * stratum sign <keyfile> <file> command
 * Ed25519 signature over the raw bytes of a file
 */

import { readFile } from 'fs/promises';
import { unwrap } from '@stratum/crypto';
import { KeyFileError, loadKeypair, parseKeyFile } from '../keyfile.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, SignResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import { readInput } from './io.js';

export class SignCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(keyFilePath: string, messagePath: string): Promise<CommandResult<SignResult>> {
    const timer = timing();

    try {
      const loaded = loadKeypair(parseKeyFile(await readFile(keyFilePath, 'utf-8')));
      if (loaded.algorithm !== 'ed25519') {
        throw new KeyFileError(`cannot sign with a ${loaded.algorithm} key`);
      }

      const message = await readInput(messagePath);
      const signature = unwrap(loaded.keypair.sign(message));

      this.logger.debug({ command: 'sign', message_size: message.length }, 'message signed');

      return {
        success: true,
        data: {
          algorithm: 'ed25519',
          signature: signature.toBase64url(),
          public_key: loaded.keypair.publicKey.toBase64url(),
          message_size: message.length,
        },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'sign', err: error }, 'signing failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
