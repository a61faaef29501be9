/**
 * stratum agree <keyfile> <their-public-key> command
 * X25519 shared secret with another party
 */

import { readFile } from 'fs/promises';
import { X25519PublicKey, base64urlDecode, base64urlEncode, unwrap } from '@stratum/crypto';
import { KeyFileError, loadKeypair, parseKeyFile } from '../keyfile.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { AgreeResult, CommandResult } from '../types.js';
import { handleError, timing } from '../utils.js';

export class AgreeCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(keyFilePath: string, theirPublicKey: string): Promise<CommandResult<AgreeResult>> {
    const timer = timing();

    try {
      const loaded = loadKeypair(parseKeyFile(await readFile(keyFilePath, 'utf-8')));
      if (loaded.algorithm !== 'x25519') {
        throw new KeyFileError(`cannot run key agreement with a ${loaded.algorithm} key`);
      }

      const theirs = X25519PublicKey.fromBytes(base64urlDecode(theirPublicKey));
      const sharedSecret = unwrap(loaded.keypair.diffieHellman(theirs));

      this.logger.debug({ command: 'agree', their_public_key: theirs.toBase64url() }, 'shared secret derived');

      return {
        success: true,
        data: { shared_secret: base64urlEncode(sharedSecret) },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'agree', err: error }, 'key agreement failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
