/**
 * stratum hash <file> command
 * Digest of file bytes with SHA-256 or BLAKE2b-256
 */

import { base64urlEncode, bytesToHex, getHasher, type HashAlgorithm } from '@stratum/crypto';
import { config } from '../config.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, HashResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import { readInput } from './io.js';

export interface HashOptions {
  algorithm?: HashAlgorithm;
}

export class HashCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(path: string, options: HashOptions = {}): Promise<CommandResult<HashResult>> {
    const timer = timing();
    const algorithm = options.algorithm ?? config.hashAlgorithm;

    try {
      const data = await readInput(path);
      const digest = getHasher(algorithm).hash(data);

      this.logger.debug({ command: 'hash', algorithm, input_size: data.length }, 'digest computed');

      return {
        success: true,
        data: {
          algorithm,
          digest_hex: bytesToHex(digest),
          digest_b64u: base64urlEncode(digest),
          input_size: data.length,
        },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'hash', err: error }, 'hash failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
