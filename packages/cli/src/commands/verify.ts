/**
 * stratum verify <file> --public-key <b64u> --signature <b64u> command
 */

import { Ed25519PublicKey, base64urlDecode } from '@stratum/crypto';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, VerifyResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import { readInput } from './io.js';

export interface VerifyOptions {
  publicKey: string;
  signature: string;
}

export class VerifyCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * A signature that does not verify is a successful command with
   * `valid: false`; only unreadable input is a command failure.
   */
  async execute(messagePath: string, options: VerifyOptions): Promise<CommandResult<VerifyResult>> {
    const timer = timing();

    try {
      const publicKey = Ed25519PublicKey.fromBytes(base64urlDecode(options.publicKey));
      const signature = base64urlDecode(options.signature);
      const message = await readInput(messagePath);

      const result = publicKey.verify(message, signature);
      this.logger.debug({ command: 'verify', valid: result.ok }, 'signature checked');

      return {
        success: true,
        data: { valid: result.ok, public_key: publicKey.toBase64url() },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'verify', err: error }, 'verification could not run');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
