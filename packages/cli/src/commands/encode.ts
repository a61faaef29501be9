/**
 * stratum encode / decode commands (base64url, no padding)
 */

import { base64urlDecode, base64urlEncode } from '@stratum/crypto';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { CommandResult, DecodeResult, EncodeResult } from '../types.js';
import { handleError, timing } from '../utils.js';
import { describeBytes, readInput } from './io.js';

export class EncodeCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async execute(path: string): Promise<CommandResult<EncodeResult>> {
    const timer = timing();

    try {
      const data = await readInput(path);
      this.logger.debug({ command: 'encode', input_size: data.length }, 'input encoded');
      return {
        success: true,
        data: { encoded: base64urlEncode(data), input_size: data.length },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'encode', err: error }, 'encoding failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}

export class DecodeCommand {
  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * Decoded bytes are reported as UTF-8 text, or as hex when they are not
   * valid UTF-8
   */
  async execute(text: string): Promise<CommandResult<DecodeResult>> {
    const timer = timing();

    try {
      const bytes = base64urlDecode(text.trim());
      const decoded = describeBytes(bytes);
      this.logger.debug({ command: 'decode', output_size: bytes.length, encoding: decoded.encoding }, 'input decoded');
      return {
        success: true,
        data: { encoding: decoded.encoding, decoded: decoded.text, output_size: bytes.length },
        timing: timer.end(),
      };
    } catch (error) {
      this.logger.warn({ command: 'decode', err: error }, 'decoding failed');
      return {
        ...handleError(error),
        timing: timer.end(),
      };
    }
  }
}
