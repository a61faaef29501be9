import pino, { type DestinationStream, type Logger } from 'pino';
import { config, type LogLevel } from './config.js';

const REDACT_PATHS = [
  'secretKey',
  'key',
  'sharedSecret',
  'plaintext',
  '*.secretKey',
  '*.secret_key',
  '*.key',
  '*.sharedSecret',
  '*.shared_secret',
  '*.plaintext',
];

export type { Logger };

/**
 * Create the CLI logger
 *
 * Writes JSON lines to stderr by default so stdout stays clean for command
 * output. Key material is redacted wherever it appears under a known name.
 */
export function createLogger(level: LogLevel = config.logLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      name: 'stratum',
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    destination ?? pino.destination(2)
  );
}

export const logger = createLogger();
