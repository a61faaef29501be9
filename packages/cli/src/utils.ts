/**
 * CLI utilities and formatting
 */

import chalk from 'chalk';
import { isCryptoError } from '@stratum/crypto';
import type { CommandResult } from './types.js';

export function formatOutput(result: CommandResult, json = false): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  if (!result.success) {
    const code = result.code ? ` (${result.code})` : '';
    return chalk.red(`Error: ${result.error}${code}`);
  }

  const data = result.data;
  if (data && typeof data === 'object') {
    if ('valid' in data) {
      return data.valid ? chalk.green('Signature verified') : chalk.red('Signature verification failed');
    }
    return Object.entries(data)
      .map(([field, value]) => `${chalk.bold(field)}: ${formatValue(value)}`)
      .join('\n');
  }

  return String(data);
}

function formatValue(value: unknown): string {
  if (value && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function createExitHandler() {
  return (code: number) => {
    process.exit(code);
  };
}

export function handleError(error: unknown): CommandResult<never> {
  if (isCryptoError(error)) {
    return { success: false, error: error.message, code: error.code };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}

export function timing() {
  const started = Date.now();
  return {
    started,
    end: () => {
      const completed = Date.now();
      return {
        started,
        completed,
        duration: completed - started,
      };
    },
  };
}
