import { isHashAlgorithm, type HashAlgorithm } from '@stratum/crypto';
import type { KeyAlgorithm } from './types.js';

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliConfig {
  logLevel: LogLevel;
  hashAlgorithm: HashAlgorithm;
  keyAlgorithm: KeyAlgorithm;
  json: boolean;
}

function bool(v: string | undefined, d = false): boolean {
  return v === 'true' ? true : v === 'false' ? false : d;
}

function oneOf<T extends string>(v: string | undefined, allowed: readonly T[], d: T): T {
  const match = allowed.find((a) => a === v);
  return match ?? d;
}

function hashAlgorithm(v: string | undefined, d: HashAlgorithm): HashAlgorithm {
  return v !== undefined && isHashAlgorithm(v) ? v : d;
}

export function loadConfig(env: Env = process.env): CliConfig {
  return {
    logLevel: oneOf(env.STRATUM_LOG_LEVEL, LOG_LEVELS, 'warn'),
    hashAlgorithm: hashAlgorithm(env.STRATUM_HASH_ALGORITHM, 'sha-256'),
    keyAlgorithm: oneOf<KeyAlgorithm>(env.STRATUM_KEY_ALGORITHM, ['ed25519', 'x25519'], 'ed25519'),
    json: bool(env.STRATUM_JSON, false),
  };
}

export const config = loadConfig();
