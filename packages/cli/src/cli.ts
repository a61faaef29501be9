#!/usr/bin/env node
/**
 * Stratum CLI
 * Commands: keygen, pubkey, sign, verify, hash, agree, encrypt, decrypt, encode, decode, demo
 */

import { Command, InvalidArgumentError } from 'commander';
import { isHashAlgorithm, type HashAlgorithm } from '@stratum/crypto';
import { AgreeCommand } from './commands/agree.js';
import { DecryptCommand, EncryptCommand } from './commands/aead.js';
import { DemoCommand } from './commands/demo.js';
import { DecodeCommand, EncodeCommand } from './commands/encode.js';
import { HashCommand } from './commands/hash.js';
import { KeygenCommand } from './commands/keygen.js';
import { PublicKeyCommand } from './commands/pubkey.js';
import { SignCommand } from './commands/sign.js';
import { VerifyCommand } from './commands/verify.js';
import { config } from './config.js';
import type { CommandResult, KeyAlgorithm } from './types.js';
import { createExitHandler, formatOutput } from './utils.js';

type GlobalOptions = {
  json: boolean;
};

const program = new Command();
const exit = createExitHandler();

function parseHashAlgorithm(value: string): HashAlgorithm {
  if (!isHashAlgorithm(value)) {
    throw new InvalidArgumentError('expected sha-256 or blake2b-256');
  }
  return value;
}

function parseKeyAlgorithm(value: string): KeyAlgorithm {
  if (value !== 'ed25519' && value !== 'x25519') {
    throw new InvalidArgumentError('expected ed25519 or x25519');
  }
  return value;
}

function report(result: CommandResult): void {
  const { json } = program.opts<GlobalOptions>();
  console.log(formatOutput(result, json));
  exit(result.success ? 0 : 1);
}

program
  .name('stratum')
  .description('Signing, key agreement, hashing and authenticated encryption')
  .version('0.1.0');

// Global options
program.option('-j, --json', 'output in JSON format', config.json);

// stratum keygen --out <file>
program
  .command('keygen')
  .description('Generate a key pair and write it to a new key file')
  .option('-a, --algorithm <algorithm>', 'ed25519 or x25519', parseKeyAlgorithm)
  .requiredOption('-o, --out <file>', 'key file to create')
  .action(async (options: { algorithm?: KeyAlgorithm; out: string }) => {
    report(await new KeygenCommand().execute(options));
  });

// stratum pubkey <keyfile>
program
  .command('pubkey <keyfile>')
  .description('Print the public key of a key file')
  .action(async (keyfile: string) => {
    report(await new PublicKeyCommand().execute(keyfile));
  });

// stratum sign <keyfile> <file>
program
  .command('sign <keyfile> <file>')
  .description('Sign a file with an Ed25519 key file (- reads stdin)')
  .action(async (keyfile: string, file: string) => {
    report(await new SignCommand().execute(keyfile, file));
  });

// stratum verify <file> --public-key <b64u> --signature <b64u>
program
  .command('verify <file>')
  .description('Verify an Ed25519 signature over a file (- reads stdin)')
  .requiredOption('-p, --public-key <b64u>', 'signer public key')
  .requiredOption('-s, --signature <b64u>', 'signature')
  .action(async (file: string, options: { publicKey: string; signature: string }) => {
    report(await new VerifyCommand().execute(file, options));
  });

// stratum hash <file>
program
  .command('hash <file>')
  .description('Compute a 32-byte digest of a file (- reads stdin)')
  .option('-a, --algorithm <algorithm>', 'sha-256 or blake2b-256', parseHashAlgorithm)
  .action(async (file: string, options: { algorithm?: HashAlgorithm }) => {
    report(await new HashCommand().execute(file, options));
  });

// stratum agree <keyfile> <their-public-key>
program
  .command('agree <keyfile> <their-public-key>')
  .description('Derive an X25519 shared secret')
  .action(async (keyfile: string, theirPublicKey: string) => {
    report(await new AgreeCommand().execute(keyfile, theirPublicKey));
  });

// stratum encrypt <file> --key <b64u> --nonce <b64u>
program
  .command('encrypt <file>')
  .description('Encrypt a file with ChaCha20-Poly1305 (- reads stdin)')
  .requiredOption('-k, --key <b64u>', '32-byte key')
  .requiredOption('-n, --nonce <b64u>', '12-byte nonce, never reused under one key')
  .option('--aad <text>', 'associated data')
  .action(async (file: string, options: { key: string; nonce: string; aad?: string }) => {
    report(await new EncryptCommand().execute(file, options));
  });

// stratum decrypt <ciphertext> --key <b64u> --nonce <b64u>
program
  .command('decrypt <ciphertext>')
  .description('Decrypt base64url ciphertext with ChaCha20-Poly1305')
  .requiredOption('-k, --key <b64u>', '32-byte key')
  .requiredOption('-n, --nonce <b64u>', '12-byte nonce')
  .option('--aad <text>', 'associated data')
  .action(async (ciphertext: string, options: { key: string; nonce: string; aad?: string }) => {
    report(await new DecryptCommand().execute(ciphertext, options));
  });

// stratum encode <file>
program
  .command('encode <file>')
  .description('Base64url-encode a file without padding (- reads stdin)')
  .action(async (file: string) => {
    report(await new EncodeCommand().execute(file));
  });

// stratum decode <text>
program
  .command('decode <text>')
  .description('Decode unpadded base64url text')
  .action(async (text: string) => {
    report(await new DecodeCommand().execute(text));
  });

// stratum demo
program
  .command('demo')
  .description('Sign, agree on a secret and seal a payload end to end')
  .action(async () => {
    report(await new DemoCommand().execute());
  });

// Handle unknown commands
program.on('command:*', () => {
  console.error('Invalid command. See --help for available commands.');
  exit(1);
});

// If no command provided, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
  exit(0);
}

await program.parseAsync(process.argv);
