/**
 * @stratum/cli - command classes behind the stratum binary
 */

export { AgreeCommand } from './commands/agree.js';
export { DecryptCommand, EncryptCommand, type AeadOptions } from './commands/aead.js';
export { DemoCommand } from './commands/demo.js';
export { DecodeCommand, EncodeCommand } from './commands/encode.js';
export { HashCommand, type HashOptions } from './commands/hash.js';
export { KeygenCommand, type KeygenOptions } from './commands/keygen.js';
export { PublicKeyCommand } from './commands/pubkey.js';
export { SignCommand } from './commands/sign.js';
export { VerifyCommand, type VerifyOptions } from './commands/verify.js';
export { loadConfig, type CliConfig, type LogLevel } from './config.js';
export { KeyFileError, KeyFileSchema, loadKeypair, parseKeyFile, serializeKeyFile } from './keyfile.js';
export type { KeyFile, LoadedKey } from './keyfile.js';
export { createLogger, type Logger } from './logger.js';
export { formatOutput, createExitHandler, handleError } from './utils.js';
export type * from './types.js';
