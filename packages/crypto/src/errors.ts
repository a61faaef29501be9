/**
 * Typed errors for @stratum/crypto
 *
 * Each capability reports its own error kind so that callers can match on
 * the class (or on `err.code`) without parsing messages. Higher layers map
 * these onto their own codes; nothing here is a wire-stable identifier.
 *
 * This package never logs an error. Errors are returned (or thrown, for
 * constructors and codecs) to the immediate caller and never retried.
 */

/**
 * Error codes, grouped by the capability that raises them
 */
export type SigningErrorCode = 'CRYPTO_SIGNING_FAILED';

export type VerificationErrorCode = 'CRYPTO_VERIFICATION_FAILED';

export type KeyAgreementErrorCode = 'CRYPTO_INVALID_PUBLIC_KEY';

export type AeadErrorCode =
  | 'CRYPTO_AEAD_AUTHENTICATION_FAILED'
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_NONCE_LENGTH';

export type EncodingErrorCode =
  | 'CRYPTO_INVALID_ENCODING_CHARACTER'
  | 'CRYPTO_INVALID_ENCODING_LENGTH'
  | 'CRYPTO_NONCANONICAL_ENCODING'
  | 'CRYPTO_UNSUPPORTED_MULTIBASE'
  | 'CRYPTO_UNSUPPORTED_MULTICODEC';

export type KeyErrorCode =
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_SIGNATURE_LENGTH'
  | 'CRYPTO_INVALID_SEED_LENGTH';

export type RandomnessErrorCode = 'CRYPTO_RANDOMNESS_FAILURE';

export type CryptoErrorCode =
  | SigningErrorCode
  | VerificationErrorCode
  | KeyAgreementErrorCode
  | AeadErrorCode
  | EncodingErrorCode
  | KeyErrorCode
  | RandomnessErrorCode;

/**
 * Base class for every error raised by this package
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class CryptoError<C extends CryptoErrorCode = CryptoErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, message: string) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Internal failure while producing a signature */
export class SigningError extends CryptoError<SigningErrorCode> {
  constructor(message = 'signing failed') {
    super('CRYPTO_SIGNING_FAILED', message);
    this.name = 'SigningError';
  }
}

/**
 * Signature did not verify
 *
 * Malformed, wrong-length and mismatched signatures all produce this exact
 * error; the constructor takes no arguments so no detail can leak through it.
 */
export class VerificationError extends CryptoError<VerificationErrorCode> {
  constructor() {
    super('CRYPTO_VERIFICATION_FAILED', 'signature verification failed');
    this.name = 'VerificationError';
  }
}

/** Supplied public key is invalid or a low-order point */
export class KeyAgreementError extends CryptoError<KeyAgreementErrorCode> {
  constructor(message = 'invalid public key for key agreement') {
    super('CRYPTO_INVALID_PUBLIC_KEY', message);
    this.name = 'KeyAgreementError';
  }
}

/** AEAD failure: tag mismatch on decrypt, or wrong-size key/nonce */
export class AeadError extends CryptoError<AeadErrorCode> {
  constructor(code: AeadErrorCode, message: string) {
    super(code, message);
    this.name = 'AeadError';
  }
}

/** Text could not be decoded */
export class EncodingError extends CryptoError<EncodingErrorCode> {
  constructor(code: EncodingErrorCode, message: string) {
    super(code, message);
    this.name = 'EncodingError';
  }
}

/** Key, seed or signature bytes have the wrong size */
export class KeyError extends CryptoError<KeyErrorCode> {
  constructor(code: KeyErrorCode, message: string) {
    super(code, message);
    this.name = 'KeyError';
  }
}

/** The entropy source could not produce bytes */
export class RandomnessError extends CryptoError<RandomnessErrorCode> {
  constructor(message = 'secure random source unavailable') {
    super('CRYPTO_RANDOMNESS_FAILURE', message);
    this.name = 'RandomnessError';
  }
}

/**
 * Check if an unknown thrown value is a CryptoError
 */
export function isCryptoError(value: unknown): value is CryptoError {
  return value instanceof CryptoError;
}
