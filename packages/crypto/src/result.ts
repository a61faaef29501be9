/**
 * Result type for capability operations
 *
 * Signing, verification, key agreement and AEAD return a Result instead of
 * throwing, so the error kind of each capability is part of its signature.
 *
 * @example
 * const result = keypair.sign(message);
 * if (!result.ok) {
 *   // result.error is a SigningError
 * }
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Create an error result
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Check if result is ok (type guard)
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/**
 * Check if result is error (type guard)
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Unwrap a result, throwing its error when it failed
 *
 * For call sites that treat any failure as fatal (scripts, the CLI).
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
