/**
 * Stratum Crypto Package
 *
 * Capability contracts (Signer, Verifier, Hasher, KeyAgreement, Aead) and
 * their bindings to Ed25519, X25519, SHA-256, BLAKE2b-256 and
 * ChaCha20-Poly1305, plus the canonical base64url encoding.
 *
 * Every operation is synchronous and holds no shared mutable state.
 * Deterministic test helpers are exported from '@stratum/crypto/testkit'.
 *
 * @packageDocumentation
 */

export * from './aead.js';
export * from './base64url.js';
export * from './bytes.js';
export * from './ed25519.js';
export * from './errors.js';
export * from './hash.js';
export * from './multiformat.js';
export * from './random.js';
export * from './result.js';
export type * from './traits.js';
export * from './x25519.js';
