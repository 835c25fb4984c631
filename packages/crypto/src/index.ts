/**
 * Signet Crypto Package
 *
 * Key implementations for @signet/http-signatures: HMAC shared secrets,
 * PEM/DER asymmetric keys through node:crypto, and Ed25519 through
 * @noble/ed25519.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './hash.js';
export * from './hmac-key.js';
export * from './pem-key.js';
export * from './ed25519-key.js';
