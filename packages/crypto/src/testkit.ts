/**
 * Signet Crypto Test Kit
 *
 * Utilities for TEST FIXTURES ONLY, kept out of the main entry point.
 *
 * Import path: @signet/crypto/testkit
 */

import { Ed25519Key } from './ed25519-key.js';
import { CryptoError } from './errors.js';

/**
 * Build an Ed25519 key from a deterministic seed.
 *
 * WARNING: FOR TEST FIXTURES ONLY. Seeded keys are predictable.
 *
 * @param seed - 32-byte seed
 * @param id - key identifier (defaults to the public key fingerprint)
 *
 * @example
 * ```ts
 * import { ed25519KeyFromSeed } from '@signet/crypto/testkit';
 *
 * const key = await ed25519KeyFromSeed(new Uint8Array(32).fill(7), 'test-key');
 * ```
 */
export async function ed25519KeyFromSeed(seed: Uint8Array, id?: string): Promise<Ed25519Key> {
  if (seed.length !== 32) {
    throw new CryptoError('CRYPTO_INVALID_SEED_LENGTH', 'Ed25519 seed must be 32 bytes');
  }

  // In Ed25519, the private key IS the seed
  return Ed25519Key.fromPrivateKey(seed, id);
}
