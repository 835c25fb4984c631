/**
 * Typed errors for @signet/crypto
 *
 * Raised while constructing or importing keys. Signing and verification
 * never throw these: a key that cannot sign resolves to null, and a
 * signature that does not check out resolves to false.
 */

export type CryptoErrorCode =
  | 'CRYPTO_INVALID_KEY_LENGTH'
  | 'CRYPTO_INVALID_KEY'
  | 'CRYPTO_UNSUPPORTED_ALGORITHM'
  | 'CRYPTO_INVALID_SEED_LENGTH';

/**
 * Typed error for crypto operations
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CryptoError.prototype);
  }
}
