/**
 * Shared-secret keys for the hmac-* algorithms.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import type { Algorithm, Key } from '@signet/http-signatures';
import { CryptoError } from './errors.js';

const HMAC_ALGORITHMS = ['hmac-sha256', 'hmac-sha512', 'hmac-sha1'] as const satisfies readonly Algorithm[];

type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

const HMAC_HASHES: Record<HmacAlgorithm, string> = {
  'hmac-sha256': 'sha256',
  'hmac-sha512': 'sha512',
  'hmac-sha1': 'sha1',
};

function isHmacAlgorithm(algorithm: Algorithm | null): algorithm is HmacAlgorithm {
  return HMAC_ALGORITHMS.some((candidate) => candidate === algorithm);
}

export class HmacKey implements Key {
  readonly id: string;
  readonly algorithms: readonly HmacAlgorithm[];
  private readonly secret: Uint8Array;

  /**
   * @param id - identifier shared with the server
   * @param secret - shared secret (UTF-8 when given as a string)
   * @param algorithms - accepted algorithms, in preference order
   */
  constructor(id: string, secret: Uint8Array | string, algorithms: readonly Algorithm[] = HMAC_ALGORITHMS) {
    const secretBytes = typeof secret === 'string' ? new TextEncoder().encode(secret) : secret;
    if (secretBytes.length === 0) {
      throw new CryptoError('CRYPTO_INVALID_KEY_LENGTH', 'HMAC secret must not be empty');
    }

    const supported: HmacAlgorithm[] = [];
    for (const algorithm of algorithms) {
      if (!isHmacAlgorithm(algorithm)) {
        throw new CryptoError('CRYPTO_UNSUPPORTED_ALGORITHM', `Not an HMAC algorithm: ${algorithm}`);
      }
      supported.push(algorithm);
    }

    this.id = id;
    this.secret = new Uint8Array(secretBytes);
    this.algorithms = Object.freeze(supported);
  }

  canSign(): boolean {
    return true;
  }

  canVerify(): boolean {
    return true;
  }

  async sign(algorithm: Algorithm | null, data: Uint8Array): Promise<Uint8Array | null> {
    if (!isHmacAlgorithm(algorithm) || !this.algorithms.includes(algorithm)) {
      return null;
    }
    return this.digest(algorithm, data);
  }

  async verify(algorithm: Algorithm, data: Uint8Array, signature: Uint8Array): Promise<boolean> {
    if (!isHmacAlgorithm(algorithm) || !this.algorithms.includes(algorithm)) {
      return false;
    }
    const expected = this.digest(algorithm, data);
    return expected.length === signature.length && timingSafeEqual(expected, signature);
  }

  private digest(algorithm: HmacAlgorithm, data: Uint8Array): Uint8Array {
    return new Uint8Array(createHmac(HMAC_HASHES[algorithm], this.secret).update(data).digest());
  }
}
