/**
 * Asymmetric keys loaded from PEM or DER via node:crypto.
 *
 * The key type decides the algorithms: RSA keys sign rsa-sha256,
 * rsa-sha512 and rsa-sha1 (in that order), DSA keys dsa-sha1, EC keys
 * ecdsa-sha256 and Ed25519 keys ed25519. A key imported from public
 * material only verifies.
 */

import { createPrivateKey, createPublicKey, sign as signData, verify as verifyData } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import type { Algorithm, Key } from '@signet/http-signatures';
import { CryptoError } from './errors.js';
import { sha256Hex } from './hash.js';

/** Digest per algorithm; null where the key type fixes the hash */
const DIGESTS: Partial<Record<Algorithm, string | null>> = {
  'rsa-sha256': 'sha256',
  'rsa-sha512': 'sha512',
  'rsa-sha1': 'sha1',
  'dsa-sha1': 'sha1',
  'ecdsa-sha256': 'sha256',
  ed25519: null,
};

const ALGORITHMS_BY_KEY_TYPE: Record<string, readonly Algorithm[]> = {
  rsa: ['rsa-sha256', 'rsa-sha512', 'rsa-sha1'],
  dsa: ['dsa-sha1'],
  ec: ['ecdsa-sha256'],
  ed25519: ['ed25519'],
};

export class PemKey implements Key {
  readonly id: string;
  readonly algorithms: readonly Algorithm[];
  private readonly privateKey: KeyObject | undefined;
  private readonly publicKey: KeyObject;

  private constructor(
    id: string,
    algorithms: readonly Algorithm[],
    publicKey: KeyObject,
    privateKey?: KeyObject
  ) {
    this.id = id;
    this.algorithms = algorithms;
    this.publicKey = publicKey;
    this.privateKey = privateKey;
  }

  /**
   * Import a private key. The id is the SHA-256 fingerprint of the public
   * key's SPKI encoding.
   */
  static async fromPrivateKey(pem: string | Buffer, passphrase?: string): Promise<PemKey> {
    const privateKey = importKey(() => createPrivateKey({ key: pem, passphrase }));
    const publicKey = createPublicKey(privateKey);
    return new PemKey(await fingerprint(publicKey), algorithmsFor(publicKey), publicKey, privateKey);
  }

  static async fromPublicKey(pem: string | Buffer): Promise<PemKey> {
    const publicKey = importKey(() => createPublicKey(pem));
    return new PemKey(await fingerprint(publicKey), algorithmsFor(publicKey), publicKey);
  }

  static async fromKeyObject(key: KeyObject): Promise<PemKey> {
    if (key.type === 'private') {
      const publicKey = createPublicKey(key);
      return new PemKey(await fingerprint(publicKey), algorithmsFor(publicKey), publicKey, key);
    }
    if (key.type === 'public') {
      return new PemKey(await fingerprint(key), algorithmsFor(key), key);
    }
    throw new CryptoError('CRYPTO_INVALID_KEY', 'Secret key objects belong in HmacKey');
  }

  canSign(): boolean {
    return this.privateKey !== undefined;
  }

  canVerify(): boolean {
    return true;
  }

  async sign(algorithm: Algorithm | null, data: Uint8Array): Promise<Uint8Array | null> {
    if (!this.privateKey || algorithm === null || !this.algorithms.includes(algorithm)) {
      return null;
    }
    return new Uint8Array(signData(DIGESTS[algorithm] ?? null, data, this.privateKey));
  }

  async verify(algorithm: Algorithm, data: Uint8Array, signature: Uint8Array): Promise<boolean> {
    if (!this.algorithms.includes(algorithm)) {
      return false;
    }
    return verifyData(DIGESTS[algorithm] ?? null, data, this.publicKey, signature);
  }

  /**
   * Public half as SPKI PEM, for handing to a server.
   */
  exportPublicKey(): string {
    return this.publicKey.export({ type: 'spki', format: 'pem' }).toString();
  }
}

function importKey(load: () => KeyObject): KeyObject {
  try {
    return load();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CryptoError('CRYPTO_INVALID_KEY', `Unable to import key: ${reason}`);
  }
}

function algorithmsFor(publicKey: KeyObject): readonly Algorithm[] {
  const keyType = publicKey.asymmetricKeyType ?? 'unknown';
  const algorithms = ALGORITHMS_BY_KEY_TYPE[keyType];
  if (!algorithms) {
    throw new CryptoError('CRYPTO_UNSUPPORTED_ALGORITHM', `Unsupported key type: ${keyType}`);
  }
  return algorithms;
}

async function fingerprint(publicKey: KeyObject): Promise<string> {
  return sha256Hex(new Uint8Array(publicKey.export({ type: 'spki', format: 'der' })));
}
