/**
 * Ed25519 keys over raw 32-byte key material.
 */

import type { Algorithm, Key } from '@signet/http-signatures';
import { getPublicKey, randomSecretKey, sign, verify } from './ed25519.js';
import { CryptoError } from './errors.js';
import { sha256Hex } from './hash.js';

const ED25519_ALGORITHMS: readonly Algorithm[] = ['ed25519'];

export class Ed25519Key implements Key {
  readonly id: string;
  readonly algorithms = ED25519_ALGORITHMS;
  readonly publicKey: Uint8Array;
  private readonly privateKey: Uint8Array | undefined;

  private constructor(id: string, publicKey: Uint8Array, privateKey?: Uint8Array) {
    this.id = id;
    this.publicKey = publicKey;
    this.privateKey = privateKey;
  }

  /**
   * @param privateKey - 32-byte Ed25519 seed
   * @param id - key identifier (defaults to the public key fingerprint)
   */
  static async fromPrivateKey(privateKey: Uint8Array, id?: string): Promise<Ed25519Key> {
    assertKeyLength(privateKey, 'private');
    const publicKey = await getPublicKey(privateKey);
    return new Ed25519Key(id ?? (await sha256Hex(publicKey)), publicKey, new Uint8Array(privateKey));
  }

  static async fromPublicKey(publicKey: Uint8Array, id?: string): Promise<Ed25519Key> {
    assertKeyLength(publicKey, 'public');
    return new Ed25519Key(id ?? (await sha256Hex(publicKey)), new Uint8Array(publicKey));
  }

  static async generate(id?: string): Promise<Ed25519Key> {
    return Ed25519Key.fromPrivateKey(randomSecretKey(), id);
  }

  canSign(): boolean {
    return this.privateKey !== undefined;
  }

  canVerify(): boolean {
    return true;
  }

  async sign(algorithm: Algorithm | null, data: Uint8Array): Promise<Uint8Array | null> {
    if (!this.privateKey || algorithm !== 'ed25519') {
      return null;
    }
    return sign(data, this.privateKey);
  }

  async verify(algorithm: Algorithm, data: Uint8Array, signature: Uint8Array): Promise<boolean> {
    if (algorithm !== 'ed25519') {
      return false;
    }
    try {
      return await verify(signature, data, this.publicKey);
    } catch {
      // malformed signature or point encoding
      return false;
    }
  }
}

function assertKeyLength(key: Uint8Array, kind: 'private' | 'public'): void {
  if (key.length !== 32) {
    throw new CryptoError(
      'CRYPTO_INVALID_KEY_LENGTH',
      `Ed25519 ${kind} key must be 32 bytes, got ${key.length}`
    );
  }
}
