/**
 * @signet/http-signatures - collaborator contracts
 *
 * The Signer and Verifier only depend on these shapes. Concrete keys live in
 * @signet/crypto; tests supply their own in-process keys.
 */

/**
 * Signature algorithms understood by the scheme, in preference order.
 */
export const Algorithms = {
  RSA_SHA1: 'rsa-sha1',
  RSA_SHA256: 'rsa-sha256',
  RSA_SHA512: 'rsa-sha512',
  DSA_SHA1: 'dsa-sha1',
  HMAC_SHA1: 'hmac-sha1',
  HMAC_SHA256: 'hmac-sha256',
  HMAC_SHA512: 'hmac-sha512',
  ECDSA_SHA256: 'ecdsa-sha256',
  ED25519: 'ed25519',
} as const;

export type Algorithm = (typeof Algorithms)[keyof typeof Algorithms];

export const ALL_ALGORITHMS: readonly Algorithm[] = Object.values(Algorithms);

export function isAlgorithm(value: string): value is Algorithm {
  return ALL_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Text encodings accepted when turning request content into bytes.
 */
export type Charset = 'utf8' | 'latin1' | 'ascii';

/**
 * A signing identity.
 *
 * `algorithms` is the key's own declared order; the Signer picks the first
 * one the active challenge accepts.
 */
export interface Key {
  readonly id: string;
  readonly algorithms: readonly Algorithm[];
  /** false when the key holds no private material */
  canSign(): boolean;
  canVerify(): boolean;
  /**
   * Sign `data`. Resolves to null when the key declines, e.g. for a null or
   * unsupported algorithm.
   */
  sign(algorithm: Algorithm | null, data: Uint8Array): Promise<Uint8Array | null>;
  verify(algorithm: Algorithm, data: Uint8Array, signature: Uint8Array): Promise<boolean>;
}

/**
 * Ordered, value-semantic collection of keys with a cursor exposed only
 * through `current()` and `discard()`. No operation mutates the receiver.
 */
export interface Keychain extends Iterable<Key> {
  readonly size: number;
  isEmpty(): boolean;
  /** Throws when the keychain is empty. */
  current(): Key;
  /** Keys supporting at least one of `algorithms`, original order kept. */
  filterAlgorithms(algorithms: Iterable<Algorithm>): Keychain;
  /** A keychain without the current key. */
  discard(): Keychain;
}

/**
 * Strategy deriving the public key identifier placed in an Authorization.
 */
export interface KeyId {
  getId(key: Key): string;
}

/**
 * Canonicalizable view of an outgoing request.
 */
export interface SignableRequest {
  /** Header names present on the request, in insertion order */
  headerNames(): string[];
  getHeader(name: string): string | undefined;
  bytesToSign(headers: readonly string[], charset?: Charset): Uint8Array;
}
