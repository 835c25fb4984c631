/**
 * Client-side key selection, rotation and request signing.
 *
 * A Signer keeps the configured keychain untouched and narrows a candidate
 * view of it: first to keys compatible with the active challenge, then past
 * any key that cannot sign. Callers report failed round-trips through
 * `rotate()`, which either advances past the failed key or re-filters the
 * whole keychain when the server asks for something different.
 *
 * All state changes happen synchronously, so one call finishes before any
 * other caller can observe the instance. `sign()` reads the candidate key
 * and challenge together before awaiting the key.
 */

import { Authorization } from './authorization.js';
import { Challenge, PREEMPTIVE_CHALLENGE } from './challenge.js';
import { charsetOrDefault } from './config.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import { DEFAULT_KEY_ID } from './key-id.js';
import { DefaultKeychain, EMPTY_KEYCHAIN } from './keychain.js';
import { logger as rootLogger } from './logging.js';
import type { Logger } from './logging.js';
import type { Algorithm, Charset, Key, KeyId, Keychain, SignableRequest } from './types.js';

export interface SignerOptions {
  logger?: Logger;
  /** Encoding of the signing string (defaults to SIGNET_CHARSET) */
  charset?: Charset;
}

export class Signer {
  private readonly keychain: Keychain;
  private readonly keyId: KeyId;
  private readonly charset: Charset;
  private readonly log: Logger;
  private candidateKeys: Keychain;
  private challenge: Challenge = PREEMPTIVE_CHALLENGE;

  constructor(keychain?: Keychain | null, keyId?: KeyId | null, options: SignerOptions = {}) {
    this.keychain = keychain ?? EMPTY_KEYCHAIN;
    this.keyId = keyId ?? DEFAULT_KEY_ID;
    this.log = options.logger ?? rootLogger.child({ component: 'signer' });
    this.charset = options.charset ?? charsetOrDefault(this.log);
    this.candidateKeys = this.skipUnusableKeys(
      this.keychain.filterAlgorithms(this.challenge.algorithms)
    );
  }

  static forKey(key: Key, keyId?: KeyId | null, options?: SignerOptions): Signer {
    return new Signer(new DefaultKeychain([key]), keyId, options);
  }

  /**
   * The keychain supplied at construction.
   */
  getKeychain(): Keychain {
    return this.keychain;
  }

  /**
   * The challenge-filtered and rotated view of the keychain.
   */
  getCandidateKeys(): Keychain {
    return this.candidateKeys;
  }

  getKeyId(): KeyId {
    return this.keyId;
  }

  getChallenge(): Challenge {
    return this.challenge;
  }

  /**
   * Rotate candidate keys after a failed request.
   *
   * With the same challenge as before, the current key is discarded only
   * when `failedAuthorization` was signed by it. A different challenge
   * re-filters the full keychain from scratch. Calling without arguments
   * resets to the preemptive challenge; a challenge passed as null or
   * undefined is rejected.
   *
   * @param nextChallenge - challenge returned with the failed response
   * @param failedAuthorization - authorization sent with the failed request
   * @returns true if at least one key remains
   */
  rotate(): boolean;
  rotate(
    nextChallenge: Challenge | null | undefined,
    failedAuthorization?: Authorization | null
  ): boolean;
  rotate(
    ...args:
      | []
      | [nextChallenge: Challenge | null | undefined, failedAuthorization?: Authorization | null]
  ): boolean {
    const nextChallenge = args.length === 0 ? PREEMPTIVE_CHALLENGE : args[0];
    const failedAuthorization = args.length === 0 ? null : args[1];
    if (nextChallenge == null) {
      throw new HttpSignatureError(ErrorCodes.INVALID_ARGUMENT, 'nextChallenge is required');
    }

    let candidates = this.candidateKeys;
    let outcome: 'advanced' | 'refiltered' | 'unchanged' = 'unchanged';

    if (this.challenge.equals(nextChallenge)) {
      if (
        !candidates.isEmpty() &&
        failedAuthorization != null &&
        this.keyId.getId(candidates.current()) === failedAuthorization.getKeyId()
      ) {
        candidates = candidates.discard();
        outcome = 'advanced';
      }
    } else {
      candidates = this.keychain.filterAlgorithms(nextChallenge.algorithms);
      outcome = 'refiltered';
    }

    this.candidateKeys = this.skipUnusableKeys(candidates);
    this.challenge = nextChallenge;

    this.log.debug(
      { outcome, realm: nextChallenge.realm, remaining: this.candidateKeys.size },
      'Rotated candidate keys'
    );

    return !this.candidateKeys.isEmpty();
  }

  /**
   * Sign request content with the current candidate key.
   *
   * @param request - request to sign
   * @param electiveHeaders - headers to sign beyond those the challenge
   *   requires (defaults to every header on the request)
   * @returns the Authorization, or null if no key could sign
   */
  async sign(
    request: SignableRequest,
    electiveHeaders: readonly string[] | null = request.headerNames()
  ): Promise<Authorization | null> {
    const candidates = this.candidateKeys;
    const challenge = this.challenge;

    if (candidates.isEmpty()) {
      return null;
    }

    const key = candidates.current();
    const algorithm = negotiateAlgorithm(key, challenge);
    const headers = selectHeaders(electiveHeaders ?? [], challenge);
    const data = request.bytesToSign(headers, this.charset);

    let signature: Uint8Array | null;
    try {
      signature = await key.sign(algorithm, data);
    } catch (error) {
      this.log.warn({ err: error, keyId: key.id, algorithm }, 'Signing primitive failed');
      return null;
    }

    if (signature === null) {
      return null;
    }

    return Authorization.fromSignatureBytes(this.keyId.getId(key), signature, headers, algorithm);
  }

  /**
   * Discard keys until the current one can sign.
   */
  private skipUnusableKeys(keys: Keychain): Keychain {
    let candidates = keys;
    while (!candidates.isEmpty() && !candidates.current().canSign()) {
      this.log.debug({ keyId: candidates.current().id }, 'Skipping key that cannot sign');
      candidates = candidates.discard();
    }
    return candidates;
  }
}

/**
 * First of the key's own algorithms that the challenge accepts, or null.
 *
 * A null result is still passed to the key, which declines or signs as it
 * sees fit.
 */
export function negotiateAlgorithm(key: Key, challenge: Challenge): Algorithm | null {
  for (const algorithm of key.algorithms) {
    if (challenge.acceptsAlgorithm(algorithm)) {
      return algorithm;
    }
  }
  return null;
}

/**
 * Elective headers in caller order, then any required header not yet listed.
 * Names are compared lowercased.
 */
export function selectHeaders(electiveHeaders: readonly string[], challenge: Challenge): string[] {
  const headers = new Set<string>(electiveHeaders.map((header) => header.toLowerCase()));
  for (const header of challenge.headers) {
    headers.add(header);
  }
  return [...headers];
}
