/**
 * HTTP Signature verification.
 *
 * Server-side counterpart to the Signer: checks an Authorization against
 * the challenge the server issued and the keys it trusts.
 */

import type { Authorization } from './authorization.js';
import { HEADER_DATE } from './challenge.js';
import type { Challenge } from './challenge.js';
import { charsetOrDefault, loadClockSkewSeconds } from './config.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import type { ErrorCode } from './errors.js';
import { DEFAULT_KEY_ID } from './key-id.js';
import { logger as rootLogger } from './logging.js';
import type { Logger } from './logging.js';
import type { Algorithm, Charset, Key, KeyId, Keychain, SignableRequest } from './types.js';

export interface VerifierOptions {
  logger?: Logger;
  /** Clock skew tolerance in seconds (defaults to SIGNET_CLOCK_SKEW_SECONDS) */
  clockSkewSeconds?: number;
  charset?: Charset;
  /** Current time in milliseconds (defaults to Date.now()) */
  now?: () => number;
}

/**
 * Verification result with detailed information.
 */
export type VerificationResult =
  | { valid: true; key: Key }
  | { valid: false; errorCode: ErrorCode; errorMessage: string };

export class Verifier {
  private readonly keychain: Keychain;
  private readonly keyId: KeyId;
  private readonly clockSkewSeconds: number;
  private readonly charset: Charset;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(keychain: Keychain, keyId?: KeyId | null, options: VerifierOptions = {}) {
    this.keychain = keychain;
    this.keyId = keyId ?? DEFAULT_KEY_ID;
    this.clockSkewSeconds = options.clockSkewSeconds ?? loadClockSkewSeconds();
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? rootLogger.child({ component: 'verifier' });
    this.charset = options.charset ?? charsetOrDefault(this.log);
  }

  getKeychain(): Keychain {
    return this.keychain;
  }

  getKeyId(): KeyId {
    return this.keyId;
  }

  /**
   * Verify an Authorization for a request.
   *
   * @param challenge - challenge the server requires
   * @param request - request the authorization was sent with
   * @param authorization - authorization to check
   */
  async verify(
    challenge: Challenge,
    request: SignableRequest,
    authorization: Authorization
  ): Promise<VerificationResult> {
    try {
      const algorithm = checkChallenge(challenge, authorization);
      checkRequestComplete(request, authorization);

      if (authorization.headers.includes(HEADER_DATE)) {
        const dateHeader = request.getHeader(HEADER_DATE) ?? '';
        if (!isDateWithinSkew(dateHeader, this.now(), this.clockSkewSeconds)) {
          throw new HttpSignatureError(
            ErrorCodes.DATE_EXPIRED,
            `Date header outside allowed skew of ${this.clockSkewSeconds}s: ${dateHeader}`
          );
        }
      }

      const key = this.findKey(authorization.getKeyId(), algorithm);
      if (!key) {
        throw new HttpSignatureError(
          ErrorCodes.KEY_NOT_FOUND,
          `Key not found: ${authorization.getKeyId()}`
        );
      }

      const data = request.bytesToSign(authorization.headers, this.charset);
      const valid = await key.verify(algorithm, data, authorization.signatureBytes());

      if (!valid) {
        throw new HttpSignatureError(ErrorCodes.SIGNATURE_INVALID, 'Signature verification failed');
      }

      return { valid: true, key };
    } catch (error) {
      if (error instanceof HttpSignatureError) {
        this.log.debug(
          { errorCode: error.code, keyId: authorization.getKeyId() },
          'Signature verification failed'
        );
        return {
          valid: false,
          errorCode: error.code,
          errorMessage: error.message,
        };
      }
      throw error;
    }
  }

  /**
   * First key whose identifier matches and which can verify `algorithm`.
   */
  private findKey(keyId: string, algorithm: Algorithm): Key | undefined {
    for (const key of this.keychain) {
      if (
        this.keyId.getId(key) === keyId &&
        key.canVerify() &&
        key.algorithms.includes(algorithm)
      ) {
        return key;
      }
    }
    return undefined;
  }
}

/**
 * Validate the authorization's algorithm and headers against the challenge.
 *
 * @returns the authorization's algorithm
 */
function checkChallenge(challenge: Challenge, authorization: Authorization): Algorithm {
  const { algorithm } = authorization;
  if (algorithm === null || !challenge.acceptsAlgorithm(algorithm)) {
    throw new HttpSignatureError(
      ErrorCodes.CHALLENGE_NOT_SATISFIED,
      `Algorithm not accepted: ${algorithm ?? '(none)'}`
    );
  }

  const missing = challenge.headers.filter((header) => !authorization.headers.includes(header));
  if (missing.length > 0) {
    throw new HttpSignatureError(
      ErrorCodes.CHALLENGE_NOT_SATISFIED,
      `Required headers not signed: ${missing.join(', ')}`
    );
  }

  return algorithm;
}

function checkRequestComplete(request: SignableRequest, authorization: Authorization): void {
  const missing = authorization.headers.filter((header) => request.getHeader(header) === undefined);
  if (missing.length > 0) {
    throw new HttpSignatureError(
      ErrorCodes.INCOMPLETE_REQUEST,
      `Signed headers missing from request: ${missing.join(', ')}`
    );
  }
}

/**
 * Check a date header against the current time.
 *
 * @param dateHeader - HTTP date header value
 * @param now - current time in milliseconds
 * @param skewSeconds - allowed distance in either direction
 * @returns false when the header is unparseable or too far from now
 */
export function isDateWithinSkew(dateHeader: string, now: number, skewSeconds: number): boolean {
  const date = Date.parse(dateHeader);
  if (Number.isNaN(date)) {
    return false;
  }
  return Math.abs(now - date) <= skewSeconds * 1000;
}
