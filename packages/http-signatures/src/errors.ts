/**
 * HTTP Signature error codes.
 */

export const ErrorCodes = {
  /** Caller passed a missing or malformed argument */
  INVALID_ARGUMENT: 'E_INVALID_ARGUMENT',
  /** Algorithm or signed headers do not meet the challenge */
  CHALLENGE_NOT_SATISFIED: 'E_CHALLENGE_NOT_SATISFIED',
  /** A signed header is missing from the request */
  INCOMPLETE_REQUEST: 'E_INCOMPLETE_REQUEST',
  /** No key in the keychain matches the authorization keyId */
  KEY_NOT_FOUND: 'E_KEY_NOT_FOUND',
  /** Cryptographic verification failed */
  SIGNATURE_INVALID: 'E_SIGNATURE_INVALID',
  /** Signed date header is outside the allowed clock skew */
  DATE_EXPIRED: 'E_DATE_EXPIRED',
  /** Environment configuration failed validation */
  CONFIG_INVALID: 'E_CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status codes for each error.
 */
export const ErrorHttpStatus: Record<ErrorCode, number> = {
  [ErrorCodes.INVALID_ARGUMENT]: 400,
  [ErrorCodes.CHALLENGE_NOT_SATISFIED]: 401,
  [ErrorCodes.INCOMPLETE_REQUEST]: 400,
  [ErrorCodes.KEY_NOT_FOUND]: 401,
  [ErrorCodes.SIGNATURE_INVALID]: 401,
  [ErrorCodes.DATE_EXPIRED]: 401,
  [ErrorCodes.CONFIG_INVALID]: 500,
};

/**
 * HTTP Signature error with code and HTTP status.
 */
export class HttpSignatureError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'HttpSignatureError';
    this.code = code;
    this.httpStatus = ErrorHttpStatus[code];
  }
}
