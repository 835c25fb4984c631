/**
 * @signet/http-signatures
 *
 * HTTP Signatures key rotation, request signing and verification.
 */

// Types
export { Algorithms, ALL_ALGORITHMS, isAlgorithm } from './types.js';
export type { Algorithm, Charset, Key, Keychain, KeyId, SignableRequest } from './types.js';

// Values
export {
  Challenge,
  PREEMPTIVE_CHALLENGE,
  HEADER_DATE,
  HEADER_REQUEST_TARGET,
} from './challenge.js';
export type { ChallengeInit } from './challenge.js';
export { Authorization } from './authorization.js';
export { DefaultKeychain, EMPTY_KEYCHAIN } from './keychain.js';
export { DEFAULT_KEY_ID, UserKeysKeyId, keyIdFrom } from './key-id.js';
export { RequestContent, RequestContentBuilder, formatDate } from './request-content.js';

// Signing
export { Signer, negotiateAlgorithm, selectHeaders } from './signer.js';
export type { SignerOptions } from './signer.js';

// Verification
export { Verifier, isDateWithinSkew } from './verifier.js';
export type { VerifierOptions, VerificationResult } from './verifier.js';

// Config and logging
export {
  loadConfig,
  loadLogLevel,
  loadClockSkewSeconds,
  loadCharset,
  charsetOrDefault,
  CONFIG_DEFAULTS,
} from './config.js';
export type { SignetConfig, LogLevel } from './config.js';
export { logger, createLogger } from './logging.js';
export type { Logger } from './logging.js';

// Errors
export { ErrorCodes, ErrorHttpStatus, HttpSignatureError } from './errors.js';
export type { ErrorCode } from './errors.js';
