/**
 * Server-issued requirements for a valid signature.
 */

import { ALL_ALGORITHMS } from './types.js';
import type { Algorithm } from './types.js';

export const HEADER_DATE = 'date';
export const HEADER_REQUEST_TARGET = '(request-target)';

export interface ChallengeInit {
  realm: string;
  headers?: Iterable<string>;
  algorithms?: Iterable<Algorithm>;
}

/**
 * Immutable challenge value. Two challenges are equal when they accept the
 * same set of algorithms and require the same set of headers; the realm is
 * informational.
 */
export class Challenge {
  readonly realm: string;
  readonly headers: readonly string[];
  readonly algorithms: readonly Algorithm[];

  constructor(init: ChallengeInit) {
    this.realm = init.realm;
    this.headers = Object.freeze([
      ...new Set(Array.from(init.headers ?? [], (h) => h.toLowerCase())),
    ]);
    this.algorithms = Object.freeze([...new Set(init.algorithms ?? ALL_ALGORITHMS)]);
  }

  acceptsAlgorithm(algorithm: Algorithm): boolean {
    return this.algorithms.includes(algorithm);
  }

  equals(other: Challenge): boolean {
    if (this === other) {
      return true;
    }
    return sameMembers(this.algorithms, other.algorithms) && sameMembers(this.headers, other.headers);
  }

  /**
   * Format as a WWW-Authenticate header value.
   *
   * Format: Signature realm="r",headers="date host",algorithms="rsa-sha256 hmac-sha256"
   */
  toHeaderValue(): string {
    return (
      `Signature realm="${this.realm}",` +
      `headers="${this.headers.join(' ')}",` +
      `algorithms="${this.algorithms.join(' ')}"`
    );
  }
}

function sameMembers<T>(a: readonly T[], b: readonly T[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const members = new Set(a);
  return b.every((item) => members.has(item));
}

/**
 * Stands in for "no server challenge seen yet": every algorithm, date only.
 */
export const PREEMPTIVE_CHALLENGE = new Challenge({
  realm: '<preemptive>',
  headers: [HEADER_DATE],
  algorithms: ALL_ALGORITHMS,
});
