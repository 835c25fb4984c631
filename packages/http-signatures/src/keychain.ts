/**
 * Array-backed Keychain.
 *
 * Every narrowing operation returns a new keychain over a fresh array, so a
 * value captured earlier never observes later discards.
 */

import { ErrorCodes, HttpSignatureError } from './errors.js';
import type { Algorithm, Key, Keychain } from './types.js';

export class DefaultKeychain implements Keychain {
  private readonly keys: readonly Key[];

  constructor(keys: Iterable<Key> = []) {
    this.keys = Object.freeze([...keys]);
  }

  get size(): number {
    return this.keys.length;
  }

  isEmpty(): boolean {
    return this.keys.length === 0;
  }

  current(): Key {
    const key = this.keys[0];
    if (key === undefined) {
      throw new HttpSignatureError(ErrorCodes.INVALID_ARGUMENT, 'Keychain is empty');
    }
    return key;
  }

  filterAlgorithms(algorithms: Iterable<Algorithm>): DefaultKeychain {
    const accepted = new Set(algorithms);
    return new DefaultKeychain(
      this.keys.filter((key) => key.algorithms.some((algorithm) => accepted.has(algorithm)))
    );
  }

  discard(): DefaultKeychain {
    return new DefaultKeychain(this.keys.slice(1));
  }

  [Symbol.iterator](): Iterator<Key> {
    return this.keys[Symbol.iterator]();
  }
}

export const EMPTY_KEYCHAIN: Keychain = new DefaultKeychain();
