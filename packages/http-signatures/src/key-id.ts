import type { Key, KeyId } from './types.js';

/**
 * Uses the key's own identifier.
 */
export const DEFAULT_KEY_ID: KeyId = {
  getId: (key: Key): string => key.id,
};

/**
 * Identifies keys as `/<username>/keys/<key id>`, the path layout used by
 * servers that publish user keys by fingerprint.
 */
export class UserKeysKeyId implements KeyId {
  constructor(private readonly username: string) {}

  getId(key: Key): string {
    return `/${this.username}/keys/${key.id}`;
  }
}

export function keyIdFrom(fn: (key: Key) => string): KeyId {
  return { getId: fn };
}
