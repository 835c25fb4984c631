/**
 * Cryptographic hash utilities
 *
 * Key fingerprints are lowercase hex SHA-256 digests.
 */

/**
 * Compute SHA-256 hash of data and return as lowercase hex string
 *
 * Uses Web Crypto API if available, falls back to Node.js crypto.
 *
 * @param data - Data to hash (Uint8Array or string)
 * @returns Lowercase hex string (64 characters)
 */
export async function sha256Hex(data: Uint8Array | string): Promise<string> {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;

  if (typeof globalThis.crypto?.subtle?.digest === 'function') {
    const hashBuffer = await globalThis.crypto.subtle.digest('SHA-256', bytes);
    return bytesToHex(new Uint8Array(hashBuffer));
  }

  const { createHash } = await import('node:crypto');
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}
