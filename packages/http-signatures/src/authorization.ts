/**
 * Signed Authorization value produced by the Signer.
 */

import type { Algorithm } from './types.js';

export class Authorization {
  readonly keyId: string;
  /** Base64 encoded signature */
  readonly signature: string;
  readonly headers: readonly string[];
  readonly algorithm: Algorithm | null;

  constructor(
    keyId: string,
    signature: string,
    headers: readonly string[],
    algorithm: Algorithm | null
  ) {
    this.keyId = keyId;
    this.signature = signature;
    this.headers = Object.freeze([...headers]);
    this.algorithm = algorithm;
  }

  static fromSignatureBytes(
    keyId: string,
    signature: Uint8Array,
    headers: readonly string[],
    algorithm: Algorithm | null
  ): Authorization {
    return new Authorization(keyId, Buffer.from(signature).toString('base64'), headers, algorithm);
  }

  getKeyId(): string {
    return this.keyId;
  }

  signatureBytes(): Uint8Array {
    return new Uint8Array(Buffer.from(this.signature, 'base64'));
  }

  /**
   * Format as an Authorization header value.
   *
   * Format: Signature keyId="k",algorithm="rsa-sha256",headers="date host",signature="..."
   */
  toHeaderValue(): string {
    const params = [`keyId="${this.keyId}"`];
    if (this.algorithm !== null) {
      params.push(`algorithm="${this.algorithm}"`);
    }
    params.push(`headers="${this.headers.join(' ')}"`);
    params.push(`signature="${this.signature}"`);
    return `Signature ${params.join(',')}`;
  }
}
