import type { Algorithm, Key } from '../src/types.js';

export interface FakeKeyInit {
  id: string;
  algorithms: Algorithm[];
  canSign?: boolean;
  /** Throw from sign() instead of signing */
  failWith?: Error;
}

/**
 * In-process key whose signature is the UTF-8 text `<id>|<algorithm>|<data>`.
 */
export class FakeKey implements Key {
  readonly id: string;
  readonly algorithms: readonly Algorithm[];
  readonly signedWith: Array<Algorithm | null> = [];
  private readonly signing: boolean;
  private readonly failWith: Error | undefined;

  constructor(init: FakeKeyInit) {
    this.id = init.id;
    this.algorithms = init.algorithms;
    this.signing = init.canSign ?? true;
    this.failWith = init.failWith;
  }

  canSign(): boolean {
    return this.signing;
  }

  canVerify(): boolean {
    return true;
  }

  async sign(algorithm: Algorithm | null, data: Uint8Array): Promise<Uint8Array | null> {
    this.signedWith.push(algorithm);
    if (this.failWith) {
      throw this.failWith;
    }
    if (!this.signing || algorithm === null || !this.algorithms.includes(algorithm)) {
      return null;
    }
    return fakeSignature(this.id, algorithm, data);
  }

  async verify(algorithm: Algorithm, data: Uint8Array, signature: Uint8Array): Promise<boolean> {
    const expected = fakeSignature(this.id, algorithm, data);
    return Buffer.from(expected).equals(Buffer.from(signature));
  }
}

export function fakeSignature(id: string, algorithm: Algorithm, data: Uint8Array): Uint8Array {
  return new TextEncoder().encode(`${id}|${algorithm}|${new TextDecoder().decode(data)}`);
}
