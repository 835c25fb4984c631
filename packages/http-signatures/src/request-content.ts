/**
 * Signing string construction.
 *
 * The signing string is one `name: value` line per signed header, joined
 * with newlines, in the order the headers are listed in the Authorization.
 * The `(request-target)` pseudo-header carries the lowercase method and
 * the request path.
 */

import { HEADER_DATE, HEADER_REQUEST_TARGET } from './challenge.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import type { Charset, SignableRequest } from './types.js';

export class RequestContent implements SignableRequest {
  private readonly headers: ReadonlyMap<string, readonly string[]>;

  constructor(headers: ReadonlyMap<string, readonly string[]>) {
    this.headers = headers;
  }

  static builder(): RequestContentBuilder {
    return new RequestContentBuilder();
  }

  headerNames(): string[] {
    return [...this.headers.keys()];
  }

  /**
   * Get header value by name (case-insensitive). Repeated headers are
   * joined with ", ".
   */
  getHeader(name: string): string | undefined {
    const values = this.headers.get(name.toLowerCase());
    return values === undefined ? undefined : values.join(', ');
  }

  /**
   * Build the signing string. Names not present on the request are skipped.
   */
  contentString(headers: readonly string[]): string {
    const lines: string[] = [];

    for (const header of headers) {
      const name = header.toLowerCase();
      const value = this.getHeader(name);
      if (value !== undefined) {
        lines.push(`${name}: ${value}`);
      }
    }

    return lines.join('\n');
  }

  bytesToSign(headers: readonly string[], charset: Charset = 'utf8'): Uint8Array {
    return new Uint8Array(Buffer.from(this.contentString(headers), charset));
  }
}

export class RequestContentBuilder {
  private readonly headers = new Map<string, string[]>();

  setRequestTarget(method: string, path: string): this {
    this.headers.set(HEADER_REQUEST_TARGET, [`${method.toLowerCase()} ${path}`]);
    return this;
  }

  addHeader(name: string, value: string): this {
    const lowerName = name.toLowerCase();
    if (lowerName === HEADER_REQUEST_TARGET) {
      throw new HttpSignatureError(
        ErrorCodes.INVALID_ARGUMENT,
        `Use setRequestTarget() for ${HEADER_REQUEST_TARGET}`
      );
    }
    const values = this.headers.get(lowerName);
    if (values) {
      values.push(value.trim());
    } else {
      this.headers.set(lowerName, [value.trim()]);
    }
    return this;
  }

  addDate(date: Date): this {
    return this.addHeader(HEADER_DATE, formatDate(date));
  }

  addDateNow(): this {
    return this.addDate(new Date());
  }

  build(): RequestContent {
    const copy = new Map<string, string[]>();
    for (const [name, values] of this.headers) {
      copy.set(name, [...values]);
    }
    return new RequestContent(copy);
  }
}

/**
 * IMF-fixdate, e.g. `Tue, 07 Jun 2014 20:51:35 GMT`.
 */
export function formatDate(date: Date): string {
  return date.toUTCString();
}
