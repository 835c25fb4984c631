import { describe, it, expect } from 'vitest';
import { Challenge, PREEMPTIVE_CHALLENGE } from '../src/challenge.js';
import { Authorization } from '../src/authorization.js';
import { ALL_ALGORITHMS, isAlgorithm } from '../src/types.js';

describe('Challenge', () => {
  it('normalizes header names and drops duplicates', () => {
    const challenge = new Challenge({
      realm: 'api',
      headers: ['Date', 'host', 'DATE'],
      algorithms: ['rsa-sha256', 'rsa-sha256', 'hmac-sha256'],
    });

    expect(challenge.headers).toEqual(['date', 'host']);
    expect(challenge.algorithms).toEqual(['rsa-sha256', 'hmac-sha256']);
  });

  it('defaults to every algorithm and no headers', () => {
    const challenge = new Challenge({ realm: 'api' });

    expect(challenge.headers).toEqual([]);
    expect(challenge.algorithms).toEqual(ALL_ALGORITHMS);
  });

  it('compares algorithms and headers as sets', () => {
    const a = new Challenge({ realm: 'a', headers: ['date', 'host'], algorithms: ['rsa-sha256', 'ed25519'] });
    const b = new Challenge({ realm: 'b', headers: ['host', 'date'], algorithms: ['ed25519', 'rsa-sha256'] });

    expect(a.equals(b)).toBe(true);
    expect(b.equals(a)).toBe(true);
  });

  it('differs when either set differs', () => {
    const base = new Challenge({ realm: 'a', headers: ['date'], algorithms: ['rsa-sha256'] });
    const moreHeaders = new Challenge({ realm: 'a', headers: ['date', 'host'], algorithms: ['rsa-sha256'] });
    const otherAlgorithm = new Challenge({ realm: 'a', headers: ['date'], algorithms: ['rsa-sha512'] });

    expect(base.equals(moreHeaders)).toBe(false);
    expect(base.equals(otherAlgorithm)).toBe(false);
  });

  it('formats a WWW-Authenticate value', () => {
    const challenge = new Challenge({
      realm: 'api',
      headers: ['(request-target)', 'date'],
      algorithms: ['rsa-sha256', 'hmac-sha256'],
    });

    expect(challenge.toHeaderValue()).toBe(
      'Signature realm="api",headers="(request-target) date",algorithms="rsa-sha256 hmac-sha256"'
    );
  });

  it('has a preemptive challenge requiring only the date', () => {
    expect(PREEMPTIVE_CHALLENGE.realm).toBe('<preemptive>');
    expect(PREEMPTIVE_CHALLENGE.headers).toEqual(['date']);
    expect(PREEMPTIVE_CHALLENGE.algorithms).toEqual(ALL_ALGORITHMS);
  });
});

describe('Authorization', () => {
  it('encodes signature bytes as base64', () => {
    const authorization = Authorization.fromSignatureBytes(
      'k1',
      new Uint8Array([116, 101, 115, 116]),
      ['date'],
      'hmac-sha256'
    );

    expect(authorization.signature).toBe('dGVzdA==');
    expect(authorization.signatureBytes()).toEqual(new Uint8Array([116, 101, 115, 116]));
    expect(authorization.getKeyId()).toBe('k1');
  });

  it('copies the header list', () => {
    const headers = ['date'];
    const authorization = new Authorization('k1', 'dGVzdA==', headers, 'rsa-sha256');
    headers.push('host');

    expect(authorization.headers).toEqual(['date']);
  });

  it('formats an Authorization value', () => {
    const authorization = new Authorization('k1', 'dGVzdA==', ['date', 'host'], 'rsa-sha256');

    expect(authorization.toHeaderValue()).toBe(
      'Signature keyId="k1",algorithm="rsa-sha256",headers="date host",signature="dGVzdA=="'
    );
  });

  it('omits a missing algorithm', () => {
    const authorization = new Authorization('k1', 'dGVzdA==', ['date'], null);

    expect(authorization.toHeaderValue()).toBe(
      'Signature keyId="k1",headers="date",signature="dGVzdA=="'
    );
  });
});

describe('isAlgorithm', () => {
  it('recognizes known algorithm names', () => {
    expect(ALL_ALGORITHMS.every(isAlgorithm)).toBe(true);
    expect(isAlgorithm('hmac-sha384')).toBe(false);
    expect(isAlgorithm('RSA-SHA256')).toBe(false);
  });
});
