import { describe, expect, it } from 'vitest';

import { authorize, createAuthGate, decodeBase64, timingResistantEqual } from '@/core/auth-gate.js';

import { basicAuth } from '../helpers/fake-exchange.js';

describe('auth gate', () => {
  const credential = 'alice:test-secret';

  it('accepts the exact credential', () => {
    expect(authorize(credential, basicAuth('alice', 'test-secret'))).toBe(true);
  });

  it('tolerates surrounding whitespace in the encoded part', () => {
    const encoded = Buffer.from(credential).toString('base64');
    expect(authorize(credential, `Basic   ${encoded}  `)).toBe(true);
  });

  it('rejects a wrong password', () => {
    expect(authorize(credential, basicAuth('alice', 'test-secreT'))).toBe(false);
  });

  it('rejects headers without the Basic prefix', () => {
    const encoded = Buffer.from(credential).toString('base64');
    expect(authorize(credential, encoded)).toBe(false);
    expect(authorize(credential, `Bearer ${encoded}`)).toBe(false);
    expect(authorize(credential, `basic ${encoded}`)).toBe(false);
  });

  it('rejects malformed base64', () => {
    expect(authorize(credential, 'Basic ***')).toBe(false);
    expect(authorize(credential, 'Basic YWxpY2U')).toBe(false);
  });

  it('never authorizes an empty credential', () => {
    expect(authorize('', 'Basic ')).toBe(false);
    expect(authorize('', basicAuth('', ''))).toBe(false);
  });

  it('binds the credential in createAuthGate', () => {
    const gate = createAuthGate(credential);
    expect(gate.authorize(basicAuth('alice', 'test-secret'))).toBe(true);
    expect(gate.authorize(basicAuth('bob', 'test-secret'))).toBe(false);
  });

  it('decodes only canonical base64', () => {
    expect(decodeBase64('YWxpY2U6dGVzdC1zZWNyZXQ=')).toBe('alice:test-secret');
    expect(decodeBase64('')).toBe('');
    expect(decodeBase64('abc')).toBeUndefined();
    expect(decodeBase64('ab$=')).toBeUndefined();
  });

  it('compares strings of different lengths', () => {
    expect(timingResistantEqual('a', 'a')).toBe(true);
    expect(timingResistantEqual('a', 'ab')).toBe(false);
    expect(timingResistantEqual('', '')).toBe(true);
  });
});
