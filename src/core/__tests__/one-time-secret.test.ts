import { inspect } from 'util';
import { describe, expect, it } from 'vitest';
import { OneTimeSecret } from '../one-time-secret.js';

describe('OneTimeSecret', () => {
  it('never renders the value', () => {
    const secret = new OneTimeSecret('test-secret');

    expect(String(secret)).toBe('[one-time secret]');
    expect(`${secret}`).toBe('[one-time secret]');
    expect(JSON.stringify({ key: secret })).toBe('{"key":"[one-time secret]"}');
    expect(inspect(secret)).toBe('[one-time secret]');
  });

  it('reveals the value exactly once', () => {
    const secret = new OneTimeSecret('test-secret');

    expect(secret.reveal()).toBe('test-secret');
    expect(() => secret.reveal()).toThrow('One-time secret has already been revealed.');
  });
});
