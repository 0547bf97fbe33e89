import { describe, expect, it } from 'vitest';

import { isValidSecretToken, verifySecretToken } from '../src/secret-token';

const SECRET = 'test-secret';

describe('verifySecretToken', () => {
  it('accepts the configured token', () => {
    expect(verifySecretToken({ expected: SECRET, provided: SECRET })).toBe(true);
    expect(verifySecretToken({ expected: SECRET, provided: [SECRET, 'other'] })).toBe(true);
  });

  it('rejects mismatched or missing tokens', () => {
    expect(verifySecretToken({ expected: SECRET, provided: 'test-secreT' })).toBe(false);
    expect(verifySecretToken({ expected: SECRET, provided: 'test-secret-longer' })).toBe(false);
    expect(verifySecretToken({ expected: SECRET, provided: undefined })).toBe(false);
    expect(verifySecretToken({ expected: SECRET, provided: '' })).toBe(false);
    expect(verifySecretToken({ expected: '', provided: '' })).toBe(false);
  });
});

describe('isValidSecretToken', () => {
  it('follows the Bot API character rules', () => {
    expect(isValidSecretToken('test-secret_01')).toBe(true);
    expect(isValidSecretToken('has space')).toBe(false);
    expect(isValidSecretToken('')).toBe(false);
    expect(isValidSecretToken('a'.repeat(257))).toBe(false);
  });
});
