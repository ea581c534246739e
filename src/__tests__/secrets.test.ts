/**
 * Tests for ENC: secret decryption
 */

import { createHash } from 'node:crypto';
import { hostname } from 'node:os';
import { describe, it, expect } from 'vitest';
import { decryptSecret, deriveSecretKey, SecretDecryptionError } from '../secrets.js';

function sha256(text: string): Buffer {
  return createHash('sha256').update(text, 'utf-8').digest();
}

function encrypt(plain: string, key: Buffer): string {
  const data = Buffer.from(plain, 'utf-8');
  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = data[i] ^ key[i % key.length];
  }
  return `ENC:${out.toString('base64')}`;
}

describe('deriveSecretKey', () => {
  it('hashes ENCRYPTION_KEY when set', () => {
    expect(deriveSecretKey({ ENCRYPTION_KEY: 'test-key' }).equals(sha256('test-key'))).toBe(true);
  });

  it('falls back to user and host', () => {
    expect(deriveSecretKey({ USER: 'ci-user' }).equals(sha256(`ci-user@${hostname()}`))).toBe(true);
    expect(deriveSecretKey({}).equals(sha256(`default@${hostname()}`))).toBe(true);
  });
});

describe('decryptSecret', () => {
  const key = sha256('test-key');

  it('passes plain values through', () => {
    expect(decryptSecret('test-secret', key)).toBe('test-secret');
  });

  it('decrypts ENC: values', () => {
    expect(decryptSecret(encrypt('test-secret-with-a-long-tail-beyond-32-bytes', key), key)).toBe(
      'test-secret-with-a-long-tail-beyond-32-bytes',
    );
  });

  it('rejects payloads that are not base64', () => {
    expect(() => decryptSecret('ENC:not base64!', key)).toThrow(SecretDecryptionError);
    expect(() => decryptSecret('ENC:', key)).toThrow('Encrypted value is not valid base64');
  });
});
