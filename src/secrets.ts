/**
 * At-rest Secret Decryption
 *
 * Credentials in .env may be stored as `ENC:<base64>` instead of plain text.
 * The payload is XOR-ed with a 32-byte key:
 * - sha256(ENCRYPTION_KEY) when ENCRYPTION_KEY is set
 * - otherwise sha256("{USER|default}@{hostname}"), which ties the value to one machine
 *
 * Values without the prefix pass through unchanged, so plain-text .env files keep working.
 */

import { createHash } from 'node:crypto';
import { hostname } from 'node:os';

export const ENCRYPTED_PREFIX = 'ENC:';

export class SecretDecryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SecretDecryptionError';
  }
}

/** Derive the XOR key from the environment (see module header). */
export function deriveSecretKey(env: NodeJS.ProcessEnv = process.env): Buffer {
  const material = env.ENCRYPTION_KEY || `${env.USER || 'default'}@${hostname()}`;
  return createHash('sha256').update(material, 'utf-8').digest();
}

function xorWithKey(data: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = data[i] ^ key[i % key.length];
  }
  return out;
}

/**
 * Decrypt an `ENC:` value. Plain values are returned as-is.
 *
 * @throws SecretDecryptionError if the payload is empty or not valid base64
 */
export function decryptSecret(value: string, key: Buffer = deriveSecretKey()): string {
  if (!value.startsWith(ENCRYPTED_PREFIX)) return value;

  const payload = value.slice(ENCRYPTED_PREFIX.length);
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(payload)) {
    throw new SecretDecryptionError('Encrypted value is not valid base64');
  }

  return xorWithKey(Buffer.from(payload, 'base64'), key).toString('utf-8');
}
