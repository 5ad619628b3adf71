import * as crypto from 'crypto';
import { ConfigurationError, CryptoError } from '../utils/errors';

/**
 * CredentialVault - reversible encryption for stored portal passwords.
 *
 * AES-256-GCM with a random 96-bit IV per value. Ciphertext layout:
 * `v1.<iv>.<authTag>.<data>`, each segment base64url.
 */

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const VERSION = 'v1';

function decodeKey(raw: string): Buffer {
  const normalized = raw.trim().replace(/-/g, '+').replace(/_/g, '/');
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(normalized)) {
    throw new ConfigurationError('ENCRYPTION_KEY must be base64 or base64url encoded');
  }
  const key = Buffer.from(normalized, 'base64');
  if (key.length !== KEY_BYTES) {
    throw new ConfigurationError(`ENCRYPTION_KEY must decode to ${KEY_BYTES} bytes (got ${key.length})`);
  }
  return key;
}

/** Read the cipher key once at startup; absent or malformed keys are fatal. */
export function loadCipherKey(env: NodeJS.ProcessEnv = process.env): Buffer {
  const raw = env.ENCRYPTION_KEY;
  if (!raw || !raw.trim()) {
    throw new ConfigurationError('ENCRYPTION_KEY must be set');
  }
  return decodeKey(raw);
}

export function generateCipherKey(): string {
  return crypto.randomBytes(KEY_BYTES).toString('base64url');
}

export class CredentialVault {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) {
      throw new ConfigurationError(`Cipher key must be ${KEY_BYTES} bytes`);
    }
    this.key = Buffer.from(key);
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): CredentialVault {
    return new CredentialVault(loadCipherKey(env));
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    const data = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [VERSION, iv.toString('base64url'), tag.toString('base64url'), data.toString('base64url')].join('.');
  }

  decrypt(ciphertext: string): string {
    const parts = ciphertext.split('.');
    if (parts.length !== 4 || parts[0] !== VERSION) {
      throw new CryptoError('Stored credential has an unrecognized format');
    }
    const [, ivPart, tagPart, dataPart] = parts;
    const iv = Buffer.from(ivPart, 'base64url');
    const tag = Buffer.from(tagPart, 'base64url');
    if (iv.length !== IV_BYTES || tag.length !== TAG_BYTES) {
      throw new CryptoError('Stored credential is truncated');
    }
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv);
      decipher.setAuthTag(tag);
      const data = Buffer.concat([decipher.update(Buffer.from(dataPart, 'base64url')), decipher.final()]);
      return data.toString('utf8');
    } catch {
      throw new CryptoError('Stored credential could not be decrypted with the configured key');
    }
  }
}
