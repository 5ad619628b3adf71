import { randomBytes } from 'crypto';
import { CredentialVault, generateCipherKey, loadCipherKey } from '../../../services/credential-vault.service';
import { ConfigurationError, CryptoError } from '../../../utils/errors';

describe('CredentialVault', () => {
  const vault = new CredentialVault(randomBytes(32));

  it('decrypts what it encrypted', () => {
    const ciphertext = vault.encrypt('test-password');
    expect(ciphertext).not.toContain('test-password');
    expect(ciphertext.split('.')).toHaveLength(4);
    expect(ciphertext.startsWith('v1.')).toBe(true);
    expect(vault.decrypt(ciphertext)).toBe('test-password');
  });

  it('uses a fresh IV for every value', () => {
    expect(vault.encrypt('same')).not.toBe(vault.encrypt('same'));
  });

  it('round-trips non-ASCII and empty passwords', () => {
    expect(vault.decrypt(vault.encrypt('kata sandi é'))).toBe('kata sandi é');
    expect(vault.decrypt(vault.encrypt(''))).toBe('');
  });

  it('round-trips printable ASCII passwords up to 128 characters', () => {
    const printable = Array.from({ length: 0x7e - 0x20 + 1 }, (_, i) => String.fromCharCode(0x20 + i)).join('');
    for (let length = 1; length <= 128; length += 1) {
      const password = Array.from({ length }, (_, i) => printable[(i + length) % printable.length]).join('');
      expect(vault.decrypt(vault.encrypt(password))).toBe(password);
    }
    expect(vault.decrypt(vault.encrypt(printable))).toBe(printable);
  });

  it('rejects ciphertext written under a different key', () => {
    const other = new CredentialVault(randomBytes(32));
    const ciphertext = other.encrypt('test-password');
    expect(() => vault.decrypt(ciphertext)).toThrow(CryptoError);
    expect(() => vault.decrypt(ciphertext)).toThrow('Stored credential could not be decrypted with the configured key');
  });

  it('rejects tampered data', () => {
    const [version, iv, tag, data] = vault.encrypt('test-password').split('.');
    const flipped = Buffer.from(data, 'base64url');
    flipped[0] = flipped[0] ^ 0xff;
    expect(() => vault.decrypt([version, iv, tag, flipped.toString('base64url')].join('.'))).toThrow(CryptoError);
  });

  it('rejects values that are not vault ciphertext', () => {
    expect(() => vault.decrypt('plain-text')).toThrow('Stored credential has an unrecognized format');
    expect(() => vault.decrypt('v2.a.b.c')).toThrow('Stored credential has an unrecognized format');
    expect(() => vault.decrypt('v1.AAAA.AAAA.AAAA')).toThrow('Stored credential is truncated');
  });

  it('refuses keys of the wrong size', () => {
    expect(() => new CredentialVault(randomBytes(16))).toThrow(ConfigurationError);
  });
});

describe('loadCipherKey', () => {
  it('fails when ENCRYPTION_KEY is missing or blank', () => {
    expect(() => loadCipherKey({})).toThrow('ENCRYPTION_KEY must be set');
    expect(() => loadCipherKey({ ENCRYPTION_KEY: '   ' })).toThrow(ConfigurationError);
  });

  it('accepts base64 and base64url keys of 32 bytes', () => {
    const key = randomBytes(32);
    expect(loadCipherKey({ ENCRYPTION_KEY: key.toString('base64') }).equals(key)).toBe(true);
    expect(loadCipherKey({ ENCRYPTION_KEY: key.toString('base64url') }).equals(key)).toBe(true);
  });

  it('names the decoded length when the key is too short', () => {
    expect(() => loadCipherKey({ ENCRYPTION_KEY: randomBytes(16).toString('base64') })).toThrow(
      'ENCRYPTION_KEY must decode to 32 bytes (got 16)'
    );
  });

  it('rejects keys that are not base64', () => {
    expect(() => loadCipherKey({ ENCRYPTION_KEY: 'not a key!' })).toThrow('ENCRYPTION_KEY must be base64 or base64url encoded');
  });

  it('generates keys that load', () => {
    const vault = CredentialVault.fromEnv({ ENCRYPTION_KEY: generateCipherKey() });
    expect(vault.decrypt(vault.encrypt('test-password'))).toBe('test-password');
  });
});
