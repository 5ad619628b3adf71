import { redactObject, redactValue } from '../../../utils/logger';

describe('logger redaction', () => {
  it('redacts credential keys at any depth', () => {
    const redacted = redactObject({
      Authorization: 'Bearer abcdef123456',
      password: 'test-password',
      password_encrypted: 'v1.a.b.c',
      token: 'tok-1',
      username: 'student01',
      nested: { access_token: 'legacy-1', 'set-cookie': 'sid=foo' },
      list: [{ passwordEncrypted: 'v1.d.e.f' }],
    });

    expect(redacted).toEqual({
      Authorization: '[REDACTED]',
      password: '[REDACTED]',
      password_encrypted: '[REDACTED]',
      token: '[REDACTED]',
      username: 'student01',
      nested: { access_token: '[REDACTED]', 'set-cookie': '[REDACTED]' },
      list: [{ passwordEncrypted: '[REDACTED]' }],
    });
  });

  it('redacts bearer and jwt-like strings via value helper', () => {
    expect(redactValue('Bearer token-here')).toBe('Bearer [REDACTED]');
    expect(redactValue('abc.def.ghi')).toBe('[REDACTED_JWT]');
    expect(redactValue('not-a-token')).toBe('not-a-token');
    expect(redactValue(42)).toBe(42);
  });
});
