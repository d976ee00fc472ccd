import { sanitizeLogData, sanitizeMessage } from '../src/security/log-sanitizer';

describe('sanitizeMessage', () => {
  it('redacts authorization header values', () => {
    expect(sanitizeMessage('Authorization: Token abc123def456')).toBe('Authorization: Token [REDACTED]');
    expect(sanitizeMessage('header Splunk 0000-test-hec-token')).toBe('header Splunk [REDACTED]');
  });

  it('leaves ordinary words after a scheme name alone', () => {
    expect(sanitizeMessage('Splunk HEC not configured')).toBe('Splunk HEC not configured');
  });

  it('redacts inline keys, passwords and secrets', () => {
    expect(sanitizeMessage('api_key=test-secret-1')).toBe('api_token: [REDACTED]');
    expect(sanitizeMessage('password: hunter2')).toBe('password: [REDACTED]');
    expect(sanitizeMessage('client secret=placeholder')).toBe('client secret: [REDACTED]');
  });

  it('redacts email addresses', () => {
    expect(sanitizeMessage('assigned to noc@example.test')).toBe('assigned to [EMAIL_REDACTED]');
  });
});

describe('sanitizeLogData', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      sanitizeLogData({
        Authorization: 'Token abc',
        nested: { password: 'p', attempts: 3 },
        list: ['Bearer abcdefgh1'],
      })
    ).toEqual({
      Authorization: '[REDACTED]',
      nested: { password: '[REDACTED]', attempts: 3 },
      list: ['Bearer [REDACTED]'],
    });
  });

  it('passes through values that are not strings or objects', () => {
    expect(sanitizeLogData(42)).toBe(42);
    expect(sanitizeLogData(null)).toBeNull();
    expect(sanitizeLogData(undefined)).toBeUndefined();
  });
});
