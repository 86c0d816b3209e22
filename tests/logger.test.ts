/**
 * Tests for logger formats
 */

import { describe, it, expect } from 'vitest';
import { maskSecret, redactSecrets } from '../src/logger.js';

describe('maskSecret', () => {
  it('should keep only the first and last four characters', () => {
    expect(maskSecret('abcdefghijkl')).toBe('abcd****ijkl');
  });

  it('should mask short secrets entirely', () => {
    expect(maskSecret('abcd1234')).toBe('****');
  });
});

describe('redactSecrets', () => {
  it('should mask credential fields in log metadata', () => {
    const result = redactSecrets().transform({
      level: 'info',
      message: 'Account authenticated',
      account: 'main',
      apiKey: 'abcdefghijkl',
      apiSecret: 'test-secret',
      passphrase: 'pass',
    });

    if (typeof result === 'boolean') {
      throw new Error('Expected the log entry to be kept');
    }
    expect(result.apiKey).toBe('abcd****ijkl');
    expect(result.apiSecret).toBe('test****cret');
    expect(result.passphrase).toBe('****');
    expect(result.account).toBe('main');
    expect(result.message).toBe('Account authenticated');
  });

  it('should leave entries without credentials untouched', () => {
    const result = redactSecrets().transform({ level: 'warn', message: 'Order lookup failed' });

    expect(result).toEqual({ level: 'warn', message: 'Order lookup failed' });
  });
});
