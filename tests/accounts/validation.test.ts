/**
 * Tests for account and trading parameter validation
 */

import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  describeAccount,
  validateAccounts,
  validateTradingParameters,
} from '../../src/accounts/validation.js';
import { ConfigInvariantViolation } from '../../src/errors.js';
import type { TradingParameters } from '../../src/types.js';

const params: TradingParameters = {
  symbol: 'BTCUSDT',
  baseCoin: 'BTC',
  quoteCoin: 'USDT',
  buyQuoteAmount: new Decimal(10),
  sellPercentage: new Decimal(100),
};

describe('validateAccounts', () => {
  it('should collect every issue into one violation', () => {
    try {
      validateAccounts([
        { name: 'main', apiKey: '', apiSecret: 'test-secret', passphrase: 'test-pass', isSubAccount: false },
        { name: 'sub', apiKey: 'test-key', apiSecret: 'test-secret', passphrase: 'test-pass', isSubAccount: true },
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigInvariantViolation);
      if (error instanceof ConfigInvariantViolation) {
        expect(error.issues).toEqual([
          'Account main missing API credentials',
          'Sub-account sub is missing mainAccountUid',
        ]);
      }
    }
  });

  it('should accept a main account without uid', () => {
    expect(() =>
      validateAccounts([
        { name: 'main', apiKey: 'test-key', apiSecret: 'test-secret', passphrase: 'test-pass', isSubAccount: false },
      ])
    ).not.toThrow();
  });
});

describe('validateTradingParameters', () => {
  it('should require a positive buy amount for BUY', () => {
    expect(() =>
      validateTradingParameters('BUY', { ...params, buyQuoteAmount: new Decimal(-1) })
    ).toThrow('Buy amount must be greater than 0: -1');
  });

  it('should bound the sell percentage for SELL', () => {
    expect(() =>
      validateTradingParameters('SELL', { ...params, sellPercentage: new Decimal(150) })
    ).toThrow('Sell percentage must be in (0, 100]: 150');
  });

  it('should reject a negative limit price', () => {
    expect(() =>
      validateTradingParameters('SELL', { ...params, limitPrice: new Decimal(-5) })
    ).toThrow('Limit price must not be negative: -5');
  });

  it('should ignore amounts for CANCEL_ALL', () => {
    expect(() =>
      validateTradingParameters('CANCEL_ALL', {
        ...params,
        buyQuoteAmount: new Decimal(0),
        sellPercentage: new Decimal(0),
      })
    ).not.toThrow();
  });
});

describe('describeAccount', () => {
  it('should name the owning main account of a sub-account', () => {
    expect(describeAccount({ name: 'sub', mainAccountUid: '42' })).toBe('sub (sub-account of 42)');
    expect(describeAccount({ name: 'main' })).toBe('main');
  });
});
