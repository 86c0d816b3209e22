/**
 * Tests for Bitget request signing
 */

import crypto from 'node:crypto';
import { describe, it, expect } from 'vitest';
import {
  buildPrehash,
  buildQueryString,
  buildRestHeaders,
  signRequest,
} from '../../src/exchange/BitgetSigner.js';

describe('BitgetSigner', () => {
  describe('buildQueryString', () => {
    it('should sort keys and drop empty values', () => {
      expect(buildQueryString({ symbol: 'BTCUSDT', coin: undefined, limit: 10 })).toBe(
        'limit=10&symbol=BTCUSDT'
      );
    });

    it('should encode values', () => {
      expect(buildQueryString({ note: 'a b&c' })).toBe('note=a%20b%26c');
    });

    it('should return empty string without query', () => {
      expect(buildQueryString(undefined)).toBe('');
    });
  });

  describe('buildPrehash', () => {
    it('should join timestamp, method, path and query', () => {
      expect(
        buildPrehash({
          timestamp: '1700000000000',
          method: 'GET',
          path: '/api/v2/spot/account/assets',
          queryString: 'coin=BTC',
        })
      ).toBe('1700000000000GET/api/v2/spot/account/assets?coin=BTC');
    });

    it('should append the body for POST requests', () => {
      expect(
        buildPrehash({
          timestamp: '1700000000000',
          method: 'POST',
          path: '/api/v2/spot/trade/cancel-symbol-order',
          bodyString: '{"symbol":"BTCUSDT"}',
        })
      ).toBe('1700000000000POST/api/v2/spot/trade/cancel-symbol-order{"symbol":"BTCUSDT"}');
    });
  });

  describe('signRequest', () => {
    it('should produce a base64 HMAC-SHA256 signature', () => {
      const expected = crypto
        .createHmac('sha256', 'test-secret')
        .update('payload')
        .digest('base64');

      expect(signRequest('payload', 'test-secret')).toBe(expected);
    });
  });

  describe('buildRestHeaders', () => {
    it('should carry key, signature, timestamp and passphrase', () => {
      const headers = buildRestHeaders({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        passphrase: 'test-pass',
        timestamp: '1700000000000',
        method: 'GET',
        path: '/api/v2/spot/account/info',
      });

      expect(headers).toEqual({
        'ACCESS-KEY': 'test-key',
        'ACCESS-SIGN': signRequest('1700000000000GET/api/v2/spot/account/info', 'test-secret'),
        'ACCESS-TIMESTAMP': '1700000000000',
        'ACCESS-PASSPHRASE': 'test-pass',
      });
    });
  });
});
