/**
 * Bitget request signing
 *
 * ACCESS-SIGN = base64(HMAC-SHA256(secret, timestamp + METHOD + path[?query] + body))
 */

import crypto from 'node:crypto';
import type { HttpMethod } from './types.js';

export function buildQueryString(query: Record<string, unknown> | undefined): string {
  if (!query) return '';
  return Object.entries(query)
    .filter(([, value]) => value !== undefined && value !== null)
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join('&');
}

export function buildPrehash(params: {
  timestamp: string;
  method: HttpMethod;
  path: string;
  queryString?: string;
  bodyString?: string;
}): string {
  const queryPart = params.queryString ? `?${params.queryString}` : '';
  return `${params.timestamp}${params.method}${params.path}${queryPart}${params.bodyString ?? ''}`;
}

export function signRequest(prehash: string, secretKey: string): string {
  return crypto.createHmac('sha256', secretKey).update(prehash).digest('base64');
}

export function buildRestHeaders(params: {
  apiKey: string;
  apiSecret: string;
  passphrase: string;
  timestamp: string;
  method: HttpMethod;
  path: string;
  queryString?: string;
  bodyString?: string;
}): Record<string, string> {
  const signature = signRequest(
    buildPrehash({
      timestamp: params.timestamp,
      method: params.method,
      path: params.path,
      queryString: params.queryString,
      bodyString: params.bodyString,
    }),
    params.apiSecret
  );

  return {
    'ACCESS-KEY': params.apiKey,
    'ACCESS-SIGN': signature,
    'ACCESS-TIMESTAMP': params.timestamp,
    'ACCESS-PASSPHRASE': params.passphrase,
  };
}
