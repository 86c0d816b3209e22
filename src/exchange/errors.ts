import { AuthError, NetworkError } from '../errors.js';

/**
 * Non-success Bitget response that is neither an auth nor a transport
 * failure. Each client operation maps it to its own error kind.
 */
export class BitgetApiError extends Error {
  constructor(
    message: string,
    public readonly options: {
      endpoint: string;
      method: string;
      status?: number;
      code?: string;
    }
  ) {
    super(message);
    this.name = 'BitgetApiError';
  }
}

const AUTH_CODES = new Set([
  '40001', // ACCESS_KEY empty
  '40002', // ACCESS_SIGN empty
  '40003', // Signature empty
  '40006', // Invalid ACCESS_KEY
  '40009', // sign signature error
  '40011', // ACCESS_PASSPHRASE empty
  '40012', // apikey/password is incorrect
  '40037', // Apikey does not exist
  '401',
]);

export function toBitgetError(params: {
  endpoint: string;
  method: string;
  status?: number;
  code?: string;
  message?: string;
}): Error {
  const code = String(params.code ?? params.status ?? '');
  const message = params.message || 'Bitget request failed';

  if (AUTH_CODES.has(code) || params.status === 401) {
    return new AuthError(`${message} (${code})`);
  }

  if (code === '429' || params.status === 429 || (params.status ?? 0) >= 500) {
    return new NetworkError(`HTTP ${params.status ?? code}: ${message}`);
  }

  return new BitgetApiError(message, { ...params, code });
}
