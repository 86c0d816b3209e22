/**
 * Exchange Client Module
 *
 * Signed Bitget spot REST calls behind the ExchangeClient interface.
 */

// Types
export type {
  BitgetClientConfig,
  ExchangeClient,
  HttpMethod,
  OpenOrder,
  Session,
  SymbolInfo,
} from './types.js';

// Classes
export { BitgetSpotClient, BITGET_DEFAULT_BASE_URL } from './BitgetSpotClient.js';
export { BitgetApiError } from './errors.js';

export { buildPrehash, buildQueryString, buildRestHeaders, signRequest } from './BitgetSigner.js';
export { normalizeSymbol } from './symbols.js';
