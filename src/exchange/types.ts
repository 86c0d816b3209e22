/**
 * Types for Exchange Client
 */

import type { Decimal } from 'decimal.js';
import type { AccountCredentials } from '../accounts/types.js';
import type { OrderKind, OrderRequest, OrderSide } from '../types.js';

// ===========================================
// Configuration Types
// ===========================================

export type HttpMethod = 'GET' | 'POST';

export interface BitgetClientConfig {
  /** REST base URL (default https://api.bitget.com) */
  baseUrl?: string;

  /** Abort a single HTTP request after this many ms */
  timeoutMs?: number;
}

// ===========================================
// Domain Types
// ===========================================

/**
 * Signing material of one authenticated account.
 * The exchange protocol is stateless; a Session is a value, not a server token.
 */
export interface Session {
  readonly accountName: string;
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly passphrase: string;

  /** Exchange user id reported for the credentials */
  readonly userId: string;
}

/**
 * Symbol trading rules
 */
export interface SymbolInfo {
  symbol: string;
  baseCoin: string;
  quoteCoin: string;
  pricePrecision: number;
  quantityPrecision: number;
  quotePrecision: number;
  minTradeAmount: Decimal;
}

export interface OpenOrder {
  orderId: string;
  symbol: string;
  side: OrderSide;
  orderKind: OrderKind;
  price: Decimal;
  size: Decimal;
}

/**
 * Exchange operations used by the Execution Orchestrator
 */
export interface ExchangeClient {
  authenticate(creds: AccountCredentials): Promise<Session>;
  getPrice(symbol: string): Promise<Decimal>;
  getSymbolInfo(symbol: string): Promise<SymbolInfo>;
  getAvailableBalance(session: Session, coin: string): Promise<Decimal>;
  placeOrder(session: Session, request: OrderRequest): Promise<string>;

  /**
   * Exchange order id of an order submitted with this client order id,
   * or null when the exchange has no such order
   */
  findOrderByClientOid(session: Session, symbol: string, clientOid: string): Promise<string | null>;
  getOpenOrders(session: Session, symbol: string): Promise<OpenOrder[]>;

  /**
   * Cancel open orders for a symbol, optionally only the LIMIT orders of one
   * side. Resolves with the number of cancelled orders.
   */
  cancelAllOpenOrders(session: Session, symbol: string, side?: OrderSide): Promise<number>;
}

// ===========================================
// Bitget REST v2 payloads
// ===========================================

export interface BitgetApiResponse<T> {
  code: string;
  msg: string;
  requestTime?: number;
  data: T;
}

export interface BitgetAccountInfo {
  userId: string;
  parentId?: string | number;
  authorities?: string[];
}

export interface BitgetTicker {
  symbol: string;
  lastPr: string;
}

export interface BitgetSymbol {
  symbol: string;
  baseCoin: string;
  quoteCoin: string;
  minTradeAmount: string;
  pricePrecision: string;
  quantityPrecision: string;
  quotePrecision: string;
  status: string;
}

export interface BitgetAsset {
  coin: string;
  available: string;
  frozen?: string;
  locked?: string;
}

export interface BitgetPlaceOrderResult {
  orderId: string;
  clientOid?: string;
}

export interface BitgetOrderInfo {
  orderId: string;
  clientOid: string;
  symbol: string;
  status: string;
}

export interface BitgetUnfilledOrder {
  orderId: string;
  symbol: string;
  side: string;
  orderType: string;
  priceAvg: string;
  size: string;
}
