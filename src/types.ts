/**
 * Common types for Fleet Trader
 */

import type { Decimal } from 'decimal.js';

// ===========================================
// Operator Intent
// ===========================================

/**
 * Trading instruction selected once per operator invocation
 */
export type TradeIntent = 'BUY' | 'SELL' | 'CANCEL_ALL';

// ===========================================
// Order Types
// ===========================================

export type OrderSide = 'BUY' | 'SELL';

export type OrderKind = 'MARKET' | 'LIMIT';

// ===========================================
// Trading Parameters
// ===========================================

/**
 * Trading parameters shared read-only by every account of one run
 */
export interface TradingParameters {
  /** Exchange symbol, e.g. BTCUSDT */
  readonly symbol: string;

  /** Coin that is bought or sold */
  readonly baseCoin: string;

  /** Coin that pays for BUY orders */
  readonly quoteCoin: string;

  /** Limit price; absent or zero means a market order */
  readonly limitPrice?: Decimal;

  /** Quote amount spent by each account on BUY */
  readonly buyQuoteAmount: Decimal;

  /** Share of the base balance sold on SELL, in (0, 100] */
  readonly sellPercentage: Decimal;
}

// ===========================================
// Order Request
// ===========================================

/**
 * Concrete order for one account, created fresh per execution
 */
export interface OrderRequest {
  readonly accountName: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly orderKind: OrderKind;

  /** Base coin quantity, truncated to the symbol's quantity precision */
  readonly quantity: Decimal;

  /** Limit price; only set for LIMIT orders */
  readonly price?: Decimal;

  /**
   * Quote amount of the order: the configured spend for a MARKET BUY,
   * quantity × price otherwise (zero when no price is known)
   */
  readonly notional: Decimal;

  /** Client order id; resubmitting the same request is deduplicated by the exchange */
  readonly clientOrderId: string;
}
