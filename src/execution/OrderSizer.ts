/**
 * Order Sizer
 *
 * Turns a trading intent, the shared trading parameters and one account's
 * state into a concrete OrderRequest, or a reason to skip the account.
 * Quantities and prices are truncated, never rounded up.
 */

import { randomUUID } from 'node:crypto';
import { Decimal } from 'decimal.js';
import type { SymbolInfo } from '../exchange/types.js';
import type { OrderRequest, TradeIntent, TradingParameters } from '../types.js';
import type { SizingDecision, SizingErrorKind, SizingState } from './types.js';

/**
 * True when the parameters carry a usable (non-zero) limit price
 */
export function usesLimitPrice(params: Pick<TradingParameters, 'limitPrice'>): boolean {
  return params.limitPrice !== undefined && params.limitPrice.greaterThan(0);
}

/**
 * Truncate to a number of decimal places
 */
export function truncate(value: Decimal, places: number): Decimal {
  return value.toDecimalPlaces(places, Decimal.ROUND_DOWN);
}

/**
 * e.g. `Limit price 0.001 is below the price tick 0.01 of BTCUSDT`
 */
function belowPriceTick(price: Decimal, symbolInfo: SymbolInfo): string {
  const tick = new Decimal(10).pow(-symbolInfo.pricePrecision);
  return `Limit price ${price.toString()} is below the price tick ${tick.toFixed()} of ${symbolInfo.symbol}`;
}

export class OrderSizer {
  constructor(
    private readonly createClientOrderId: () => string = () => randomUUID()
  ) {}

  size(
    intent: Exclude<TradeIntent, 'CANCEL_ALL'>,
    params: TradingParameters,
    state: SizingState
  ): SizingDecision {
    return intent === 'BUY'
      ? this.sizeBuy(params, state)
      : this.sizeSell(params, state);
  }

  /**
   * quantity = buyQuoteAmount / effectivePrice
   * effectivePrice = limitPrice when set, else the live market price
   */
  private sizeBuy(params: TradingParameters, state: SizingState): SizingDecision {
    const { symbolInfo } = state;
    const isLimit = usesLimitPrice(params);
    const effectivePrice = isLimit ? params.limitPrice : state.marketPrice;

    if (!effectivePrice || !effectivePrice.greaterThan(0)) {
      return this.invalid('MARKET_DATA_ERROR', `No market price available for ${params.symbol}`);
    }

    const rawQuantity = params.buyQuoteAmount.div(effectivePrice);
    const quantity = truncate(rawQuantity, symbolInfo.quantityPrecision);

    if (!quantity.greaterThan(0)) {
      return this.invalid(
        'INVALID_QUANTITY',
        `Quantity ${rawQuantity.toString()} ${params.baseCoin} rounds to zero at precision ${symbolInfo.quantityPrecision}`,
        rawQuantity
      );
    }

    if (quantity.lessThan(symbolInfo.minTradeAmount)) {
      return this.invalid(
        'INVALID_QUANTITY',
        `Quantity ${quantity.toString()} ${params.baseCoin} is below symbol minimum ${symbolInfo.minTradeAmount.toString()}`,
        rawQuantity
      );
    }

    if (!isLimit) {
      // Market BUY is sized by the quote amount
      const notional = truncate(params.buyQuoteAmount, symbolInfo.quotePrecision);
      if (!notional.greaterThan(0)) {
        return this.invalid(
          'INVALID_QUANTITY',
          `Order amount ${params.buyQuoteAmount.toString()} ${params.quoteCoin} rounds to zero at precision ${symbolInfo.quotePrecision}`,
          rawQuantity
        );
      }

      return this.valid(
        {
          side: 'BUY',
          orderKind: 'MARKET',
          quantity,
          notional,
        },
        params,
        state,
        rawQuantity
      );
    }

    const price = truncate(effectivePrice, symbolInfo.pricePrecision);
    if (!price.greaterThan(0)) {
      return this.invalid('MARKET_DATA_ERROR', belowPriceTick(effectivePrice, symbolInfo), rawQuantity);
    }

    return this.valid(
      {
        side: 'BUY',
        orderKind: 'LIMIT',
        quantity,
        price,
        notional: truncate(quantity.mul(price), symbolInfo.quotePrecision),
      },
      params,
      state,
      rawQuantity
    );
  }

  /**
   * quantity = availableBalance * sellPercentage / 100
   */
  private sizeSell(params: TradingParameters, state: SizingState): SizingDecision {
    const { symbolInfo } = state;
    const balance = state.availableBalance ?? new Decimal(0);

    if (!balance.greaterThan(0)) {
      return this.invalid('INSUFFICIENT_BALANCE', `No ${params.baseCoin} balance available`);
    }

    const rawQuantity = balance.mul(params.sellPercentage).div(100);
    const quantity = truncate(rawQuantity, symbolInfo.quantityPrecision);

    if (!quantity.greaterThan(0) || quantity.lessThan(symbolInfo.minTradeAmount)) {
      return this.invalid(
        'INSUFFICIENT_BALANCE',
        `Sell quantity ${rawQuantity.toString()} ${params.baseCoin} is below the minimum lot ${symbolInfo.minTradeAmount.toString()}`,
        rawQuantity
      );
    }

    if (!usesLimitPrice(params) || !params.limitPrice) {
      return this.valid(
        {
          side: 'SELL',
          orderKind: 'MARKET',
          quantity,
          notional: state.marketPrice
            ? truncate(quantity.mul(state.marketPrice), symbolInfo.quotePrecision)
            : new Decimal(0),
        },
        params,
        state,
        rawQuantity
      );
    }

    const price = truncate(params.limitPrice, symbolInfo.pricePrecision);
    if (!price.greaterThan(0)) {
      return this.invalid('MARKET_DATA_ERROR', belowPriceTick(params.limitPrice, symbolInfo), rawQuantity);
    }

    return this.valid(
      {
        side: 'SELL',
        orderKind: 'LIMIT',
        quantity,
        price,
        notional: truncate(quantity.mul(price), symbolInfo.quotePrecision),
      },
      params,
      state,
      rawQuantity
    );
  }

  private valid(
    order: Pick<OrderRequest, 'side' | 'orderKind' | 'quantity' | 'price' | 'notional'>,
    params: TradingParameters,
    state: SizingState,
    rawQuantity: Decimal
  ): SizingDecision {
    return {
      valid: true,
      request: {
        ...order,
        accountName: state.accountName,
        symbol: params.symbol,
        clientOrderId: this.createClientOrderId(),
      },
      rawQuantity,
    };
  }

  private invalid(
    errorKind: SizingErrorKind,
    reason: string,
    rawQuantity?: Decimal
  ): SizingDecision {
    return { valid: false, errorKind, reason, rawQuantity };
  }
}
