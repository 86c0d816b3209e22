/**
 * Bitget Spot Client
 *
 * Signed REST wrapper for the Bitget v2 spot API.
 * Every request is a single request/response carrying a fresh timestamp;
 * credentials travel in the Session passed to each call.
 */

import { Decimal } from 'decimal.js';
import type { AccountCredentials } from '../accounts/types.js';
import {
  AuthError,
  MarketDataError,
  NetworkError,
  OrderRejected,
  TimeoutError,
  errorMessage,
} from '../errors.js';
import { logger } from '../logger.js';
import type { OrderKind, OrderRequest, OrderSide } from '../types.js';
import { buildQueryString, buildRestHeaders } from './BitgetSigner.js';
import { BitgetApiError, toBitgetError } from './errors.js';
import type {
  BitgetAccountInfo,
  BitgetApiResponse,
  BitgetAsset,
  BitgetClientConfig,
  BitgetOrderInfo,
  BitgetPlaceOrderResult,
  BitgetSymbol,
  BitgetTicker,
  BitgetUnfilledOrder,
  ExchangeClient,
  HttpMethod,
  OpenOrder,
  Session,
  SymbolInfo,
} from './types.js';

export const BITGET_DEFAULT_BASE_URL = 'https://api.bitget.com';
export const BITGET_DEFAULT_TIMEOUT_MS = 10000;
export const BITGET_SUCCESS_CODE = '00000';

const ENDPOINTS = {
  accountInfo: '/api/v2/spot/account/info',
  assets: '/api/v2/spot/account/assets',
  tickers: '/api/v2/spot/market/tickers',
  symbols: '/api/v2/spot/public/symbols',
  placeOrder: '/api/v2/spot/trade/place-order',
  orderInfo: '/api/v2/spot/trade/orderInfo',
  cancelOrder: '/api/v2/spot/trade/cancel-order',
  cancelSymbolOrders: '/api/v2/spot/trade/cancel-symbol-order',
  unfilledOrders: '/api/v2/spot/trade/unfilled-orders',
} as const;

interface RequestParams {
  method: HttpMethod;
  path: string;
  query?: Record<string, unknown>;
  body?: Record<string, unknown>;
  session?: Session;
}

export class BitgetSpotClient implements ExchangeClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private symbolInfoCache: Map<string, SymbolInfo> = new Map();

  constructor(config: BitgetClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? BITGET_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? BITGET_DEFAULT_TIMEOUT_MS;
  }

  /**
   * Verify credentials with a signed call and produce a Session
   */
  async authenticate(creds: AccountCredentials): Promise<Session> {
    const candidate: Session = {
      accountName: creds.name,
      apiKey: creds.apiKey,
      apiSecret: creds.apiSecret,
      passphrase: creds.passphrase,
      userId: '',
    };

    try {
      const info = await this.request<BitgetAccountInfo>({
        method: 'GET',
        path: ENDPOINTS.accountInfo,
        session: candidate,
      });

      if (!info?.userId) {
        throw new AuthError('Account info response carries no userId');
      }

      logger.debug('Account authenticated', {
        account: creds.name,
        apiKey: creds.apiKey,
        userId: info.userId,
      });

      return { ...candidate, userId: String(info.userId) };
    } catch (error) {
      logger.error('Authentication failed', {
        account: creds.name,
        apiKey: creds.apiKey,
        error: errorMessage(error),
      });
      if (error instanceof BitgetApiError) {
        throw new AuthError(`Authentication failed: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Get last traded price for symbol
   */
  async getPrice(symbol: string): Promise<Decimal> {
    try {
      const tickers = await this.request<BitgetTicker[]>({
        method: 'GET',
        path: ENDPOINTS.tickers,
        query: { symbol },
      });

      const ticker = Array.isArray(tickers)
        ? tickers.find((t) => t.symbol === symbol)
        : undefined;
      if (!ticker) {
        throw new MarketDataError(`Ticker not found for symbol: ${symbol}`);
      }

      const price = parseDecimal(ticker.lastPr, `${symbol} last price`);
      if (!price.greaterThan(0)) {
        throw new MarketDataError(`Invalid price for ${symbol}: ${ticker.lastPr}`);
      }
      return price;
    } catch (error) {
      logger.error('Failed to get price', { symbol, error: errorMessage(error) });
      throw asMarketDataError(error);
    }
  }

  /**
   * Get symbol trading rules (precision, minimum trade amount)
   */
  async getSymbolInfo(symbol: string): Promise<SymbolInfo> {
    // Check cache first
    const cached = this.symbolInfoCache.get(symbol);
    if (cached) {
      return cached;
    }

    try {
      const symbols = await this.request<BitgetSymbol[]>({
        method: 'GET',
        path: ENDPOINTS.symbols,
        query: { symbol },
      });

      const symbolData = Array.isArray(symbols)
        ? symbols.find((s) => s.symbol === symbol)
        : undefined;
      if (!symbolData) {
        throw new MarketDataError(`Symbol not found: ${symbol}`);
      }

      const symbolInfo: SymbolInfo = {
        symbol: symbolData.symbol,
        baseCoin: symbolData.baseCoin,
        quoteCoin: symbolData.quoteCoin,
        pricePrecision: parseInt(symbolData.pricePrecision, 10),
        quantityPrecision: parseInt(symbolData.quantityPrecision, 10),
        quotePrecision: parseInt(symbolData.quotePrecision, 10),
        minTradeAmount: parseDecimal(symbolData.minTradeAmount, `${symbol} minTradeAmount`),
      };

      if (
        [symbolInfo.pricePrecision, symbolInfo.quantityPrecision, symbolInfo.quotePrecision].some(
          (precision) => !Number.isInteger(precision) || precision < 0
        )
      ) {
        throw new MarketDataError(`Invalid precision in symbol rules for ${symbol}`);
      }

      this.symbolInfoCache.set(symbol, symbolInfo);
      return symbolInfo;
    } catch (error) {
      logger.error('Failed to get symbol info', { symbol, error: errorMessage(error) });
      throw asMarketDataError(error);
    }
  }

  /**
   * Get available (not frozen) balance of coin; zero when the account holds none
   */
  async getAvailableBalance(session: Session, coin: string): Promise<Decimal> {
    try {
      const assets = await this.request<BitgetAsset[]>({
        method: 'GET',
        path: ENDPOINTS.assets,
        query: { coin },
        session,
      });

      const asset = (Array.isArray(assets) ? assets : []).find(
        (a) => a.coin.toUpperCase() === coin.toUpperCase()
      );
      return asset ? parseDecimal(asset.available, `${coin} available balance`) : new Decimal(0);
    } catch (error) {
      logger.error('Failed to get balance', {
        account: session.accountName,
        coin,
        error: errorMessage(error),
      });
      throw asMarketDataError(error);
    }
  }

  /**
   * Submit order. Market BUY orders are sized in the quote coin.
   */
  async placeOrder(session: Session, request: OrderRequest): Promise<string> {
    const size =
      request.orderKind === 'MARKET' && request.side === 'BUY'
        ? request.notional
        : request.quantity;

    const body: Record<string, unknown> = {
      symbol: request.symbol,
      side: request.side.toLowerCase(),
      orderType: request.orderKind.toLowerCase(),
      force: 'gtc',
      size: size.toFixed(),
      clientOid: request.clientOrderId,
    };
    if (request.orderKind === 'LIMIT') {
      if (!request.price?.greaterThan(0)) {
        throw new OrderRejected('Limit orders require a valid price');
      }
      body.price = request.price.toFixed();
    }

    logger.info('Submitting order', {
      account: session.accountName,
      symbol: request.symbol,
      side: request.side,
      orderKind: request.orderKind,
      size: body.size,
      price: body.price,
    });

    try {
      const result = await this.request<BitgetPlaceOrderResult>({
        method: 'POST',
        path: ENDPOINTS.placeOrder,
        body,
        session,
      });

      if (!result?.orderId) {
        throw new OrderRejected('Response carries no orderId');
      }

      logger.info('Order placed', {
        account: session.accountName,
        orderId: result.orderId,
        clientOid: request.clientOrderId,
      });
      return String(result.orderId);
    } catch (error) {
      logger.error('Order failed', {
        account: session.accountName,
        symbol: request.symbol,
        side: request.side,
        error: errorMessage(error),
      });
      if (error instanceof BitgetApiError) {
        throw new OrderRejected(error.message, error.options.code);
      }
      throw error;
    }
  }

  /**
   * Look up an order by the client order id it was submitted with
   */
  async findOrderByClientOid(
    session: Session,
    symbol: string,
    clientOid: string
  ): Promise<string | null> {
    try {
      const orders = await this.request<BitgetOrderInfo[]>({
        method: 'GET',
        path: ENDPOINTS.orderInfo,
        query: { clientOid },
        session,
      });

      const order = (Array.isArray(orders) ? orders : []).find(
        (o) => o.clientOid === clientOid && o.symbol === symbol
      );
      return order ? String(order.orderId) : null;
    } catch (error) {
      logger.error('Failed to look up order', {
        account: session.accountName,
        clientOid,
        error: errorMessage(error),
      });
      throw asMarketDataError(error);
    }
  }

  /**
   * Get all open (unfilled) orders for symbol
   */
  async getOpenOrders(session: Session, symbol: string): Promise<OpenOrder[]> {
    try {
      const orders = await this.request<BitgetUnfilledOrder[]>({
        method: 'GET',
        path: ENDPOINTS.unfilledOrders,
        query: { symbol },
        session,
      });

      return (Array.isArray(orders) ? orders : []).map((order) => ({
        orderId: String(order.orderId),
        symbol: order.symbol,
        side: toOrderSide(order.side),
        orderKind: toOrderKind(order.orderType),
        price: parseDecimal(order.priceAvg || '0', `order ${order.orderId} price`),
        size: parseDecimal(order.size || '0', `order ${order.orderId} size`),
      }));
    } catch (error) {
      logger.error('Failed to get open orders', {
        account: session.accountName,
        symbol,
        error: errorMessage(error),
      });
      throw asMarketDataError(error);
    }
  }

  /**
   * Cancel open orders for symbol.
   * Without a side every open order is cancelled in one call; with a side
   * only that side's LIMIT orders are cancelled one by one, and any order
   * left uncancelled fails the whole call.
   */
  async cancelAllOpenOrders(
    session: Session,
    symbol: string,
    side?: OrderSide
  ): Promise<number> {
    const openOrders = await this.getOpenOrders(session, symbol);
    const targets = side
      ? openOrders.filter((o) => o.side === side && o.orderKind === 'LIMIT')
      : openOrders;

    if (targets.length === 0) {
      logger.info('No open orders to cancel', { account: session.accountName, symbol, side });
      return 0;
    }

    try {
      if (!side) {
        await this.request<unknown>({
          method: 'POST',
          path: ENDPOINTS.cancelSymbolOrders,
          body: { symbol },
          session,
        });
        logger.info('All open orders cancelled', {
          account: session.accountName,
          symbol,
          count: targets.length,
        });
        return targets.length;
      }

      let cancelled = 0;
      let lastError: unknown = null;
      for (const order of targets) {
        try {
          await this.request<unknown>({
            method: 'POST',
            path: ENDPOINTS.cancelOrder,
            body: { symbol, orderId: order.orderId },
            session,
          });
          cancelled += 1;
        } catch (error) {
          lastError = error;
          logger.warn('Failed to cancel order', {
            account: session.accountName,
            orderId: order.orderId,
            error: errorMessage(error),
          });
        }
      }

      if (cancelled === 0 && lastError !== null) {
        throw lastError;
      }
      if (cancelled < targets.length) {
        throw new OrderRejected(
          `${cancelled} of ${targets.length} open ${side} limit orders cancelled; last error: ${errorMessage(lastError)}`
        );
      }

      logger.info('Open orders cancelled', {
        account: session.accountName,
        symbol,
        side,
        cancelled,
      });
      return cancelled;
    } catch (error) {
      logger.error('Failed to cancel orders', {
        account: session.accountName,
        symbol,
        error: errorMessage(error),
      });
      if (error instanceof BitgetApiError) {
        throw new OrderRejected(error.message, error.options.code);
      }
      throw error;
    }
  }

  /**
   * Perform one request; signed when a session is given
   */
  private async request<T>(params: RequestParams): Promise<T> {
    const queryString = buildQueryString(params.query);
    const bodyString = params.body ? JSON.stringify(params.body) : '';
    const url = `${this.baseUrl}${params.path}${queryString ? `?${queryString}` : ''}`;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      locale: 'en-US',
    };

    if (params.session) {
      Object.assign(
        headers,
        buildRestHeaders({
          apiKey: params.session.apiKey,
          apiSecret: params.session.apiSecret,
          passphrase: params.session.passphrase,
          timestamp: String(Date.now()),
          method: params.method,
          path: params.path,
          queryString,
          bodyString,
        })
      );
    }

    const { status, text } = await this.send(params, url, {
      method: params.method,
      headers,
      body: params.method === 'POST' ? bodyString : undefined,
    });

    if (!text) {
      throw toBitgetError({
        endpoint: params.path,
        method: params.method,
        status,
        message: `Empty response (HTTP ${status})`,
      });
    }

    let payload: BitgetApiResponse<T>;
    try {
      payload = JSON.parse(text) as BitgetApiResponse<T>;
    } catch {
      throw toBitgetError({
        endpoint: params.path,
        method: params.method,
        status,
        message: `Invalid JSON response (HTTP ${status})`,
      });
    }

    if (status < 200 || status >= 300 || String(payload.code) !== BITGET_SUCCESS_CODE) {
      throw toBitgetError({
        endpoint: params.path,
        method: params.method,
        status,
        code: payload.code !== undefined ? String(payload.code) : undefined,
        message: payload.msg || `HTTP ${status}`,
      });
    }

    return payload.data;
  }

  /**
   * Transport with timeout; failures become NetworkError / TimeoutError
   */
  private async send(
    params: RequestParams,
    url: string,
    init: { method: HttpMethod; headers: Record<string, string>; body?: string }
  ): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(url, { ...init, signal: controller.signal });
      return { status: res.status, text: await res.text() };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TimeoutError(
          `${params.method} ${params.path} timed out after ${this.timeoutMs}ms`
        );
      }
      throw new NetworkError(`${params.method} ${params.path} failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

function parseDecimal(value: string, field: string): Decimal {
  try {
    return new Decimal(value);
  } catch {
    throw new MarketDataError(`Invalid ${field}: ${value}`);
  }
}

function toOrderSide(side: string): OrderSide {
  return side.toLowerCase() === 'sell' ? 'SELL' : 'BUY';
}

function toOrderKind(orderType: string): OrderKind {
  return orderType.toLowerCase() === 'market' ? 'MARKET' : 'LIMIT';
}

/**
 * Keep auth, transport and timeout errors; everything else is market data
 */
function asMarketDataError(error: unknown): Error {
  if (
    error instanceof MarketDataError ||
    error instanceof AuthError ||
    error instanceof NetworkError ||
    error instanceof TimeoutError
  ) {
    return error;
  }
  return new MarketDataError(errorMessage(error));
}
