/**
 * Execution Orchestrator
 *
 * Fans one trading intent out across every configured account:
 * Authenticate → Account State → Order Sizing → Order Submission → Outcome
 *
 * Each account runs behind its own error boundary; a failure becomes that
 * account's failed outcome and the run moves on.
 */

import { EventEmitter } from 'eventemitter3';
import type { Decimal } from 'decimal.js';
import type { AccountCredentials } from '../accounts/types.js';
import { validateAccounts, validateTradingParameters } from '../accounts/validation.js';
import {
  InsufficientBalance,
  InvalidQuantity,
  MarketDataError,
  NetworkError,
  OrderRejected,
  TimeoutError,
  TradingError,
  errorMessage,
  isRetryable,
  toErrorKind,
} from '../errors.js';
import type { ExchangeClient, Session } from '../exchange/types.js';
import { logger } from '../logger.js';
import type { OrderRequest, TradeIntent, TradingParameters } from '../types.js';
import { OrderSizer, usesLimitPrice } from './OrderSizer.js';
import type {
  ExecuteOptions,
  ExecutionOutcome,
  OrchestratorConfig,
  OrchestratorEvents,
  SizingDecision,
} from './types.js';

export class ExecutionOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly config: OrchestratorConfig;
  private readonly client: ExchangeClient;
  private readonly sizer: OrderSizer;

  constructor(
    config: OrchestratorConfig,
    client: ExchangeClient,
    sizer: OrderSizer = new OrderSizer()
  ) {
    super();
    this.config = config;
    this.client = client;
    this.sizer = sizer;

    logger.info('Execution Orchestrator initialized', {
      concurrency: config.concurrency,
      callTimeoutMs: config.callTimeoutMs,
      retryAttempts: config.retryAttempts,
    });
  }

  /**
   * Execute one intent for every account.
   * Resolves with exactly one outcome per account, in input order.
   * Throws ConfigInvariantViolation before any exchange call when the
   * configuration is unusable.
   */
  async execute(
    intent: TradeIntent,
    params: TradingParameters,
    accounts: readonly AccountCredentials[],
    options: ExecuteOptions = {}
  ): Promise<ExecutionOutcome[]> {
    validateAccounts(accounts);
    validateTradingParameters(intent, params);

    this.emit('runStarted', intent, accounts.length);

    const collected: Array<ExecutionOutcome | undefined> = accounts.map(() => undefined);
    const workerCount = Math.max(
      1,
      Math.min(Math.floor(this.config.concurrency) || 1, accounts.length)
    );
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < accounts.length && !options.signal?.aborted) {
        const index = nextIndex++;

        if (workerCount === 1 && index > 0 && this.config.accountDelayMs > 0) {
          await this.sleep(this.config.accountDelayMs);
          if (options.signal?.aborted) {
            return;
          }
        }

        collected[index] = await this.executeAccount(intent, params, accounts[index], options);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    let skipped = 0;
    const outcomes = accounts.map((account, index) => {
      const outcome = collected[index];
      if (outcome) {
        return outcome;
      }
      skipped += 1;
      return this.createOutcome(intent, account, {
        succeeded: false,
        errorKind: 'ABORTED',
        message: 'Run aborted before this account was started',
      });
    });

    if (skipped > 0) {
      logger.warn('Execution run aborted', { intent, skipped });
      this.emit('runAborted', skipped);
    }

    this.emit('runCompleted', outcomes);
    return outcomes;
  }

  /**
   * Error boundary of one account; never throws
   */
  private async executeAccount(
    intent: TradeIntent,
    params: TradingParameters,
    account: AccountCredentials,
    options: ExecuteOptions
  ): Promise<ExecutionOutcome> {
    this.emit('accountStarted', account.name, intent);

    let outcome: ExecutionOutcome;
    try {
      const session = await this.call('authenticate', () => this.client.authenticate(account));

      outcome =
        intent === 'CANCEL_ALL'
          ? await this.cancelOrders(session, params, account, options)
          : await this.placeOrder(intent, session, params, account);
    } catch (error) {
      outcome = this.createOutcome(intent, account, {
        succeeded: false,
        errorKind: toErrorKind(error),
        message: errorMessage(error),
      });
    }

    if (outcome.succeeded) {
      this.emit('accountSucceeded', outcome);
    } else {
      this.emit('accountFailed', outcome);
    }
    return outcome;
  }

  private async placeOrder(
    intent: Exclude<TradeIntent, 'CANCEL_ALL'>,
    session: Session,
    params: TradingParameters,
    account: AccountCredentials
  ): Promise<ExecutionOutcome> {
    // Step 1: Gather account and market state
    const symbolInfo = await this.call('getSymbolInfo', () =>
      this.client.getSymbolInfo(params.symbol)
    );

    let availableBalance: Decimal | undefined;
    if (intent === 'SELL') {
      availableBalance = await this.call('getAvailableBalance', () =>
        this.client.getAvailableBalance(session, params.baseCoin)
      );
    }

    let marketPrice: Decimal | undefined;
    if (intent === 'BUY' && !usesLimitPrice(params)) {
      marketPrice = await this.call('getPrice', () => this.client.getPrice(params.symbol));
    }

    // Step 2: Size the order
    const decision = this.sizer.size(intent, params, {
      accountName: account.name,
      symbolInfo,
      availableBalance,
      marketPrice,
    });

    if (!decision.valid) {
      logger.warn('Order sizing rejected account', {
        account: account.name,
        intent,
        reason: decision.reason,
      });
      throw this.toSizingError(decision);
    }

    // Step 3: Submit
    const { request } = decision;
    const orderId = await this.submitOrder(session, request);

    return this.createOutcome(intent, account, {
      succeeded: true,
      orderId,
      message: `${describeOrder(request, params)} placed (order ${orderId})`,
    });
  }

  private async cancelOrders(
    session: Session,
    params: TradingParameters,
    account: AccountCredentials,
    options: ExecuteOptions
  ): Promise<ExecutionOutcome> {
    const side = options.cancelSide;
    const count = await this.call('cancelAllOpenOrders', () =>
      this.client.cancelAllOpenOrders(session, params.symbol, side)
    );

    const scope = side ? `open ${side} limit` : 'open';
    return this.createOutcome('CANCEL_ALL', account, {
      succeeded: true,
      cancelledCount: count,
      message:
        count === 0
          ? `No ${scope} orders to cancel`
          : `Cancelled ${count} ${scope} order${count === 1 ? '' : 's'}`,
    });
  }

  /**
   * Submit an order, resolving with the id of the order that actually exists.
   * After an ambiguous failure the order is looked up by its client order id
   * before anything else. Only transport failures are resubmitted; a timed
   * out submission may still be in flight.
   */
  private async submitOrder(session: Session, request: OrderRequest): Promise<string> {
    const attempts = Math.max(1, this.config.retryAttempts);

    for (let i = 1; ; i++) {
      try {
        return await this.withTimeout('placeOrder', this.client.placeOrder(session, request));
      } catch (error) {
        // A rejected resubmission may be the exchange refusing the reused clientOid
        const ambiguous = isRetryable(error) || (i > 1 && error instanceof OrderRejected);
        const placedOrderId = ambiguous ? await this.findPlacedOrder(session, request) : null;
        if (placedOrderId) {
          logger.info('Order found after failed submission', {
            account: session.accountName,
            clientOid: request.clientOrderId,
            orderId: placedOrderId,
            error: errorMessage(error),
          });
          return placedOrderId;
        }

        if (error instanceof TimeoutError) {
          throw new TimeoutError(
            `${error.message}; order ${request.clientOrderId} is not on the exchange yet and may still be placed`
          );
        }
        if (!(error instanceof NetworkError) || i >= attempts) {
          throw error;
        }

        logger.warn(`placeOrder failed, attempt ${i}/${attempts}`, {
          account: session.accountName,
          error: errorMessage(error),
        });
        await this.sleep(this.config.retryDelayMs * i);
      }
    }
  }

  private async findPlacedOrder(session: Session, request: OrderRequest): Promise<string | null> {
    try {
      return await this.call('findOrderByClientOid', () =>
        this.client.findOrderByClientOid(session, request.symbol, request.clientOrderId)
      );
    } catch (error) {
      logger.warn('Order lookup failed', {
        account: session.accountName,
        clientOid: request.clientOrderId,
        error: errorMessage(error),
      });
      return null;
    }
  }

  /**
   * Exchange call bounded by the call timeout and retried on retryable errors
   */
  private async call<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const attempts = Math.max(1, this.config.retryAttempts);
    let lastError: unknown = null;

    for (let i = 1; i <= attempts; i++) {
      try {
        return await this.withTimeout(label, operation());
      } catch (error) {
        lastError = error;
        if (!isRetryable(error) || i === attempts) {
          break;
        }

        logger.warn(`${label} failed, attempt ${i}/${attempts}`, {
          error: errorMessage(error),
        });
        await this.sleep(this.config.retryDelayMs * i);
      }
    }

    throw lastError;
  }

  private withTimeout<T>(label: string, promise: Promise<T>): Promise<T> {
    const timeoutMs = this.config.callTimeoutMs;
    if (timeoutMs <= 0) {
      return promise;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }

  private toSizingError(decision: Extract<SizingDecision, { valid: false }>): TradingError {
    switch (decision.errorKind) {
      case 'INSUFFICIENT_BALANCE':
        return new InsufficientBalance(decision.reason);
      case 'INVALID_QUANTITY':
        return new InvalidQuantity(decision.reason);
      case 'MARKET_DATA_ERROR':
        return new MarketDataError(decision.reason);
    }
  }

  private createOutcome(
    intent: TradeIntent,
    account: AccountCredentials,
    result: Omit<ExecutionOutcome, 'accountName' | 'intent' | 'mainAccountUid'>
  ): ExecutionOutcome {
    return {
      accountName: account.name,
      intent,
      ...result,
      mainAccountUid: account.isSubAccount ? account.mainAccountUid : undefined,
    };
  }

  /**
   * Sleep helper
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * e.g. `BUY MARKET 10 USDT (~5 BTC)` or `SELL LIMIT 0.5 BTC @ 65000 USDT`
 */
export function describeOrder(request: OrderRequest, params: TradingParameters): string {
  if (request.orderKind === 'MARKET' && request.side === 'BUY') {
    return `BUY MARKET ${request.notional.toFixed()} ${params.quoteCoin} (~${request.quantity.toFixed()} ${params.baseCoin})`;
  }

  const base = `${request.side} ${request.orderKind} ${request.quantity.toFixed()} ${params.baseCoin}`;
  return request.price ? `${base} @ ${request.price.toFixed()} ${params.quoteCoin}` : base;
}
