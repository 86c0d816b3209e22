/**
 * Types for Execution Orchestrator
 */

import type { Decimal } from 'decimal.js';
import type { ErrorKind } from '../errors.js';
import type { SymbolInfo } from '../exchange/types.js';
import type { OrderRequest, OrderSide, TradeIntent } from '../types.js';

// ===========================================
// Configuration Types
// ===========================================

export interface OrchestratorConfig {
  /** Accounts executed in parallel (1 = sequential) */
  concurrency: number;

  /** Upper bound for every exchange call (ms); 0 disables */
  callTimeoutMs: number;

  /** Attempts for calls failing with a retryable error */
  retryAttempts: number;

  /** Delay between retries (ms), multiplied by the attempt number */
  retryDelayMs: number;

  /** Pause between accounts in sequential mode (ms) */
  accountDelayMs: number;
}

export interface ExecuteOptions {
  /** Once aborted no further account is started */
  signal?: AbortSignal;

  /** CANCEL_ALL only: cancel just this side's limit orders */
  cancelSide?: OrderSide;
}

// ===========================================
// Sizing Types
// ===========================================

/**
 * Account state gathered before sizing
 */
export interface SizingState {
  accountName: string;
  symbolInfo: SymbolInfo;

  /** Available base coin balance; required for SELL */
  availableBalance?: Decimal;

  /** Live market price; required for a BUY without limit price */
  marketPrice?: Decimal;
}

export type SizingErrorKind = Extract<
  ErrorKind,
  'INSUFFICIENT_BALANCE' | 'INVALID_QUANTITY' | 'MARKET_DATA_ERROR'
>;

/**
 * Result of the order sizing policy
 */
export type SizingDecision =
  | {
      valid: true;
      request: OrderRequest;

      /** Quantity before precision truncation */
      rawQuantity: Decimal;
    }
  | {
      valid: false;
      errorKind: SizingErrorKind;
      reason: string;
      rawQuantity?: Decimal;
    };

// ===========================================
// Outcome Types
// ===========================================

/**
 * Terminal result of one account's execution
 */
export interface ExecutionOutcome {
  accountName: string;
  intent: TradeIntent;
  succeeded: boolean;
  orderId?: string;
  errorKind?: ErrorKind;
  message: string;

  /** Owning main account, carried for audit only */
  mainAccountUid?: string;

  /** CANCEL_ALL only */
  cancelledCount?: number;
}

// ===========================================
// Event Types
// ===========================================

export type OrchestratorEvents = {
  runStarted: [intent: TradeIntent, accountCount: number];
  accountStarted: [accountName: string, intent: TradeIntent];
  accountSucceeded: [outcome: ExecutionOutcome];
  accountFailed: [outcome: ExecutionOutcome];
  runAborted: [skipped: number];
  runCompleted: [outcomes: ExecutionOutcome[]];
};
