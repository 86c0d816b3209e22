/**
 * Error taxonomy
 *
 * `ConfigInvariantViolation` is fatal and aborts a run before any order.
 * Every `TradingError` is scoped to one account and ends up as a failed
 * ExecutionOutcome.
 */

export type ErrorKind =
  | 'AUTH_ERROR'
  | 'MARKET_DATA_ERROR'
  | 'INSUFFICIENT_BALANCE'
  | 'INVALID_QUANTITY'
  | 'ORDER_REJECTED'
  | 'NETWORK_ERROR'
  | 'TIMEOUT_ERROR'
  | 'ABORTED'
  | 'UNKNOWN';

export abstract class TradingError extends Error {
  abstract readonly kind: ErrorKind;

  /** Whether repeating the same call may succeed */
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthError extends TradingError {
  readonly kind = 'AUTH_ERROR';
}

export class MarketDataError extends TradingError {
  readonly kind = 'MARKET_DATA_ERROR';
}

export class InsufficientBalance extends TradingError {
  readonly kind = 'INSUFFICIENT_BALANCE';
}

export class InvalidQuantity extends TradingError {
  readonly kind = 'INVALID_QUANTITY';
}

export class OrderRejected extends TradingError {
  readonly kind = 'ORDER_REJECTED';

  constructor(
    readonly reason: string,
    readonly code?: string
  ) {
    super(code ? `Order rejected (${code}): ${reason}` : `Order rejected: ${reason}`);
  }
}

export class NetworkError extends TradingError {
  readonly kind = 'NETWORK_ERROR';
  override readonly retryable = true;
}

export class TimeoutError extends TradingError {
  readonly kind = 'TIMEOUT_ERROR';
  override readonly retryable = true;
}

/**
 * Unusable configuration. Raised before any account is processed.
 */
export class ConfigInvariantViolation extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigInvariantViolation';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof TradingError && error.retryable;
}

export function toErrorKind(error: unknown): ErrorKind {
  return error instanceof TradingError ? error.kind : 'UNKNOWN';
}

/**
 * Normalize various error types to string message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
