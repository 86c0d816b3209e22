/**
 * Account Context validation
 *
 * Runs before any account is processed. Every violation is collected and
 * raised together as one fatal ConfigInvariantViolation.
 */

import { ConfigInvariantViolation } from '../errors.js';
import type { TradeIntent, TradingParameters } from '../types.js';
import type { AccountCredentials } from './types.js';

export function validateAccounts(accounts: readonly AccountCredentials[]): void {
  const issues: string[] = [];

  if (accounts.length === 0) {
    issues.push('No accounts configured');
  }

  const seen = new Set<string>();
  accounts.forEach((account, index) => {
    const label = account.name || `#${index + 1}`;

    if (!account.name) {
      issues.push(`Account #${index + 1} has no name`);
    } else if (seen.has(account.name)) {
      issues.push(`Duplicate account name: ${account.name}`);
    }
    seen.add(account.name);

    if (!account.apiKey || !account.apiSecret || !account.passphrase) {
      issues.push(`Account ${label} missing API credentials`);
    }

    if (account.isSubAccount && !account.mainAccountUid?.trim()) {
      issues.push(`Sub-account ${label} is missing mainAccountUid`);
    }
  });

  if (issues.length > 0) {
    throw new ConfigInvariantViolation(issues);
  }
}

export function validateTradingParameters(
  intent: TradeIntent,
  params: TradingParameters
): void {
  const issues: string[] = [];

  if (!params.symbol) {
    issues.push('Trading symbol is missing');
  }

  if (intent !== 'CANCEL_ALL') {
    if (!params.baseCoin || !params.quoteCoin) {
      issues.push('Trading coin and quote coin are required');
    }
    if (params.limitPrice?.isNegative()) {
      issues.push(`Limit price must not be negative: ${params.limitPrice.toString()}`);
    }
  }

  if (intent === 'BUY' && !params.buyQuoteAmount.greaterThan(0)) {
    issues.push(
      `Buy amount must be greater than 0: ${params.buyQuoteAmount.toString()}`
    );
  }

  if (
    intent === 'SELL' &&
    (!params.sellPercentage.greaterThan(0) || params.sellPercentage.greaterThan(100))
  ) {
    issues.push(
      `Sell percentage must be in (0, 100]: ${params.sellPercentage.toString()}`
    );
  }

  if (issues.length > 0) {
    throw new ConfigInvariantViolation(issues);
  }
}

/**
 * Display label of an account, e.g. `sub-1 (sub-account of 1234567890)`
 */
export function describeAccount(
  account: Pick<AccountCredentials, 'name' | 'mainAccountUid'>
): string {
  return account.mainAccountUid
    ? `${account.name} (sub-account of ${account.mainAccountUid})`
    : account.name;
}
