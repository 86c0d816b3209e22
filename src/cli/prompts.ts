/**
 * Operator prompts
 *
 * Fills in the trading parameters the config file left out, asking only
 * for what the selected intent needs.
 */

import { Decimal } from 'decimal.js';
import type { TradingParametersDraft } from '../accounts/AccountConfigLoader.js';
import { usesLimitPrice } from '../execution/OrderSizer.js';
import type { OrderSide, TradeIntent, TradingParameters } from '../types.js';

export interface Prompter {
  question(query: string): Promise<string>;
}

export type MenuChoice = TradeIntent | 'EXIT';

export type ResolveResult =
  | { ok: true; params: TradingParameters }
  | { ok: false; error: string };

const MENU_CHOICES: Record<string, MenuChoice> = {
  '1': 'BUY',
  buy: 'BUY',
  '2': 'SELL',
  sell: 'SELL',
  '3': 'CANCEL_ALL',
  cancel: 'CANCEL_ALL',
  '4': 'EXIT',
  exit: 'EXIT',
  q: 'EXIT',
};

export function parseMenuChoice(input: string): MenuChoice | null {
  return MENU_CHOICES[input.trim().toLowerCase()] ?? null;
}

/**
 * Parse a plain decimal number; null for anything else
 */
export function parseDecimalInput(input: string): Decimal | null {
  const text = input.trim();
  if (!/^\d+(\.\d+)?$/.test(text)) {
    return null;
  }
  return new Decimal(text);
}

export async function resolveTradingParameters(
  intent: TradeIntent,
  draft: TradingParametersDraft,
  prompter: Prompter,
  referencePrice?: Decimal
): Promise<ResolveResult> {
  let buyQuoteAmount = draft.buyQuoteAmount ?? new Decimal(0);
  let sellPercentage = draft.sellPercentage ?? new Decimal(100);
  let limitPrice = usesLimitPrice(draft) ? draft.limitPrice : undefined;

  if (intent === 'CANCEL_ALL') {
    return { ok: true, params: { ...draft, buyQuoteAmount, sellPercentage, limitPrice } };
  }

  if (intent === 'BUY' && !draft.buyQuoteAmount) {
    const answer = await prompter.question(
      `Enter amount of ${draft.quoteCoin} to spend for all accounts: `
    );
    const amount = parseDecimalInput(answer || '0');
    if (!amount || !amount.greaterThan(0)) {
      return { ok: false, error: `Invalid amount: ${answer}` };
    }
    buyQuoteAmount = amount;
  }

  if (intent === 'SELL' && !draft.sellPercentage) {
    const answer = await prompter.question(
      `Enter percentage of ${draft.baseCoin} to sell for all accounts (1-100) [100]: `
    );
    const percentage = parseDecimalInput(answer || '100');
    if (!percentage || !percentage.greaterThan(0) || percentage.greaterThan(100)) {
      return { ok: false, error: `Invalid percentage: ${answer}` };
    }
    sellPercentage = percentage;
  }

  if (!limitPrice) {
    const current = referencePrice ? `, current: ${referencePrice.toFixed()}` : '';
    const answer = await prompter.question(
      `Enter limit price in ${draft.quoteCoin} (blank for market order${current}): `
    );
    if (answer.trim() !== '') {
      const price = parseDecimalInput(answer);
      if (!price || !price.greaterThan(0)) {
        return { ok: false, error: `Invalid price: ${answer}` };
      }
      limitPrice = price;
    }
  }

  return { ok: true, params: { ...draft, buyQuoteAmount, sellPercentage, limitPrice } };
}

/**
 * Ask which open orders to cancel. `undefined` means every open order.
 */
export async function promptCancelSide(
  prompter: Prompter
): Promise<{ ok: true; side?: OrderSide } | { ok: false; error: string }> {
  const answer = await prompter.question(
    'Cancel which orders? [a]ll / [b]uy limits / [s]ell limits (default all): '
  );

  switch (answer.trim().toLowerCase()) {
    case '':
    case 'a':
    case 'all':
      return { ok: true };
    case 'b':
    case 'buy':
      return { ok: true, side: 'BUY' };
    case 's':
    case 'sell':
      return { ok: true, side: 'SELL' };
    default:
      return { ok: false, error: `Invalid choice: ${answer}` };
  }
}
