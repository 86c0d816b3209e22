/**
 * Tests for operator prompts
 */

import { describe, it, expect, vi } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  parseDecimalInput,
  parseMenuChoice,
  promptCancelSide,
  resolveTradingParameters,
} from '../../src/cli/prompts.js';
import type { TradingParametersDraft } from '../../src/accounts/AccountConfigLoader.js';

function scripted(...answers: string[]) {
  return { question: vi.fn(async (_query: string) => answers.shift() ?? '') };
}

const draft: TradingParametersDraft = {
  symbol: 'BTCUSDT',
  baseCoin: 'BTC',
  quoteCoin: 'USDT',
};

describe('parseMenuChoice', () => {
  it('should map menu numbers and names to intents', () => {
    expect(parseMenuChoice('1')).toBe('BUY');
    expect(parseMenuChoice(' 2 ')).toBe('SELL');
    expect(parseMenuChoice('3')).toBe('CANCEL_ALL');
    expect(parseMenuChoice('exit')).toBe('EXIT');
  });

  it('should return null for unknown input', () => {
    expect(parseMenuChoice('9')).toBeNull();
  });
});

describe('parseDecimalInput', () => {
  it('should parse plain decimals only', () => {
    expect(parseDecimalInput(' 12.5 ')?.toString()).toBe('12.5');
    expect(parseDecimalInput('-1')).toBeNull();
    expect(parseDecimalInput('1e3')).toBeNull();
    expect(parseDecimalInput('')).toBeNull();
  });
});

describe('resolveTradingParameters', () => {
  it('should ask for the buy amount and a limit price', async () => {
    const prompter = scripted('50', '');

    const result = await resolveTradingParameters('BUY', draft, prompter, new Decimal(65000));

    expect(prompter.question.mock.calls.map(([query]) => query)).toEqual([
      'Enter amount of USDT to spend for all accounts: ',
      'Enter limit price in USDT (blank for market order, current: 65000): ',
    ]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.params.buyQuoteAmount.toString()).toBe('50');
      expect(result.params.limitPrice).toBeUndefined();
    }
  });

  it('should not prompt for configured values', async () => {
    const prompter = scripted();

    const result = await resolveTradingParameters(
      'BUY',
      { ...draft, buyQuoteAmount: new Decimal(25), limitPrice: new Decimal(60000) },
      prompter
    );

    expect(prompter.question).not.toHaveBeenCalled();
    expect(result.ok && result.params.limitPrice?.toString()).toBe('60000');
  });

  it('should ask for a price when the configured price is zero', async () => {
    const prompter = scripted('61000');

    const result = await resolveTradingParameters(
      'BUY',
      { ...draft, buyQuoteAmount: new Decimal(25), limitPrice: new Decimal(0) },
      prompter
    );

    expect(prompter.question).toHaveBeenCalledWith(
      'Enter limit price in USDT (blank for market order): '
    );
    expect(result.ok && result.params.limitPrice?.toString()).toBe('61000');
  });

  it('should default the sell percentage to 100', async () => {
    const prompter = scripted('', '');

    const result = await resolveTradingParameters('SELL', draft, prompter);

    expect(prompter.question.mock.calls[0][0]).toBe(
      'Enter percentage of BTC to sell for all accounts (1-100) [100]: '
    );
    expect(result.ok && result.params.sellPercentage.toString()).toBe('100');
  });

  it('should reject invalid input', async () => {
    expect(await resolveTradingParameters('BUY', draft, scripted('abc'))).toEqual({
      ok: false,
      error: 'Invalid amount: abc',
    });
    expect(await resolveTradingParameters('SELL', draft, scripted('150'))).toEqual({
      ok: false,
      error: 'Invalid percentage: 150',
    });
    expect(await resolveTradingParameters('SELL', draft, scripted('50', 'x'))).toEqual({
      ok: false,
      error: 'Invalid price: x',
    });
  });

  it('should not prompt for CANCEL_ALL', async () => {
    const prompter = scripted();

    const result = await resolveTradingParameters('CANCEL_ALL', draft, prompter);

    expect(prompter.question).not.toHaveBeenCalled();
    expect(result.ok).toBe(true);
  });
});

describe('promptCancelSide', () => {
  it('should default to every open order', async () => {
    expect(await promptCancelSide(scripted(''))).toEqual({ ok: true });
  });

  it('should accept a side', async () => {
    expect(await promptCancelSide(scripted('b'))).toEqual({ ok: true, side: 'BUY' });
    expect(await promptCancelSide(scripted('sell'))).toEqual({ ok: true, side: 'SELL' });
  });

  it('should reject anything else', async () => {
    expect(await promptCancelSide(scripted('x'))).toEqual({ ok: false, error: 'Invalid choice: x' });
  });
});
