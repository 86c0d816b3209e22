/**
 * Tests for the Result Aggregator
 */

import { describe, it, expect } from 'vitest';
import { formatOutcomeLine, summarize } from '../../src/report/ResultAggregator.js';
import type { ExecutionOutcome } from '../../src/execution/types.js';

const outcomes: ExecutionOutcome[] = [
  {
    accountName: 'main',
    intent: 'BUY',
    succeeded: true,
    orderId: '1001',
    message: 'BUY MARKET 10 USDT (~5 BTC) placed (order 1001)',
  },
  {
    accountName: 'sub-1',
    intent: 'BUY',
    succeeded: false,
    errorKind: 'AUTH_ERROR',
    message: 'Invalid credentials',
    mainAccountUid: '42',
  },
];

describe('summarize', () => {
  it('should count succeeded and failed outcomes', () => {
    const report = summarize(outcomes);

    expect(report.total).toBe(2);
    expect(report.succeededCount).toBe(1);
    expect(report.failedCount).toBe(1);
  });

  it('should render one line per account in order', () => {
    expect(summarize(outcomes).perAccountLines).toEqual([
      '✓ main: BUY MARKET 10 USDT (~5 BTC) placed (order 1001)',
      '✗ sub-1 (sub-account of 42) [AUTH_ERROR]: Invalid credentials',
    ]);
  });

  it('should return the same report for the same outcomes', () => {
    expect(summarize(outcomes)).toEqual(summarize(outcomes));
  });

  it('should summarize an empty run', () => {
    expect(summarize([])).toEqual({
      total: 0,
      succeededCount: 0,
      failedCount: 0,
      perAccountLines: [],
    });
  });
});

describe('formatOutcomeLine', () => {
  it('should mark failures without a kind as UNKNOWN', () => {
    expect(
      formatOutcomeLine({ accountName: 'main', intent: 'SELL', succeeded: false, message: 'boom' })
    ).toBe('✗ main [UNKNOWN]: boom');
  });
});
