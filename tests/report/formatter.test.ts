/**
 * Tests for the report formatter
 */

import { describe, it, expect } from 'vitest';
import { formatHeadline, formatReport } from '../../src/report/formatter.js';
import type { Report } from '../../src/report/types.js';

describe('formatHeadline', () => {
  it('should confirm a fully successful run', () => {
    expect(
      formatHeadline({ total: 3, succeededCount: 3, failedCount: 0, perAccountLines: [] })
    ).toBe('✓ All 3 operations completed successfully');
  });

  it('should show the ratio when an account failed', () => {
    expect(
      formatHeadline({ total: 3, succeededCount: 2, failedCount: 1, perAccountLines: [] })
    ).toBe('⚠ 2/3 operations completed successfully');
  });

  it('should not call an empty run successful', () => {
    expect(
      formatHeadline({ total: 0, succeededCount: 0, failedCount: 0, perAccountLines: [] })
    ).toBe('⚠ 0/0 operations completed successfully');
  });
});

describe('formatReport', () => {
  const report: Report = {
    total: 2,
    succeededCount: 1,
    failedCount: 1,
    perAccountLines: ['✓ main: Cancelled 2 open orders', '✗ sub [NETWORK_ERROR]: timeout'],
  };

  it('should frame the account lines with title and headline', () => {
    expect(formatReport(report, 'CANCEL_ALL').split('\n')).toEqual([
      '='.repeat(40),
      'CANCEL summary',
      '='.repeat(40),
      '✓ main: Cancelled 2 open orders',
      '✗ sub [NETWORK_ERROR]: timeout',
      '-'.repeat(40),
      '⚠ 1/2 operations completed successfully',
    ]);
  });

  it('should use a generic title without intent', () => {
    expect(formatReport(report).split('\n')[1]).toBe('Summary');
  });
});
