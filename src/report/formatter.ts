/**
 * Report Formatter
 *
 * Renders a Report for the terminal.
 */

import type { TradeIntent } from '../types.js';
import type { Report } from './types.js';

const INTENT_LABELS: Record<TradeIntent, string> = {
  BUY: 'BUY',
  SELL: 'SELL',
  CANCEL_ALL: 'CANCEL',
};

export function formatHeadline(report: Report): string {
  if (report.total > 0 && report.succeededCount === report.total) {
    return `✓ All ${report.total} operations completed successfully`;
  }
  return `⚠ ${report.succeededCount}/${report.total} operations completed successfully`;
}

/**
 * Format a full report block
 */
export function formatReport(report: Report, intent?: TradeIntent): string {
  const title = intent ? `${INTENT_LABELS[intent]} summary` : 'Summary';
  const rule = '='.repeat(40);

  return [
    rule,
    title,
    rule,
    ...report.perAccountLines,
    '-'.repeat(40),
    formatHeadline(report),
  ].join('\n');
}
