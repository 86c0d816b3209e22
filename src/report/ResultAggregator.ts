/**
 * Result Aggregator
 *
 * Merges per-account outcomes into one Report. Pure: no I/O, and the same
 * outcomes always produce the same Report.
 */

import { describeAccount } from '../accounts/validation.js';
import type { ExecutionOutcome } from '../execution/types.js';
import type { Report } from './types.js';

export function summarize(outcomes: readonly ExecutionOutcome[]): Report {
  const succeededCount = outcomes.filter((o) => o.succeeded).length;

  return {
    total: outcomes.length,
    succeededCount,
    failedCount: outcomes.length - succeededCount,
    perAccountLines: outcomes.map(formatOutcomeLine),
  };
}

/**
 * `✓ main: <message>` or `✗ sub-1 (sub-account of 42) [AUTH_ERROR]: <message>`
 */
export function formatOutcomeLine(outcome: ExecutionOutcome): string {
  const label = describeAccount({
    name: outcome.accountName,
    mainAccountUid: outcome.mainAccountUid,
  });

  if (outcome.succeeded) {
    return `✓ ${label}: ${outcome.message}`;
  }
  return `✗ ${label} [${outcome.errorKind ?? 'UNKNOWN'}]: ${outcome.message}`;
}
