/**
 * Types for Result Aggregator
 */

/**
 * Operator-facing summary of one run
 */
export interface Report {
  total: number;
  succeededCount: number;
  failedCount: number;

  /** One line per account, in input account order */
  perAccountLines: string[];
}
