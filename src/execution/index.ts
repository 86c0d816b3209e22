/**
 * Execution Module
 *
 * Fans a trading intent out across the account fleet.
 */

// Types
export type {
  OrchestratorConfig,
  ExecuteOptions,
  SizingState,
  SizingErrorKind,
  SizingDecision,
  ExecutionOutcome,
  OrchestratorEvents,
} from './types.js';

// Classes
export { ExecutionOrchestrator, describeOrder } from './ExecutionOrchestrator.js';
export { OrderSizer, truncate, usesLimitPrice } from './OrderSizer.js';
