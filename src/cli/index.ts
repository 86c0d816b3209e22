/**
 * CLI Module
 */

export { TradingMenu } from './TradingMenu.js';
export type { TradingMenuDeps } from './TradingMenu.js';
export {
  parseMenuChoice,
  parseDecimalInput,
  promptCancelSide,
  resolveTradingParameters,
} from './prompts.js';
export type { MenuChoice, Prompter, ResolveResult } from './prompts.js';
