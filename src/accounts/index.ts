/**
 * Account Context Module
 *
 * Loads and validates the fleet of account credentials.
 */

export type { AccountCredentials } from './types.js';
export type { AccountsFile, LoadedConfig, TradingParametersDraft } from './AccountConfigLoader.js';

export {
  DEFAULT_ACCOUNTS_FILE,
  ensureAccountsFile,
  loadAccountsFile,
  parseAccountsFile,
} from './AccountConfigLoader.js';
export { describeAccount, validateAccounts, validateTradingParameters } from './validation.js';
