/**
 * Account Config Loader
 *
 * Reads the accounts/trading JSON file and turns it into validated
 * AccountCredentials plus a trading parameter draft. Fields the operator
 * left out of `trading` are resolved later by the CLI.
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { ConfigInvariantViolation } from '../errors.js';
import { normalizeSymbol } from '../exchange/symbols.js';
import type { TradingParameters } from '../types.js';
import type { AccountCredentials } from './types.js';
import { validateAccounts } from './validation.js';

// --- Zod Schemas ---

const DecimalSchema = z
  .union([
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'Must be a decimal number'),
  ])
  .transform((value) => new Decimal(value));

export const AccountEntrySchema = z.object({
  name: z.string().trim().min(1).optional(),
  api_key: z.string().min(1),
  api_secret: z.string().min(1),
  passphrase: z.string().min(1),
  is_sub_account: z.boolean().default(false),
  main_account_uid: z.union([z.string(), z.number()]).transform(String).optional(),
});

export const TradingSectionSchema = z.object({
  symbol: z.string().trim().min(1),
  coin: z.string().trim().min(1),
  quote: z.string().trim().min(1),
  price: DecimalSchema.optional(),
  buy_amount: DecimalSchema.optional(),
  sell_percentage: DecimalSchema.optional(),
});

export const AccountsFileSchema = z.object({
  accounts: z.array(AccountEntrySchema),
  trading: TradingSectionSchema,
});

export type AccountsFile = z.input<typeof AccountsFileSchema>;

/**
 * Trading parameters as configured; amounts may still be missing
 */
export type TradingParametersDraft = Omit<
  TradingParameters,
  'buyQuoteAmount' | 'sellPercentage'
> & {
  readonly buyQuoteAmount?: Decimal;
  readonly sellPercentage?: Decimal;
};

export interface LoadedConfig {
  accounts: AccountCredentials[];
  trading: TradingParametersDraft;
}

export const DEFAULT_ACCOUNTS_FILE: AccountsFile = {
  accounts: [
    {
      name: 'account_1',
      api_key: 'YOUR_API_KEY_HERE',
      api_secret: 'YOUR_API_SECRET_HERE',
      passphrase: 'YOUR_PASSPHRASE_HERE',
    },
    {
      name: 'account_2',
      api_key: 'SECOND_API_KEY_HERE',
      api_secret: 'SECOND_API_SECRET_HERE',
      passphrase: 'SECOND_PASSPHRASE_HERE',
      is_sub_account: true,
      main_account_uid: 'MAIN_ACCOUNT_UID_HERE',
    },
  ],
  trading: {
    symbol: 'BTCUSDT',
    coin: 'BTC',
    quote: 'USDT',
  },
};

/**
 * Validate a parsed JSON document and map it to domain values
 */
export function parseAccountsFile(raw: unknown): LoadedConfig {
  const result = AccountsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigInvariantViolation(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      )
    );
  }

  const { accounts, trading } = result.data;

  const credentials: AccountCredentials[] = accounts.map((entry, index) => ({
    name: entry.name ?? `account_${index + 1}`,
    apiKey: entry.api_key,
    apiSecret: entry.api_secret,
    passphrase: entry.passphrase,
    isSubAccount: entry.is_sub_account,
    mainAccountUid: entry.main_account_uid?.trim() || undefined,
  }));

  validateAccounts(credentials);

  return {
    accounts: credentials,
    trading: {
      symbol: normalizeSymbol(trading.symbol),
      baseCoin: trading.coin.toUpperCase(),
      quoteCoin: trading.quote.toUpperCase(),
      limitPrice: trading.price,
      buyQuoteAmount: trading.buy_amount,
      sellPercentage: trading.sell_percentage,
    },
  };
}

/**
 * Write the default template when no config file exists yet.
 * Returns true when a file was created.
 */
export async function ensureAccountsFile(configPath: string): Promise<boolean> {
  if (existsSync(configPath)) {
    return false;
  }
  await writeFile(
    configPath,
    `${JSON.stringify(DEFAULT_ACCOUNTS_FILE, null, 4)}\n`,
    'utf-8'
  );
  return true;
}

export async function loadAccountsFile(configPath: string): Promise<LoadedConfig> {
  const text = await readFile(configPath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigInvariantViolation([
      `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  return parseAccountsFile(raw);
}
