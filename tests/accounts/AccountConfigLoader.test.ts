/**
 * Tests for the account config loader
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_ACCOUNTS_FILE,
  ensureAccountsFile,
  loadAccountsFile,
  parseAccountsFile,
} from '../../src/accounts/AccountConfigLoader.js';
import { ConfigInvariantViolation } from '../../src/errors.js';

const validFile = {
  accounts: [
    {
      name: 'main',
      api_key: 'test-key-1',
      api_secret: 'test-secret',
      passphrase: 'test-pass',
    },
    {
      name: 'sub',
      api_key: 'test-key-2',
      api_secret: 'test-secret',
      passphrase: 'test-pass',
      is_sub_account: true,
      main_account_uid: 123456,
    },
  ],
  trading: {
    symbol: 'btcusdt_spbl',
    coin: 'btc',
    quote: 'usdt',
    price: 0,
    buy_amount: '25',
  },
};

describe('parseAccountsFile', () => {
  it('should map accounts to credentials', () => {
    const { accounts } = parseAccountsFile(validFile);

    expect(accounts).toEqual([
      {
        name: 'main',
        apiKey: 'test-key-1',
        apiSecret: 'test-secret',
        passphrase: 'test-pass',
        isSubAccount: false,
        mainAccountUid: undefined,
      },
      {
        name: 'sub',
        apiKey: 'test-key-2',
        apiSecret: 'test-secret',
        passphrase: 'test-pass',
        isSubAccount: true,
        mainAccountUid: '123456',
      },
    ]);
  });

  it('should normalize the trading section', () => {
    const { trading } = parseAccountsFile(validFile);

    expect(trading.symbol).toBe('BTCUSDT');
    expect(trading.baseCoin).toBe('BTC');
    expect(trading.quoteCoin).toBe('USDT');
    expect(trading.limitPrice?.isZero()).toBe(true);
    expect(trading.buyQuoteAmount?.toString()).toBe('25');
    expect(trading.sellPercentage).toBeUndefined();
  });

  it('should name unnamed accounts by position', () => {
    const { accounts } = parseAccountsFile({
      ...validFile,
      accounts: [validFile.accounts[0], { ...validFile.accounts[0], name: undefined }],
    });

    expect(accounts[1].name).toBe('account_2');
  });

  it('should reject a sub-account without main account uid', () => {
    expect(() =>
      parseAccountsFile({
        ...validFile,
        accounts: [{ ...validFile.accounts[1], main_account_uid: '  ' }],
      })
    ).toThrow('Sub-account sub is missing mainAccountUid');
  });

  it('should reject duplicate account names', () => {
    expect(() =>
      parseAccountsFile({ ...validFile, accounts: [validFile.accounts[0], validFile.accounts[0]] })
    ).toThrow('Duplicate account name: main');
  });

  it('should report schema issues with their path', () => {
    try {
      parseAccountsFile({
        ...validFile,
        accounts: [{ name: 'main', api_secret: 'test-secret', passphrase: 'test-pass' }],
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigInvariantViolation);
      if (error instanceof ConfigInvariantViolation) {
        expect(error.issues).toEqual(['accounts.0.api_key: Required']);
      }
    }
  });

  it('should reject a non-numeric price', () => {
    expect(() =>
      parseAccountsFile({ ...validFile, trading: { ...validFile.trading, price: 'cheap' } })
    ).toThrow('trading.price');
  });
});

describe('account config file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'fleet-trader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the template only when no file exists', async () => {
    const configPath = path.join(dir, 'config.json');

    expect(await ensureAccountsFile(configPath)).toBe(true);
    expect(await ensureAccountsFile(configPath)).toBe(false);
    expect(JSON.parse(await readFile(configPath, 'utf-8'))).toEqual(DEFAULT_ACCOUNTS_FILE);
  });

  it('should load the template it writes', async () => {
    const configPath = path.join(dir, 'config.json');
    await ensureAccountsFile(configPath);

    const loaded = await loadAccountsFile(configPath);

    expect(loaded.accounts.map((a) => a.name)).toEqual(['account_1', 'account_2']);
    expect(loaded.accounts[1].mainAccountUid).toBe('MAIN_ACCOUNT_UID_HERE');
    expect(loaded.trading.symbol).toBe('BTCUSDT');
  });

  it('should reject invalid JSON', async () => {
    const configPath = path.join(dir, 'config.json');
    await writeFile(configPath, '{ "accounts": [', 'utf-8');

    await expect(loadAccountsFile(configPath)).rejects.toThrow(`Invalid JSON in ${configPath}`);
  });
});
