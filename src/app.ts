/**
 * Application
 *
 * Wires the modules together:
 * Account Config → Bitget Client → Execution Orchestrator → Trading Menu
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { ensureAccountsFile, loadAccountsFile } from './accounts/index.js';
import { config } from './config.js';
import { BitgetSpotClient } from './exchange/index.js';
import { ExecutionOrchestrator } from './execution/index.js';
import { TradingMenu } from './cli/index.js';
import { logger, maskSecret } from './logger.js';

export class App {
  private readonly client: BitgetSpotClient;
  private readonly orchestrator: ExecutionOrchestrator;
  private menu: TradingMenu | null = null;
  private readline: Interface | null = null;

  constructor() {
    this.client = new BitgetSpotClient({
      baseUrl: config.bitget.baseUrl,
      timeoutMs: config.bitget.timeoutMs,
    });

    this.orchestrator = new ExecutionOrchestrator({ ...config.execution }, this.client);

    this.setupEventPipeline();
  }

  private setupEventPipeline(): void {
    this.orchestrator.on('runStarted', (intent, accountCount) => {
      logger.info('Execution started', { intent, accounts: accountCount });
    });

    this.orchestrator.on('accountStarted', (accountName, intent) => {
      logger.debug('Account execution started', { account: accountName, intent });
    });

    this.orchestrator.on('accountSucceeded', (outcome) => {
      logger.info('Account execution succeeded', {
        account: outcome.accountName,
        intent: outcome.intent,
        orderId: outcome.orderId,
        message: outcome.message,
      });
    });

    this.orchestrator.on('accountFailed', (outcome) => {
      logger.warn('Account execution failed', {
        account: outcome.accountName,
        intent: outcome.intent,
        errorKind: outcome.errorKind,
        message: outcome.message,
      });
    });

    this.orchestrator.on('runAborted', (skipped) => {
      logger.warn('Execution aborted by operator', { skipped });
    });

    this.orchestrator.on('runCompleted', (outcomes) => {
      logger.info('Execution completed', {
        total: outcomes.length,
        succeeded: outcomes.filter((o) => o.succeeded).length,
      });
    });
  }

  /**
   * Load the fleet and run the menu until the operator exits.
   * Resolves false when only the config template was written.
   */
  async start(): Promise<boolean> {
    const configPath = config.accounts.configPath;

    if (await ensureAccountsFile(configPath)) {
      logger.warn(`Created default config file at ${configPath}`);
      logger.warn('Please edit the file with your API credentials and restart');
      return false;
    }

    const loaded = await loadAccountsFile(configPath);
    logger.info('Accounts loaded', {
      count: loaded.accounts.length,
      symbol: loaded.trading.symbol,
      accounts: loaded.accounts.map((a) => `${a.name} (${maskSecret(a.apiKey)})`),
    });

    const readline = createInterface({ input: process.stdin, output: process.stdout });
    readline.on('SIGINT', () => this.interrupt('SIGINT'));
    this.readline = readline;

    this.menu = new TradingMenu({
      orchestrator: this.orchestrator,
      client: this.client,
      accounts: loaded.accounts,
      trading: loaded.trading,
      prompter: readline,
    });

    try {
      await this.menu.run();
    } finally {
      this.stop();
    }
    return true;
  }

  /**
   * Abort a running execution; with nothing running, leave the process
   */
  interrupt(signal: string): void {
    if (this.menu?.abortExecution()) {
      logger.warn(`Received ${signal}, no further accounts will be started`);
      return;
    }

    logger.info(`Received ${signal}, exiting`);
    this.stop();
    process.exit(0);
  }

  stop(): void {
    this.readline?.close();
    this.readline = null;
    this.menu = null;
  }
}
