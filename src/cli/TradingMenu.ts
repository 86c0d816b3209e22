/**
 * Trading Menu
 *
 * Interactive loop in front of the Execution Orchestrator:
 * Menu Choice → Parameter Prompts → Fleet Execution → Report
 */

import type { Decimal } from 'decimal.js';
import type { TradingParametersDraft } from '../accounts/AccountConfigLoader.js';
import type { AccountCredentials } from '../accounts/types.js';
import { errorMessage } from '../errors.js';
import type { ExchangeClient } from '../exchange/types.js';
import type { ExecutionOrchestrator } from '../execution/ExecutionOrchestrator.js';
import type { ExecuteOptions } from '../execution/types.js';
import { logger } from '../logger.js';
import { formatReport, summarize } from '../report/index.js';
import type { TradeIntent } from '../types.js';
import {
  parseMenuChoice,
  promptCancelSide,
  resolveTradingParameters,
  type Prompter,
} from './prompts.js';

export interface TradingMenuDeps {
  orchestrator: ExecutionOrchestrator;

  /** Used for the reference price shown before a limit price prompt */
  client: Pick<ExchangeClient, 'getPrice'>;
  accounts: readonly AccountCredentials[];
  trading: TradingParametersDraft;
  prompter: Prompter;
  print?: (line: string) => void;
}

const INTENT_LABELS: Record<TradeIntent, string> = {
  BUY: 'Executing BUY orders...',
  SELL: 'Executing SELL orders...',
  CANCEL_ALL: 'Cancelling open orders...',
};

export class TradingMenu {
  private readonly deps: TradingMenuDeps;
  private readonly print: (line: string) => void;
  private activeRun: AbortController | null = null;

  constructor(deps: TradingMenuDeps) {
    this.deps = deps;
    this.print = deps.print ?? ((line) => console.log(line));
  }

  /**
   * True while an execution is in flight
   */
  isExecuting(): boolean {
    return this.activeRun !== null;
  }

  /**
   * Stop starting new accounts in the running execution.
   * Returns false when nothing was running.
   */
  abortExecution(): boolean {
    if (!this.activeRun) {
      return false;
    }
    this.activeRun.abort();
    return true;
  }

  printBanner(): void {
    const { accounts, trading } = this.deps;
    this.print('='.repeat(40));
    this.print('  Fleet Trader');
    this.print('='.repeat(40));
    this.print(`✓ Loaded ${accounts.length} account${accounts.length === 1 ? '' : 's'}`);
    this.print(`✓ Trading pair: ${trading.symbol} (${trading.baseCoin}/${trading.quoteCoin})`);
  }

  /**
   * Loop until the operator chooses EXIT
   */
  async run(): Promise<void> {
    this.printBanner();

    for (;;) {
      this.print('');
      this.print('Available commands:');
      this.print('1. BUY');
      this.print('2. SELL');
      this.print('3. CANCEL open orders');
      this.print('4. EXIT');

      const choice = parseMenuChoice(await this.deps.prompter.question('Enter command (1-4): '));
      if (choice === 'EXIT') {
        this.print('Exiting...');
        return;
      }
      if (!choice) {
        this.print('Invalid command. Please try again.');
        continue;
      }

      await this.handle(choice);
    }
  }

  /**
   * Resolve parameters for one intent, execute it and print the report
   */
  async handle(intent: TradeIntent): Promise<void> {
    const { orchestrator, accounts, trading, prompter } = this.deps;
    const options: ExecuteOptions = {};

    if (intent === 'CANCEL_ALL') {
      const side = await promptCancelSide(prompter);
      if (!side.ok) {
        this.print(side.error);
        return;
      }
      options.cancelSide = side.side;
    }

    const referencePrice = intent === 'CANCEL_ALL' ? undefined : await this.referencePrice();
    if (referencePrice) {
      this.print(`Current ${trading.baseCoin} price: ${referencePrice.toFixed()} ${trading.quoteCoin}`);
    }

    const resolved = await resolveTradingParameters(intent, trading, prompter, referencePrice);
    if (!resolved.ok) {
      this.print(resolved.error);
      return;
    }

    this.print(INTENT_LABELS[intent]);
    const controller = new AbortController();
    this.activeRun = controller;

    try {
      const outcomes = await orchestrator.execute(intent, resolved.params, accounts, {
        ...options,
        signal: controller.signal,
      });
      this.print(formatReport(summarize(outcomes), intent));
    } catch (error) {
      logger.error('Execution failed', { intent, error: errorMessage(error) });
      this.print(`Execution failed: ${errorMessage(error)}`);
    } finally {
      this.activeRun = null;
    }
  }

  private async referencePrice(): Promise<Decimal | undefined> {
    try {
      return await this.deps.client.getPrice(this.deps.trading.symbol);
    } catch (error) {
      logger.warn('Reference price unavailable', {
        symbol: this.deps.trading.symbol,
        error: errorMessage(error),
      });
      return undefined;
    }
  }
}
