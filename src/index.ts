#!/usr/bin/env node
/**
 * Fleet Trader
 *
 * Entry point for the application.
 * Handles process signals and fatal configuration errors.
 */

import { App } from './app.js';
import { ConfigInvariantViolation, errorMessage } from './errors.js';
import { logger } from './logger.js';

const app = new App();

process.on('SIGTERM', () => app.interrupt('SIGTERM'));
process.on('SIGINT', () => app.interrupt('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

async function main(): Promise<void> {
  try {
    logger.info('='.repeat(50));
    logger.info('Fleet Trader');
    logger.info('='.repeat(50));

    await app.start();
    process.exit(0);
  } catch (error) {
    if (error instanceof ConfigInvariantViolation) {
      for (const issue of error.issues) {
        logger.error(`Configuration error: ${issue}`);
      }
    } else {
      logger.error('Failed to start application', { error: errorMessage(error) });
    }
    app.stop();
    process.exit(1);
  }
}

void main();
