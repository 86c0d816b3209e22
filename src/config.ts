import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

export const config = {
  // Accounts & trading parameters file
  accounts: {
    configPath: getEnvVar('CONFIG_PATH', 'config.json'),
  },

  // Bitget Configuration
  bitget: {
    baseUrl: getEnvVar('BITGET_BASE_URL', 'https://api.bitget.com'),

    /** Abort a single HTTP request after this many ms */
    timeoutMs: getEnvNumber('HTTP_TIMEOUT_MS', 10000),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    dir: getEnvVar('LOG_DIR', 'logs'),
  },

  // Execution Orchestrator Configuration
  execution: {
    /** Accounts processed in parallel (1 = sequential) */
    concurrency: getEnvNumber('EXECUTION_CONCURRENCY', 1),

    /** Upper bound for each exchange call of one account */
    callTimeoutMs: getEnvNumber('EXECUTION_CALL_TIMEOUT_MS', 15000),

    /** Attempts for calls failing with network errors or timeouts */
    retryAttempts: getEnvNumber('EXECUTION_RETRY_ATTEMPTS', 3),

    /** Base delay between retries (ms), multiplied by the attempt number */
    retryDelayMs: getEnvNumber('EXECUTION_RETRY_DELAY_MS', 1000),

    /** Pause between accounts in sequential mode */
    accountDelayMs: getEnvNumber('EXECUTION_ACCOUNT_DELAY_MS', 300),
  },
} as const;
