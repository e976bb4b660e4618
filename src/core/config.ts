/**
 * Centralized service configuration
 *
 * Environment-driven configuration with typed defaults for:
 * - Ledger storage driver and update strategy
 * - Reservation retry policy
 * - Snapshot file retries
 * - Reports and catalog seeding
 */
import type { LedgerDriver, ServiceConfig, StockUpdateStrategy } from './config.types';
import {
  parseEnum,
  parseNonNegativeInt,
  parseOptionalString,
  parsePositiveInt,
  parseEnvVar,
} from './config.utils';

export type { LedgerDriver, ServiceConfig, StockUpdateStrategy } from './config.types';

const LEDGER_DRIVERS: readonly LedgerDriver[] = ['memory', 'file', 'postgres'];
const STOCK_UPDATE_STRATEGIES: readonly StockUpdateStrategy[] = ['conditional', 'optimistic'];
const LOG_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Read the configuration from the current environment
 */
export function loadConfig(): ServiceConfig {
  return Object.freeze({
    PORT: parsePositiveInt('PORT', 3000),

    LOG_LEVEL: parseEnum('LOG_LEVEL', LOG_LEVELS, 'info'),

    LEDGER_DRIVER: parseEnum('LEDGER_DRIVER', LEDGER_DRIVERS, 'memory'),
    DATA_DIR: parseEnvVar('DATA_DIR', 'data', (value) => value),
    DATABASE_URL: parseOptionalString('DATABASE_URL'),
    DB_POOL_MAX: parsePositiveInt('DB_POOL_MAX', 10),
    LEDGER_STRATEGY: parseEnum('LEDGER_STRATEGY', STOCK_UPDATE_STRATEGIES, 'conditional'),
    LEDGER_CAS_MAX_ATTEMPTS: parsePositiveInt('LEDGER_CAS_MAX_ATTEMPTS', 5),
    LEDGER_LOCK_TIMEOUT_MS: parsePositiveInt('LEDGER_LOCK_TIMEOUT_MS', 5000),

    // Retry Policy: attempts = RESERVE_RETRY_TIMES + 1
    RESERVE_RETRY_TIMES: parseNonNegativeInt('RESERVE_RETRY_TIMES', 3),
    RESERVE_RETRY_BASE_MS: parsePositiveInt('RESERVE_RETRY_BASE_MS', 20),
    RESERVE_RETRY_JITTER_MS: parseNonNegativeInt('RESERVE_RETRY_JITTER_MS', 30),

    FS_RETRY_TIMES: parseNonNegativeInt('FS_RETRY_TIMES', 2),
    FS_RETRY_BASE_MS: parsePositiveInt('FS_RETRY_BASE_MS', 50),

    LOW_STOCK_THRESHOLD: parseNonNegativeInt('LOW_STOCK_THRESHOLD', 10),

    SEED_FILE: parseOptionalString('SEED_FILE'),
    SEED_CONCURRENCY: parsePositiveInt('SEED_CONCURRENCY', 8),
  });
}

export const config: ServiceConfig = loadConfig();

/**
 * Get configuration value by key
 */
export function getConfigValue<K extends keyof ServiceConfig>(key: K): ServiceConfig[K] {
  return config[key];
}

/**
 * Check a configuration for settings that cannot work together
 */
export function validateConfig(candidate: ServiceConfig = config): string[] {
  const issues: string[] = [];

  if (candidate.LEDGER_DRIVER === 'postgres' && candidate.DATABASE_URL === undefined) {
    issues.push('DATABASE_URL is required when LEDGER_DRIVER is postgres');
  }

  if (candidate.LEDGER_STRATEGY === 'optimistic' && candidate.LEDGER_DRIVER !== 'postgres') {
    issues.push('LEDGER_STRATEGY=optimistic only applies to the postgres driver');
  }

  if (candidate.RESERVE_RETRY_TIMES > 10) {
    issues.push('RESERVE_RETRY_TIMES should stay small (at most 10)');
  }

  return issues;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(candidate: ServiceConfig = config): Record<string, unknown> {
  return {
    port: candidate.PORT,
    ledger: {
      driver: candidate.LEDGER_DRIVER,
      strategy: candidate.LEDGER_STRATEGY,
      dataDir: candidate.DATA_DIR,
      database: candidate.DATABASE_URL === undefined ? 'unset' : 'set',
      casMaxAttempts: candidate.LEDGER_CAS_MAX_ATTEMPTS,
      lockTimeoutMs: candidate.LEDGER_LOCK_TIMEOUT_MS,
    },
    retry: {
      times: candidate.RESERVE_RETRY_TIMES,
      baseMs: candidate.RESERVE_RETRY_BASE_MS,
      jitterMs: candidate.RESERVE_RETRY_JITTER_MS,
    },
    reports: {
      lowStockThreshold: candidate.LOW_STOCK_THRESHOLD,
    },
    seed: {
      file: candidate.SEED_FILE ?? null,
      concurrency: candidate.SEED_CONCURRENCY,
    },
  };
}
