import { join } from 'path';
import type { ServiceConfig } from '../core/config';
import { ValidationError } from '../core/errors';
import { logger } from '../core/logger';
import { InMemoryStockLedger } from './stock.ledger';
import { PgStockLedger, createPgPool } from './stock.ledger.pg';
import type { StockLedger } from './stock.ledger.types';

export const SNAPSHOT_FILE_NAME = 'stock-entries.json';

/**
 * Build the ledger selected by LEDGER_DRIVER and make it ready for use
 */
export async function createStockLedger(serviceConfig: ServiceConfig): Promise<StockLedger> {
  switch (serviceConfig.LEDGER_DRIVER) {
    case 'memory':
      return new InMemoryStockLedger({ lockTimeoutMs: serviceConfig.LEDGER_LOCK_TIMEOUT_MS });

    case 'file': {
      const snapshotPath = join(serviceConfig.DATA_DIR, SNAPSHOT_FILE_NAME);
      logger.info({ snapshotPath }, 'Using file-backed stock ledger');
      return InMemoryStockLedger.open({
        lockTimeoutMs: serviceConfig.LEDGER_LOCK_TIMEOUT_MS,
        snapshotPath,
      });
    }

    case 'postgres': {
      if (serviceConfig.DATABASE_URL === undefined) {
        throw ValidationError.missingConfig('DATABASE_URL');
      }
      const pool = createPgPool({
        connectionString: serviceConfig.DATABASE_URL,
        max: serviceConfig.DB_POOL_MAX,
      });
      const ledger = new PgStockLedger(pool, {
        strategy: serviceConfig.LEDGER_STRATEGY,
        casMaxAttempts: serviceConfig.LEDGER_CAS_MAX_ATTEMPTS,
      });
      await ledger.ensureSchema();
      return ledger;
    }
  }
}
