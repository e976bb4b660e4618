export type LedgerDriver = 'memory' | 'file' | 'postgres';
export type StockUpdateStrategy = 'conditional' | 'optimistic';

export interface ServiceConfig {
  // Server
  readonly PORT: number;

  // Logging
  readonly LOG_LEVEL: string;

  // Ledger storage
  readonly LEDGER_DRIVER: LedgerDriver;
  readonly DATA_DIR: string;
  readonly DATABASE_URL: string | undefined;
  readonly DB_POOL_MAX: number;
  readonly LEDGER_STRATEGY: StockUpdateStrategy;
  readonly LEDGER_CAS_MAX_ATTEMPTS: number;
  readonly LEDGER_LOCK_TIMEOUT_MS: number;

  // Reservation retry policy
  readonly RESERVE_RETRY_TIMES: number;
  readonly RESERVE_RETRY_BASE_MS: number;
  readonly RESERVE_RETRY_JITTER_MS: number;

  // Snapshot file retry policy
  readonly FS_RETRY_TIMES: number;
  readonly FS_RETRY_BASE_MS: number;

  // Reports
  readonly LOW_STOCK_THRESHOLD: number;

  // Catalog seeding
  readonly SEED_FILE: string | undefined;
  readonly SEED_CONCURRENCY: number;
}
