import { Pool, type PoolConfig } from 'pg';
import { z } from 'zod';
import type { ProductId, Quantity, StockEntry } from '../core/types';
import type { StockUpdateStrategy } from '../core/config';
import {
  ConflictError,
  DomainError,
  NotFoundError,
  StorageUnavailableError,
  TransientConflictError,
  ValidationError,
} from '../core/errors';
import { logger } from '../core/logger';
import { assertLineQuantity, assertStockLevel } from './stock.ledger.guards';
import type { StockLedger, StockLedgerOperations } from './stock.ledger.types';

// Minimal surface of a pg pool, so tests can run against an in-process fake
export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlSession extends SqlClient {
  release(error?: Error): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlSession>;
  end(): Promise<void>;
}

export interface PgStockLedgerOptions {
  strategy?: StockUpdateStrategy;
  /** Compare-and-swap attempts per decrement under the optimistic strategy. */
  casMaxAttempts?: number;
}

// INTEGER columns arrive as numbers, but a driver configured otherwise may hand back strings
const StockRowSchema = z.object({
  product_id: z.string(),
  available_quantity: z.coerce.number().int(),
  version: z.coerce.number().int(),
  updated_at: z.coerce.date(),
});

const VersionedQuantityRowSchema = StockRowSchema.pick({ available_quantity: true, version: true });

const ProductIdRowSchema = StockRowSchema.pick({ product_id: true });

type StockRow = z.infer<typeof StockRowSchema>;

export const STOCK_ENTRIES_DDL = `
CREATE TABLE IF NOT EXISTS stock_entries (
  product_id TEXT PRIMARY KEY,
  available_quantity INTEGER NOT NULL CHECK (available_quantity >= 0),
  version INTEGER NOT NULL DEFAULT 1,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`;

const SQL = {
  decrementIfSufficient:
    'UPDATE stock_entries SET available_quantity = available_quantity - $2, version = version + 1, updated_at = now() ' +
    'WHERE product_id = $1 AND available_quantity >= $2',
  selectVersioned:
    'SELECT available_quantity, version FROM stock_entries WHERE product_id = $1',
  compareAndSet:
    'UPDATE stock_entries SET available_quantity = $2, version = version + 1, updated_at = now() ' +
    'WHERE product_id = $1 AND version = $3',
  restore:
    'UPDATE stock_entries SET available_quantity = available_quantity + $2, version = version + 1, updated_at = now() ' +
    'WHERE product_id = $1',
  insert:
    'INSERT INTO stock_entries (product_id, available_quantity) VALUES ($1, $2) ' +
    'ON CONFLICT (product_id) DO NOTHING ' +
    'RETURNING product_id, available_quantity, version, updated_at',
  setLevel:
    'UPDATE stock_entries SET available_quantity = $2, version = version + 1, updated_at = now() ' +
    'WHERE product_id = $1 RETURNING product_id, available_quantity, version, updated_at',
  selectOne:
    'SELECT product_id, available_quantity, version, updated_at FROM stock_entries WHERE product_id = $1',
  selectAll:
    'SELECT product_id, available_quantity, version, updated_at FROM stock_entries ORDER BY product_id',
  selectExisting:
    'SELECT product_id FROM stock_entries WHERE product_id = ANY($1::text[])',
} as const;

const TRANSIENT_CONFLICT_CODES = new Set(['40001', '40P01', '55P03']);
// numeric_value_out_of_range, check_violation: the statement itself is invalid
const INVALID_VALUE_CODES = new Set(['22003', '23514']);
const UNAVAILABLE_CODES = new Set(['57P01', '57P02', '57P03', '53300', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map driver errors onto the storage error taxonomy. Domain errors pass through,
 * and out-of-range or constraint-violating values become validation errors.
 */
export function translatePgError(error: unknown): unknown {
  if (error instanceof DomainError) {
    return error;
  }

  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code !== undefined && TRANSIENT_CONFLICT_CODES.has(code)) {
    return new TransientConflictError(`Database conflict (${code}): ${message}`, { code }, { cause: error });
  }
  if (code !== undefined && INVALID_VALUE_CODES.has(code)) {
    return new ValidationError(`Stock level rejected by the database (${code}): ${message}`, 'availableQuantity', undefined, {
      code,
    });
  }
  if (code !== undefined && (code.startsWith('08') || UNAVAILABLE_CODES.has(code))) {
    return new StorageUnavailableError(`Database unavailable (${code}): ${message}`, { code }, { cause: error });
  }
  if (error instanceof Error && /connection|terminated|timeout/i.test(error.message)) {
    return new StorageUnavailableError(`Database unavailable: ${message}`, {}, { cause: error });
  }
  return error;
}

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[]): T[] {
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Unexpected stock_entries row: ${parsed.error.errors.map((issue) => issue.message).join(', ')}`);
    }
    return parsed.data;
  });
}

function toEntry(row: StockRow): StockEntry {
  return {
    productId: row.product_id,
    availableQuantity: row.available_quantity,
    version: row.version,
    updatedAt: row.updated_at,
  };
}

function firstEntry(result: SqlResult): StockEntry | undefined {
  const [row] = parseRows(StockRowSchema, result.rows);
  return row === undefined ? undefined : toEntry(row);
}

/**
 * Ledger primitives bound to one connection (a transaction or a single statement).
 */
class PgLedgerOperations implements StockLedgerOperations {
  constructor(
    private readonly client: SqlClient,
    private readonly strategy: StockUpdateStrategy,
    private readonly casMaxAttempts: number
  ) {}

  async tryDecrement(productId: ProductId, quantity: Quantity): Promise<boolean> {
    assertLineQuantity(quantity);
    if (this.strategy === 'optimistic') {
      return this.compareAndSwapDecrement(productId, quantity);
    }
    const result = await this.client.query(SQL.decrementIfSufficient, [productId, quantity]);
    return result.rowCount === 1;
  }

  async restore(productId: ProductId, quantity: Quantity): Promise<void> {
    assertLineQuantity(quantity);
    const result = await this.client.query(SQL.restore, [productId, quantity]);
    if (result.rowCount !== 1) {
      throw NotFoundError.stockEntry(productId);
    }
  }

  // Read the version, then write only if nobody else wrote in between
  private async compareAndSwapDecrement(productId: ProductId, quantity: Quantity): Promise<boolean> {
    let expectedVersion = 0;
    for (let attempt = 1; attempt <= this.casMaxAttempts; attempt++) {
      const current = await this.client.query(SQL.selectVersioned, [productId]);
      const [row] = parseRows(VersionedQuantityRowSchema, current.rows);
      if (row === undefined || row.available_quantity < quantity) {
        return false;
      }

      expectedVersion = row.version;
      const updated = await this.client.query(SQL.compareAndSet, [
        productId,
        row.available_quantity - quantity,
        expectedVersion,
      ]);
      if (updated.rowCount === 1) {
        return true;
      }
      logger.debug({ productId, attempt, expectedVersion }, 'Stock version changed, retrying compare-and-swap');
    }
    throw TransientConflictError.versionMismatch(productId, expectedVersion, this.casMaxAttempts);
  }
}

/**
 * PostgreSQL-backed ledger over the `stock_entries` table.
 */
export class PgStockLedger implements StockLedger {
  readonly driver = 'postgres';
  private readonly strategy: StockUpdateStrategy;
  private readonly casMaxAttempts: number;

  constructor(private readonly pool: SqlPool, options: PgStockLedgerOptions = {}) {
    this.strategy = options.strategy ?? 'conditional';
    this.casMaxAttempts = options.casMaxAttempts ?? 5;
  }

  async ensureSchema(): Promise<void> {
    await this.run(() => this.pool.query(STOCK_ENTRIES_DDL));
    logger.info('stock_entries table ready');
  }

  async tryDecrement(productId: ProductId, quantity: Quantity): Promise<boolean> {
    return this.run(() => this.operations(this.pool).tryDecrement(productId, quantity));
  }

  async restore(productId: ProductId, quantity: Quantity): Promise<void> {
    return this.run(() => this.operations(this.pool).restore(productId, quantity));
  }

  async transaction<T>(work: (tx: StockLedgerOperations) => Promise<T>): Promise<T> {
    const session = await this.run(() => this.pool.connect());
    try {
      await session.query('BEGIN');
      const result = await work(this.operations(session));
      await session.query('COMMIT');
      session.release();
      return result;
    } catch (error) {
      const translated = translatePgError(error);
      try {
        await session.query('ROLLBACK');
        session.release();
      } catch (rollbackError) {
        logger.error({ error: rollbackError }, 'Rollback failed, discarding connection');
        session.release(rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError)));
      }
      throw translated;
    }
  }

  async get(productId: ProductId): Promise<StockEntry | null> {
    const result = await this.run(() => this.pool.query(SQL.selectOne, [productId]));
    return firstEntry(result) ?? null;
  }

  async list(): Promise<StockEntry[]> {
    const result = await this.run(() => this.pool.query(SQL.selectAll));
    return parseRows(StockRowSchema, result.rows).map(toEntry);
  }

  async findMissing(productIds: readonly ProductId[]): Promise<ProductId[]> {
    const unique = [...new Set(productIds)];
    if (unique.length === 0) {
      return [];
    }
    const result = await this.run(() => this.pool.query(SQL.selectExisting, [unique]));
    const existing = new Set(parseRows(ProductIdRowSchema, result.rows).map((row) => row.product_id));
    return unique.filter((productId) => !existing.has(productId));
  }

  async create(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    assertStockLevel(availableQuantity);
    const result = await this.run(() => this.pool.query(SQL.insert, [productId, availableQuantity]));
    const entry = firstEntry(result);
    if (entry === undefined) {
      throw ConflictError.stockEntryExists(productId);
    }
    logger.info({ productId, availableQuantity }, 'Stock entry created');
    return entry;
  }

  async setLevel(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    assertStockLevel(availableQuantity);
    const result = await this.run(() => this.pool.query(SQL.setLevel, [productId, availableQuantity]));
    const entry = firstEntry(result);
    if (entry === undefined) {
      throw NotFoundError.stockEntry(productId);
    }
    logger.info({ productId, availableQuantity, version: entry.version }, 'Stock level set');
    return entry;
  }

  async ping(): Promise<void> {
    await this.run(() => this.pool.query('SELECT 1'));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private operations(client: SqlClient): PgLedgerOperations {
    return new PgLedgerOperations(client, this.strategy, this.casMaxAttempts);
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw translatePgError(error);
    }
  }
}

/**
 * Wrap a pg Pool in the SqlPool surface the ledger uses
 */
export function createPgPool(poolConfig: PoolConfig): SqlPool {
  const pool = new Pool(poolConfig);
  pool.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  return {
    async query(text: string, values?: unknown[]): Promise<SqlResult> {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    async connect(): Promise<SqlSession> {
      const client = await pool.connect();
      return {
        async query(text: string, values?: unknown[]): Promise<SqlResult> {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release(error?: Error): void {
          client.release(error);
        },
      };
    },
    end: () => pool.end(),
  };
}
