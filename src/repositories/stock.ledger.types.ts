import type { ProductId, Quantity, StockEntry } from '../core/types';

/**
 * The two mutation primitives of the ledger. Available both on the ledger
 * (each call is its own transaction) and inside `transaction()`.
 */
export interface StockLedgerOperations {
  /**
   * Atomically subtract `quantity` where the available quantity covers it.
   * Resolves `false` for insufficient stock or an unknown product; rejects
   * only with a StorageError.
   */
  tryDecrement(productId: ProductId, quantity: Quantity): Promise<boolean>;

  /**
   * Unconditionally add `quantity` back. Not idempotent: call at most once
   * per successful decrement. Rejects with NotFoundError for unknown products.
   */
  restore(productId: ProductId, quantity: Quantity): Promise<void>;
}

export interface StockLedger extends StockLedgerOperations {
  readonly driver: string;

  /**
   * Run `work` in one transaction. Its writes become visible together when it
   * resolves and are discarded when it rejects.
   */
  transaction<T>(work: (tx: StockLedgerOperations) => Promise<T>): Promise<T>;

  get(productId: ProductId): Promise<StockEntry | null>;
  list(): Promise<StockEntry[]>;

  /** Product ids from `productIds` that have no stock entry. */
  findMissing(productIds: readonly ProductId[]): Promise<ProductId[]>;

  /** Introduce a product; ConflictError when it already has an entry. */
  create(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry>;

  /** Administrative override of the available quantity. */
  setLevel(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry>;

  ping(): Promise<void>;
  close(): Promise<void>;
}
