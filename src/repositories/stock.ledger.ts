import { dirname } from 'path';
import type { ProductId, Quantity, StockEntry, StockSnapshot } from '../core/types';
import { StockSnapshotSchema, compareProductIds } from '../core/types';
import { ConflictError, NotFoundError, StorageUnavailableError } from '../core/errors';
import { logger } from '../core/logger';
import { PerKeyMutex, type Release } from '../utils/perKeyMutex';
import { ensureDir, fileExists, readJsonFile, writeJsonAtomic } from '../utils/fsSafe';
import { assertLineQuantity, assertStockLevel, restoredLevel } from './stock.ledger.guards';
import type { StockLedger, StockLedgerOperations } from './stock.ledger.types';

export interface InMemoryStockLedgerOptions {
  /** How long a transaction waits for another one's row lock. */
  lockTimeoutMs?: number;
  /** When set, every commit is persisted to this JSON file first. */
  snapshotPath?: string;
}

interface RowAccess {
  readCommitted(productId: ProductId): StockEntry | undefined;
  lockRow(productId: ProductId): Promise<Release>;
}

/**
 * One transaction against the in-process ledger. Every row it writes is
 * locked until the transaction finishes, and writes are staged so nothing is
 * visible outside until the ledger commits them.
 */
class InMemoryLedgerTransaction implements StockLedgerOperations {
  private readonly staged = new Map<ProductId, StockEntry>();
  private readonly pendingLocks = new Map<ProductId, Promise<Release>>();
  private readonly heldLocks: Release[] = [];
  private finished = false;

  constructor(private readonly rows: RowAccess) {}

  async tryDecrement(productId: ProductId, quantity: Quantity): Promise<boolean> {
    assertLineQuantity(quantity);
    const current = await this.lockRow(productId);
    if (current === undefined || current.availableQuantity < quantity) {
      return false;
    }
    this.write(current, current.availableQuantity - quantity);
    return true;
  }

  async restore(productId: ProductId, quantity: Quantity): Promise<void> {
    assertLineQuantity(quantity);
    const current = await this.lockRow(productId);
    if (current === undefined) {
      throw NotFoundError.stockEntry(productId);
    }
    this.write(current, restoredLevel(productId, current.availableQuantity, quantity));
  }

  async insert(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    assertStockLevel(availableQuantity);
    const current = await this.lockRow(productId);
    if (current !== undefined) {
      throw ConflictError.stockEntryExists(productId);
    }
    const entry: StockEntry = { productId, availableQuantity, version: 1, updatedAt: new Date() };
    this.staged.set(productId, entry);
    return { ...entry };
  }

  async overwrite(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    assertStockLevel(availableQuantity);
    const current = await this.lockRow(productId);
    if (current === undefined) {
      throw NotFoundError.stockEntry(productId);
    }
    return { ...this.write(current, availableQuantity) };
  }

  /** Staged writes, handed to the ledger on commit. */
  changes(): ReadonlyMap<ProductId, StockEntry> {
    return this.staged;
  }

  finish(): void {
    this.finished = true;
    this.staged.clear();
    for (const release of this.heldLocks.splice(0)) {
      release();
    }
  }

  private async lockRow(productId: ProductId): Promise<StockEntry | undefined> {
    if (this.finished) {
      throw new Error('Ledger transaction already finished');
    }

    let pending = this.pendingLocks.get(productId);
    if (pending === undefined) {
      pending = this.rows.lockRow(productId).then((release) => {
        if (this.finished) {
          release();
        } else {
          this.heldLocks.push(release);
        }
        return release;
      });
      this.pendingLocks.set(productId, pending);
    }
    await pending;

    if (this.finished) {
      throw new Error('Ledger transaction finished while waiting for a row lock');
    }
    return this.staged.get(productId) ?? this.rows.readCommitted(productId);
  }

  private write(current: StockEntry, availableQuantity: Quantity): StockEntry {
    const next: StockEntry = {
      ...current,
      availableQuantity,
      version: current.version + 1,
      updatedAt: new Date(),
    };
    this.staged.set(current.productId, next);
    return next;
  }
}

/**
 * In-process stock ledger.
 *
 * Committed entries live in a map that outside readers see directly. A
 * transaction holds a row lock for each product it touches until it commits or
 * rolls back, the same way a conditional UPDATE holds its row in a database,
 * so concurrent writers to one product queue up while readers never wait.
 * With a snapshot path, each commit is written to disk (temp file + rename)
 * before the in-memory state changes.
 */
export class InMemoryStockLedger implements StockLedger {
  readonly driver: string;
  private readonly entries = new Map<ProductId, StockEntry>();
  private readonly rowLocks = new PerKeyMutex();
  private readonly commitMutex = new PerKeyMutex();
  private readonly lockTimeoutMs: number;
  private readonly snapshotPath: string | undefined;
  private readonly rows: RowAccess;
  private closed = false;

  constructor(options: InMemoryStockLedgerOptions = {}) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    this.snapshotPath = options.snapshotPath;
    this.driver = this.snapshotPath === undefined ? 'memory' : 'file';
    this.rows = {
      readCommitted: (productId) => this.entries.get(productId),
      lockRow: (productId) => this.rowLocks.lock(productId, this.lockTimeoutMs),
    };
  }

  /**
   * Create a ledger and load its snapshot, if it has one
   */
  static async open(options: InMemoryStockLedgerOptions = {}): Promise<InMemoryStockLedger> {
    const ledger = new InMemoryStockLedger(options);
    await ledger.load();
    return ledger;
  }

  async tryDecrement(productId: ProductId, quantity: Quantity): Promise<boolean> {
    return this.runTransaction((tx) => tx.tryDecrement(productId, quantity));
  }

  async restore(productId: ProductId, quantity: Quantity): Promise<void> {
    return this.runTransaction((tx) => tx.restore(productId, quantity));
  }

  async transaction<T>(work: (tx: StockLedgerOperations) => Promise<T>): Promise<T> {
    return this.runTransaction(work);
  }

  async get(productId: ProductId): Promise<StockEntry | null> {
    this.assertOpen();
    const entry = this.entries.get(productId);
    return entry === undefined ? null : { ...entry };
  }

  async list(): Promise<StockEntry[]> {
    this.assertOpen();
    return [...this.entries.values()]
      .map((entry) => ({ ...entry }))
      .sort((a, b) => compareProductIds(a.productId, b.productId));
  }

  async findMissing(productIds: readonly ProductId[]): Promise<ProductId[]> {
    this.assertOpen();
    return [...new Set(productIds)].filter((productId) => !this.entries.has(productId));
  }

  async create(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    const entry = await this.runTransaction((tx) => tx.insert(productId, availableQuantity));
    logger.info({ productId, availableQuantity }, 'Stock entry created');
    return entry;
  }

  async setLevel(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    const entry = await this.runTransaction((tx) => tx.overwrite(productId, availableQuantity));
    logger.info({ productId, availableQuantity, version: entry.version }, 'Stock level set');
    return entry;
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async runTransaction<T>(work: (tx: InMemoryLedgerTransaction) => Promise<T>): Promise<T> {
    this.assertOpen();
    const tx = new InMemoryLedgerTransaction(this.rows);
    try {
      const result = await work(tx);
      await this.commit(tx.changes());
      return result;
    } finally {
      tx.finish();
    }
  }

  private async commit(changes: ReadonlyMap<ProductId, StockEntry>): Promise<void> {
    if (changes.size === 0) {
      return;
    }

    const snapshotPath = this.snapshotPath;
    if (snapshotPath === undefined) {
      this.apply(changes);
      return;
    }

    // Snapshot writes are serialized so each file contains every earlier commit
    await this.commitMutex.acquire('snapshot', async () => {
      const next = new Map(this.entries);
      for (const [productId, entry] of changes) {
        next.set(productId, entry);
      }
      await writeJsonAtomic(snapshotPath, this.toSnapshot(next));
      this.apply(changes);
    });
  }

  private apply(changes: ReadonlyMap<ProductId, StockEntry>): void {
    for (const [productId, entry] of changes) {
      this.entries.set(productId, entry);
    }
    logger.debug({ products: [...changes.keys()] }, 'Ledger transaction committed');
  }

  private async load(): Promise<void> {
    const snapshotPath = this.snapshotPath;
    if (snapshotPath === undefined) {
      return;
    }

    await ensureDir(dirname(snapshotPath));
    if (!(await fileExists(snapshotPath))) {
      logger.info({ snapshotPath }, 'No stock snapshot found, starting empty');
      return;
    }

    const parsed = StockSnapshotSchema.safeParse(await readJsonFile(snapshotPath));
    if (!parsed.success) {
      throw new StorageUnavailableError(`Stock snapshot at ${snapshotPath} is malformed`, {
        snapshotPath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    for (const entry of parsed.data.entries) {
      this.entries.set(entry.productId, entry);
    }
    logger.info({ snapshotPath, entries: parsed.data.entries.length }, 'Stock snapshot loaded');
  }

  private toSnapshot(entries: ReadonlyMap<ProductId, StockEntry>): StockSnapshot {
    return {
      entries: [...entries.values()].sort((a, b) => compareProductIds(a.productId, b.productId)),
      savedAt: new Date().toISOString(),
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageUnavailableError('Stock ledger is closed', { driver: this.driver });
    }
  }
}
