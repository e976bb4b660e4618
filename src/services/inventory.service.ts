import type { ProductId, Quantity, StockEntry } from '../core/types';
import { compareProductIds } from '../core/types';
import { NotFoundError } from '../core/errors';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { assertLineQuantity } from '../repositories/stock.ledger.guards';
import type { StockLedger } from '../repositories/stock.ledger.types';

export interface StockAvailability {
  productId: ProductId;
  requested: Quantity;
  availableQuantity: Quantity;
  available: boolean;
}

export interface InventoryStatistics {
  totalProducts: number;
  totalAvailableUnits: number;
  averageStockLevel: number;
  lowStockProducts: number;
  outOfStockProducts: number;
  timestamp: string;
}

function byQuantityThenId(a: StockEntry, b: StockEntry): number {
  return a.availableQuantity - b.availableQuantity || compareProductIds(a.productId, b.productId);
}

/**
 * Read-side queries and administrative writes over the stock ledger.
 * Availability answers are informational only; reservations always go
 * through the ledger's conditional decrement.
 */
export class InventoryService {
  constructor(
    private readonly ledger: StockLedger,
    private readonly lowStockThreshold: number = config.LOW_STOCK_THRESHOLD
  ) {}

  async getStock(productId: ProductId): Promise<StockEntry> {
    const entry = await this.ledger.get(productId);
    if (entry === null) {
      throw NotFoundError.stockEntry(productId);
    }
    return entry;
  }

  async listStock(): Promise<StockEntry[]> {
    return this.ledger.list();
  }

  async checkAvailability(productId: ProductId, quantity: Quantity): Promise<StockAvailability> {
    assertLineQuantity(quantity);
    const entry = await this.getStock(productId);
    return {
      productId,
      requested: quantity,
      availableQuantity: entry.availableQuantity,
      available: entry.availableQuantity >= quantity,
    };
  }

  async getLowStock(threshold: number = this.lowStockThreshold): Promise<StockEntry[]> {
    const entries = await this.ledger.list();
    const low = entries.filter((entry) => entry.availableQuantity <= threshold).sort(byQuantityThenId);
    logger.debug({ threshold, count: low.length }, 'Low stock report built');
    return low;
  }

  async getOutOfStock(): Promise<StockEntry[]> {
    const entries = await this.ledger.list();
    return entries.filter((entry) => entry.availableQuantity === 0);
  }

  async getStatistics(): Promise<InventoryStatistics> {
    const entries = await this.ledger.list();
    const totalAvailableUnits = entries.reduce((sum, entry) => sum + entry.availableQuantity, 0);

    return {
      totalProducts: entries.length,
      totalAvailableUnits,
      averageStockLevel: entries.length === 0 ? 0 : totalAvailableUnits / entries.length,
      lowStockProducts: entries.filter((entry) => entry.availableQuantity <= this.lowStockThreshold).length,
      outOfStockProducts: entries.filter((entry) => entry.availableQuantity === 0).length,
      timestamp: new Date().toISOString(),
    };
  }

  async createStockEntry(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    return this.ledger.create(productId, availableQuantity);
  }

  async setStockLevel(productId: ProductId, availableQuantity: Quantity): Promise<StockEntry> {
    return this.ledger.setLevel(productId, availableQuantity);
  }
}
