import { describe, it, expect } from 'vitest';
import { NotFoundError, ValidationError } from '../../src/core/errors';
import { InventoryService } from '../../src/services/inventory.service';
import { ledgerWith } from '../helpers/ledger-fixtures';

describe('InventoryService', () => {
  it('should return a stock entry or raise NotFoundError', async () => {
    const service = new InventoryService(await ledgerWith({ A: 4 }));

    await expect(service.getStock('A')).resolves.toMatchObject({ productId: 'A', availableQuantity: 4, version: 1 });
    await expect(service.getStock('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });

  describe('checkAvailability', () => {
    it('should compare the request with committed stock', async () => {
      const service = new InventoryService(await ledgerWith({ A: 4 }));

      await expect(service.checkAvailability('A', 4)).resolves.toEqual({
        productId: 'A',
        requested: 4,
        availableQuantity: 4,
        available: true,
      });
      await expect(service.checkAvailability('A', 5)).resolves.toMatchObject({ available: false });
    });

    it('should reject a non-positive quantity', async () => {
      const service = new InventoryService(await ledgerWith({ A: 4 }));
      await expect(service.checkAvailability('A', 0)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.checkAvailability('A', 2_147_483_648)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should not change the stock', async () => {
      const ledger = await ledgerWith({ A: 4 });
      await new InventoryService(ledger).checkAvailability('A', 2);
      expect((await ledger.get('A'))?.version).toBe(1);
    });
  });

  describe('reports', () => {
    it('should list low stock at or below the threshold, lowest first', async () => {
      const service = new InventoryService(await ledgerWith({ D: 3, A: 10, B: 3, C: 11, E: 0 }), 10);

      const low = await service.getLowStock();

      expect(low.map((entry) => [entry.productId, entry.availableQuantity])).toEqual([
        ['E', 0],
        ['B', 3],
        ['D', 3],
        ['A', 10],
      ]);
    });

    it('should honour an explicit threshold', async () => {
      const service = new InventoryService(await ledgerWith({ A: 10, B: 3 }), 10);
      const low = await service.getLowStock(3);
      expect(low.map((entry) => entry.productId)).toEqual(['B']);
    });

    it('should list products with no stock', async () => {
      const service = new InventoryService(await ledgerWith({ A: 0, B: 1, C: 0 }));
      const empty = await service.getOutOfStock();
      expect(empty.map((entry) => entry.productId)).toEqual(['A', 'C']);
    });

    it('should summarize the catalog', async () => {
      const service = new InventoryService(await ledgerWith({ A: 0, B: 5, C: 25 }), 10);

      const stats = await service.getStatistics();

      expect(stats).toEqual({
        totalProducts: 3,
        totalAvailableUnits: 30,
        averageStockLevel: 10,
        lowStockProducts: 2,
        outOfStockProducts: 1,
        timestamp: stats.timestamp,
      });
      expect(Number.isNaN(Date.parse(stats.timestamp))).toBe(false);
    });

    it('should report an average of zero for an empty catalog', async () => {
      const stats = await new InventoryService(await ledgerWith({})).getStatistics();
      expect(stats.averageStockLevel).toBe(0);
      expect(stats.totalProducts).toBe(0);
    });
  });

  it('should create entries and set levels through the ledger', async () => {
    const ledger = await ledgerWith({});
    const service = new InventoryService(ledger);

    await service.createStockEntry('A', 2);
    const updated = await service.setStockLevel('A', 9);

    expect(updated).toMatchObject({ availableQuantity: 9, version: 2 });
    expect((await ledger.get('A'))?.availableQuantity).toBe(9);
  });
});
