import { describe, it, expect } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ValidationError } from '../../src/core/errors';
import { seedStock } from '../../src/ops/seed';
import { ledgerWith, levelsOf } from '../helpers/ledger-fixtures';
import { TestIsolation } from '../helpers/test-isolation';

async function seedFile(name: string, content: unknown): Promise<string> {
  const dir = await TestIsolation.setupTestData(name);
  const filePath = join(dir, 'seed.json');
  await writeFile(filePath, JSON.stringify(content));
  return filePath;
}

describe('seedStock', () => {
  it('should create every listed entry', async () => {
    const ledger = await ledgerWith({});
    const filePath = await seedFile('seed-all', [
      { productId: 'A', availableQuantity: 3 },
      { productId: 'B', availableQuantity: 0 },
    ]);

    await expect(seedStock(ledger, filePath, 2)).resolves.toEqual({ created: 2, skipped: 0 });
    expect(await levelsOf(ledger)).toEqual({ A: 3, B: 0 });
  });

  it('should leave existing entries at their current level', async () => {
    const ledger = await ledgerWith({ A: 1 });
    const filePath = await seedFile('seed-existing', [
      { productId: 'A', availableQuantity: 50 },
      { productId: 'B', availableQuantity: 7 },
      { productId: 'B', availableQuantity: 9 },
    ]);

    await expect(seedStock(ledger, filePath, 4)).resolves.toEqual({ created: 1, skipped: 2 });
    expect(await levelsOf(ledger)).toEqual({ A: 1, B: 7 });
  });

  it('should reject a malformed seed file', async () => {
    const ledger = await ledgerWith({});
    const filePath = await seedFile('seed-bad', [{ productId: 'A', availableQuantity: -1 }]);

    await expect(seedStock(ledger, filePath)).rejects.toBeInstanceOf(ValidationError);
    expect(await levelsOf(ledger)).toEqual({});
  });

  it('should load the bundled catalog', async () => {
    const ledger = await ledgerWith({});

    const summary = await seedStock(ledger, join(__dirname, '..', '..', 'data', 'seed-stock.json'));

    expect(summary).toEqual({ created: 5, skipped: 0 });
    expect((await ledger.get('SKU-DATE'))?.availableQuantity).toBe(8);
  });
});
