import { SeedFileSchema } from '../core/types';
import { ConflictError, ValidationError } from '../core/errors';
import { config } from '../core/config';
import { logger } from '../core/logger';
import type { StockLedger } from '../repositories/stock.ledger.types';
import { readJsonFile } from '../utils/fsSafe';
import { mapLimit } from '../utils/mapLimit';

export interface SeedSummary {
  created: number;
  skipped: number;
}

/**
 * Create the stock entries listed in a seed file that the ledger does not
 * hold yet. Existing entries keep their current level.
 */
export async function seedStock(
  ledger: StockLedger,
  filePath: string,
  concurrency: number = config.SEED_CONCURRENCY
): Promise<SeedSummary> {
  const parsed = SeedFileSchema.safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    throw new ValidationError(`Seed file ${filePath} is malformed`, 'seedFile', filePath, {
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const missing = new Set(await ledger.findMissing(parsed.data.map((entry) => entry.productId)));
  const toCreate = parsed.data.filter((entry) => missing.delete(entry.productId));

  const outcomes = await mapLimit(toCreate, concurrency, async (entry) => {
    try {
      await ledger.create(entry.productId, entry.availableQuantity);
      return true;
    } catch (error) {
      // Another writer created it first
      if (error instanceof ConflictError) {
        return false;
      }
      throw error;
    }
  });

  const created = outcomes.filter(Boolean).length;
  const summary = { created, skipped: parsed.data.length - created };
  logger.info({ filePath, ...summary }, 'Stock seeding completed');
  return summary;
}
