import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ReservationCoordinator } from '../../src/services/reservation.coordinator';
import { FAST_RETRY, ledgerWith, levelsOf } from '../helpers/ledger-fixtures';

const PRODUCTS = ['A', 'B', 'C'] as const;

const lineArb = fc.record({
  productId: fc.constantFrom(...PRODUCTS),
  quantity: fc.integer({ min: 1, max: 5 }),
});

describe('Reservation properties', () => {
  it('should never sell more than the stock under concurrent single-line orders', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 20 }),
        fc.array(fc.integer({ min: 1, max: 5 }), { minLength: 1, maxLength: 12 }),
        async (stock, quantities) => {
          const ledger = await ledgerWith({ A: stock });
          const coordinator = new ReservationCoordinator(ledger, FAST_RETRY);

          const results = await Promise.all(
            quantities.map((quantity, index) => coordinator.reserve(`o${index}`, [{ productId: 'A', quantity }]))
          );

          const reserved = results.reduce(
            (sum, result, index) => (result.status === 'RESERVED' ? sum + (quantities[index] ?? 0) : sum),
            0
          );
          const final = (await levelsOf(ledger))['A'] ?? -1;

          expect(final).toBeGreaterThanOrEqual(0);
          expect(reserved).toBeLessThanOrEqual(stock);
          expect(final).toBe(stock - reserved);
          expect(results.every((result) => result.status === 'RESERVED' || result.status === 'INSUFFICIENT_STOCK')).toBe(true);
        }
      ),
      { numRuns: 50 }
    );
  });

  it('should apply each multi-line order entirely or not at all', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.tuple(fc.integer({ min: 0, max: 12 }), fc.integer({ min: 0, max: 12 }), fc.integer({ min: 0, max: 12 })),
        fc.array(fc.array(lineArb, { minLength: 1, maxLength: 4 }), { minLength: 1, maxLength: 8 }),
        async ([a, b, c], orders) => {
          const initial: Record<string, number> = { A: a, B: b, C: c };
          const ledger = await ledgerWith(initial);
          const coordinator = new ReservationCoordinator(ledger, FAST_RETRY);

          const results = await Promise.all(orders.map((lines, index) => coordinator.reserve(`o${index}`, lines)));

          const taken: Record<string, number> = { A: 0, B: 0, C: 0 };
          for (const result of results) {
            if (result.status === 'RESERVED') {
              for (const line of result.lines) {
                taken[line.productId] = (taken[line.productId] ?? 0) + line.quantity;
              }
            }
          }

          const final = await levelsOf(ledger);
          for (const productId of PRODUCTS) {
            expect(final[productId]).toBe((initial[productId] ?? 0) - (taken[productId] ?? 0));
          }
        }
      ),
      { numRuns: 50 }
    );
  });
});
