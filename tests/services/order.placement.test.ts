import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../../src/core/errors';
import { OrderRepository } from '../../src/repositories/order.repo';
import type { StockLedger } from '../../src/repositories/stock.ledger.types';
import { OrderPlacementService } from '../../src/services/order.placement';
import { ReservationCoordinator } from '../../src/services/reservation.coordinator';
import { FaultInjectingLedger } from '../../src/testing/faults';
import { metrics } from '../../src/utils/metrics';
import { FAST_RETRY, ledgerWith, levelsOf } from '../helpers/ledger-fixtures';

function placementOver(ledger: StockLedger): OrderPlacementService {
  return new OrderPlacementService(new ReservationCoordinator(ledger, FAST_RETRY), ledger, new OrderRepository());
}

describe('OrderPlacementService', () => {
  describe('placeOrder', () => {
    it('should record a confirmed order after a successful reservation', async () => {
      const ledger = await ledgerWith({ A: 5 });
      const service = placementOver(ledger);

      const outcome = await service.placeOrder({ orderId: 'order-1', lines: [{ productId: 'A', quantity: 2 }] });

      expect(outcome.kind).toBe('created');
      const order = await service.getOrder('order-1');
      expect(order.status).toBe('CONFIRMED');
      expect(order.lines).toEqual([{ productId: 'A', quantity: 2 }]);
      expect(await levelsOf(ledger)).toEqual({ A: 3 });
      expect(metrics.getMetrics().ordersConfirmed).toBe(1);
    });

    it('should generate an order id when none is given', async () => {
      const service = placementOver(await ledgerWith({ A: 5 }));

      const outcome = await service.placeOrder({ lines: [{ productId: 'A', quantity: 1 }] });

      expect(outcome.kind).toBe('created');
      const orderId = outcome.kind === 'created' ? outcome.order.orderId : '';
      expect(orderId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it('should not record an order whose reservation failed', async () => {
      const ledger = await ledgerWith({ A: 1 });
      const service = placementOver(ledger);

      const outcome = await service.placeOrder({ orderId: 'order-1', lines: [{ productId: 'A', quantity: 2 }] });

      expect(outcome.kind).toBe('rejected');
      expect(outcome.kind === 'rejected' ? outcome.reservation.status : undefined).toBe('INSUFFICIENT_STOCK');
      await expect(service.getOrder('order-1')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.listOrders()).resolves.toEqual([]);
    });

    it('should replay a placed order without reserving again', async () => {
      const ledger = await ledgerWith({ A: 5 });
      const service = placementOver(ledger);
      const input = { orderId: 'order-1', lines: [{ productId: 'A', quantity: 2 }] };

      const [first, second] = await Promise.all([service.placeOrder(input), service.placeOrder(input)]);

      expect([first.kind, second.kind]).toEqual(['created', 'replayed']);
      expect(await levelsOf(ledger)).toEqual({ A: 3 });
      expect(metrics.getMetrics().reservationAttempts).toBe(1);
    });
  });

  describe('cancelOrder', () => {
    it('should restore the stock of a confirmed order once', async () => {
      const ledger = new FaultInjectingLedger(await ledgerWith({ A: 5, B: 5 }));
      const service = placementOver(ledger);
      await service.placeOrder({
        orderId: 'order-1',
        lines: [
          { productId: 'A', quantity: 2 },
          { productId: 'B', quantity: 1 },
        ],
      });

      const [first, second] = await Promise.all([service.cancelOrder('order-1'), service.cancelOrder('order-1')]);

      expect([first.restored, second.restored]).toEqual([true, false]);
      expect(second.order.status).toBe('CANCELLED');
      expect(second.order.cancelledAt).toBeInstanceOf(Date);
      expect(ledger.callCount('restore')).toBe(2);
      expect(await levelsOf(ledger)).toEqual({ A: 5, B: 5 });
      expect(metrics.getMetrics().ordersCancelled).toBe(1);
    });

    it('should keep the order confirmed when the restore fails', async () => {
      const ledger = new FaultInjectingLedger(await ledgerWith({ A: 5 }));
      const service = placementOver(ledger);
      await service.placeOrder({ orderId: 'order-1', lines: [{ productId: 'A', quantity: 2 }] });
      ledger.failNext('restore', 1, 'unavailable');

      await expect(service.cancelOrder('order-1')).rejects.toThrow('Injected outage at restore');

      expect((await service.getOrder('order-1')).status).toBe('CONFIRMED');
      expect(await levelsOf(ledger)).toEqual({ A: 3 });

      await expect(service.cancelOrder('order-1')).resolves.toMatchObject({ restored: true });
      expect(await levelsOf(ledger)).toEqual({ A: 5 });
    });

    it('should reject unknown orders', async () => {
      const service = placementOver(await ledgerWith({}));
      await expect(service.cancelOrder('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('should list orders oldest first', async () => {
    const service = placementOver(await ledgerWith({ A: 5 }));
    await service.placeOrder({ orderId: 'first', lines: [{ productId: 'A', quantity: 1 }] });
    await new Promise((resolve) => setTimeout(resolve, 5));
    await service.placeOrder({ orderId: 'second', lines: [{ productId: 'A', quantity: 1 }] });

    const orders = await service.listOrders();
    expect(orders.map((order) => order.orderId)).toEqual(['first', 'second']);
  });
});
