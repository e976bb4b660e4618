import { v4 as uuidv4 } from 'uuid';
import type { OrderId, OrderRecord, ReservationLine } from '../core/types';
import { NotFoundError } from '../core/errors';
import { logger } from '../core/logger';
import type { OrderRepository } from '../repositories/order.repo';
import type { StockLedger } from '../repositories/stock.ledger.types';
import { PerKeyMutex } from '../utils/perKeyMutex';
import { incrementOrdersCancelled, incrementOrdersConfirmed, incrementRestores } from '../utils/metrics';
import type { ReservationResult, ReservationService } from './reservation.types';

export interface PlaceOrderInput {
  orderId?: OrderId;
  lines: readonly ReservationLine[];
}

export type PlaceOrderOutcome =
  | { kind: 'created'; order: OrderRecord; reservation: ReservationResult }
  | { kind: 'replayed'; order: OrderRecord }
  | { kind: 'rejected'; reservation: ReservationResult };

export interface CancelOrderOutcome {
  order: OrderRecord;
  /** False when the order was already cancelled. */
  restored: boolean;
}

/**
 * Turns successful reservations into orders and releases their stock on
 * cancellation. Calls for one order id run one at a time.
 */
export class OrderPlacementService {
  private readonly orderLocks = new PerKeyMutex();

  constructor(
    private readonly reservations: ReservationService,
    private readonly ledger: StockLedger,
    private readonly orders: OrderRepository
  ) {}

  async placeOrder(input: PlaceOrderInput): Promise<PlaceOrderOutcome> {
    const orderId = input.orderId ?? uuidv4();

    return this.orderLocks.acquire(orderId, async (): Promise<PlaceOrderOutcome> => {
      const existing = await this.orders.get(orderId);
      if (existing !== null) {
        logger.info({ orderId, status: existing.status }, 'Order already placed, replaying');
        return { kind: 'replayed', order: existing };
      }

      const reservation = await this.reservations.reserve(orderId, input.lines);
      if (reservation.status !== 'RESERVED') {
        return { kind: 'rejected', reservation };
      }

      const now = new Date();
      const order: OrderRecord = {
        orderId,
        lines: reservation.lines.map((line) => ({ ...line })),
        status: 'CONFIRMED',
        createdAt: now,
        updatedAt: now,
      };
      await this.orders.save(order);
      incrementOrdersConfirmed();
      logger.info({ orderId, lines: order.lines.length }, 'Order confirmed');

      return { kind: 'created', order, reservation };
    });
  }

  async cancelOrder(orderId: OrderId): Promise<CancelOrderOutcome> {
    return this.orderLocks.acquire(orderId, async (): Promise<CancelOrderOutcome> => {
      const order = await this.orders.get(orderId);
      if (order === null) {
        throw NotFoundError.order(orderId);
      }

      if (order.status === 'CANCELLED') {
        logger.info({ orderId }, 'Order already cancelled');
        return { order, restored: false };
      }

      await this.ledger.transaction(async (tx) => {
        for (const line of order.lines) {
          await tx.restore(line.productId, line.quantity);
        }
      });

      const now = new Date();
      const cancelled: OrderRecord = { ...order, status: 'CANCELLED', updatedAt: now, cancelledAt: now };
      await this.orders.save(cancelled);
      incrementRestores(order.lines.length);
      incrementOrdersCancelled();
      logger.info({ orderId, restoredLines: order.lines.length }, 'Order cancelled, stock restored');

      return { order: cancelled, restored: true };
    });
  }

  async getOrder(orderId: OrderId): Promise<OrderRecord> {
    const order = await this.orders.get(orderId);
    if (order === null) {
      throw NotFoundError.order(orderId);
    }
    return order;
  }

  async listOrders(): Promise<OrderRecord[]> {
    return this.orders.list();
  }
}
