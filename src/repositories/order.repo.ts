import type { OrderId, OrderRecord } from '../core/types';

function copyRecord(record: OrderRecord): OrderRecord {
  return {
    ...record,
    lines: record.lines.map((line) => ({ ...line })),
  };
}

/**
 * Registry of placed orders. Only confirmed reservations are stored here;
 * callers serialize writes per order id.
 */
export class OrderRepository {
  private readonly orders = new Map<OrderId, OrderRecord>();

  async get(orderId: OrderId): Promise<OrderRecord | null> {
    const record = this.orders.get(orderId);
    return record === undefined ? null : copyRecord(record);
  }

  async save(record: OrderRecord): Promise<void> {
    this.orders.set(record.orderId, copyRecord(record));
  }

  // Oldest first
  async list(): Promise<OrderRecord[]> {
    return [...this.orders.values()]
      .map(copyRecord)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async clear(): Promise<void> {
    this.orders.clear();
  }
}
