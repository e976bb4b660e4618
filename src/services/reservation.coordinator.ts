import type { OrderId, ReservationLine } from '../core/types';
import { LineQuantitySchema, MAX_QUANTITY, OrderIdSchema, ProductIdSchema, compareProductIds } from '../core/types';
import { StorageUnavailableError, isTransientStorageError, type StorageError } from '../core/errors';
import { config } from '../core/config';
import { logger } from '../core/logger';
import type { StockLedger, StockLedgerOperations } from '../repositories/stock.ledger.types';
import { getDelayWithJitter, sleep } from '../utils/backoff';
import {
  incrementReservationAttempts,
  incrementReservationRetries,
  incrementRestores,
  incrementRollbacks,
  metrics,
} from '../utils/metrics';
import type {
  ReservationIssue,
  ReservationResult,
  ReservationService,
  RetryPolicy,
  TransientFailureResult,
} from './reservation.types';

export function defaultRetryPolicy(): RetryPolicy {
  return {
    retryTimes: config.RESERVE_RETRY_TIMES,
    baseMs: config.RESERVE_RETRY_BASE_MS,
    jitterMs: config.RESERVE_RETRY_JITTER_MS,
  };
}

/**
 * Problems that make a reservation request invalid on its face.
 * Unknown products are checked separately against the ledger.
 */
export function validateReservation(orderId: OrderId, lines: readonly ReservationLine[]): ReservationIssue[] {
  const issues: ReservationIssue[] = [];

  if (!OrderIdSchema.safeParse(orderId).success) {
    issues.push({
      code: 'INVALID_ORDER_ID',
      field: 'orderId',
      message: 'Order id must be 1-64 characters long',
      value: orderId,
    });
  }

  if (lines.length === 0) {
    issues.push({ code: 'EMPTY_ORDER', field: 'lines', message: 'An order needs at least one line' });
  }

  lines.forEach((line, index) => {
    if (!ProductIdSchema.safeParse(line.productId).success) {
      issues.push({
        code: 'INVALID_PRODUCT_ID',
        field: `lines[${index}].productId`,
        message: 'Product id must be 1-64 characters long',
        value: line.productId,
      });
    }
    if (!LineQuantitySchema.safeParse(line.quantity).success) {
      issues.push({
        code: 'INVALID_QUANTITY',
        field: `lines[${index}].quantity`,
        message: `Quantity must be a positive integer no greater than ${MAX_QUANTITY}`,
        productId: line.productId,
        value: line.quantity,
      });
    }
  });

  if (issues.length === 0) {
    for (const line of planReservation(lines)) {
      if (line.quantity > MAX_QUANTITY) {
        issues.push({
          code: 'INVALID_QUANTITY',
          field: 'lines',
          message: `Combined quantity for product ${line.productId} exceeds ${MAX_QUANTITY}`,
          productId: line.productId,
          value: line.quantity,
        });
      }
    }
  }

  return issues;
}

/**
 * Merge lines for the same product and sort by product id, so every
 * reservation takes row locks in the same order.
 */
export function planReservation(lines: readonly ReservationLine[]): ReservationLine[] {
  const totals = new Map<string, number>();
  for (const line of lines) {
    totals.set(line.productId, (totals.get(line.productId) ?? 0) + line.quantity);
  }
  return [...totals.entries()]
    .map(([productId, quantity]) => ({ productId, quantity }))
    .sort((a, b) => compareProductIds(a.productId, b.productId));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reserves every line of an order or none of them.
 *
 * Each attempt runs inside one ledger transaction: lines are decremented in
 * product id order, and on the first line that cannot be covered the lines
 * already taken are restored in reverse before the transaction commits.
 * Transient storage faults abort the attempt and the whole reservation is
 * retried with backoff. Every outcome is returned as a value.
 */
export class ReservationCoordinator implements ReservationService {
  constructor(
    private readonly ledger: StockLedger,
    private readonly retryPolicy: RetryPolicy = defaultRetryPolicy()
  ) {}

  async reserve(orderId: OrderId, lines: readonly ReservationLine[]): Promise<ReservationResult> {
    incrementReservationAttempts();

    const issues = validateReservation(orderId, lines);
    if (issues.length > 0) {
      return this.record({ status: 'VALIDATION_FAILED', orderId, issues });
    }

    const plan = planReservation(lines);
    const maxAttempts = this.retryPolicy.retryTimes + 1;
    let lastError: StorageError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return this.record(await this.attempt(orderId, plan, attempt));
      } catch (error) {
        if (!isTransientStorageError(error)) {
          logger.error({ error, orderId, attempt }, 'Reservation aborted by a storage fault');
          return this.record({
            status: 'TRANSIENT_FAILURE',
            orderId,
            reason: 'STORAGE_FAULT',
            message: describeError(error),
            attempts: attempt,
          });
        }

        lastError = error;
        if (attempt < maxAttempts) {
          const delay = getDelayWithJitter(attempt, this.retryPolicy);
          incrementReservationRetries();
          logger.warn({ orderId, attempt, delay, error }, 'Transient storage fault, retrying reservation');
          await sleep(delay);
        }
      }
    }

    const failure: TransientFailureResult = {
      status: 'TRANSIENT_FAILURE',
      orderId,
      reason: lastError instanceof StorageUnavailableError ? 'STORAGE_UNAVAILABLE' : 'CONTENTION',
      message: lastError === undefined ? 'Retry budget exhausted' : lastError.message,
      attempts: maxAttempts,
    };
    return this.record(failure);
  }

  private async attempt(
    orderId: OrderId,
    plan: readonly ReservationLine[],
    attempt: number
  ): Promise<ReservationResult> {
    const missing = await this.ledger.findMissing(plan.map((line) => line.productId));
    if (missing.length > 0) {
      return {
        status: 'VALIDATION_FAILED',
        orderId,
        issues: missing.map((productId): ReservationIssue => ({
          code: 'UNKNOWN_PRODUCT',
          field: 'productId',
          message: `No stock entry exists for product ${productId}`,
          productId,
        })),
      };
    }

    return this.ledger.transaction(async (tx): Promise<ReservationResult> => {
      const decremented: ReservationLine[] = [];

      for (const line of plan) {
        if (await tx.tryDecrement(line.productId, line.quantity)) {
          decremented.push(line);
          continue;
        }

        await this.rollback(tx, orderId, decremented);
        return {
          status: 'INSUFFICIENT_STOCK',
          orderId,
          productId: line.productId,
          requested: line.quantity,
          attempts: attempt,
        };
      }

      return { status: 'RESERVED', orderId, lines: [...plan], attempts: attempt };
    });
  }

  // Restore in reverse order of decrement, once per line
  private async rollback(
    tx: StockLedgerOperations,
    orderId: OrderId,
    decremented: readonly ReservationLine[]
  ): Promise<void> {
    if (decremented.length === 0) {
      return;
    }
    for (const line of [...decremented].reverse()) {
      await tx.restore(line.productId, line.quantity);
    }
    incrementRollbacks();
    incrementRestores(decremented.length);
    logger.debug({ orderId, restored: decremented.length }, 'Partial reservation rolled back');
  }

  private record(result: ReservationResult): ReservationResult {
    switch (result.status) {
      case 'RESERVED':
        metrics.increment('reservationsReserved');
        logger.info({ orderId: result.orderId, lines: result.lines.length, attempts: result.attempts }, 'Stock reserved');
        break;
      case 'INSUFFICIENT_STOCK':
        metrics.increment('reservationsInsufficientStock');
        logger.info(
          { orderId: result.orderId, productId: result.productId, requested: result.requested },
          'Insufficient stock for reservation'
        );
        break;
      case 'TRANSIENT_FAILURE':
        metrics.increment('reservationsTransientFailure');
        logger.warn(
          { orderId: result.orderId, reason: result.reason, attempts: result.attempts },
          'Reservation gave up after transient faults'
        );
        break;
      case 'VALIDATION_FAILED':
        metrics.increment('reservationsValidationFailed');
        logger.info({ orderId: result.orderId, issues: result.issues }, 'Reservation rejected by validation');
        break;
    }
    return result;
  }
}
