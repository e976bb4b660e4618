import type { Response } from 'express';
import { RETRY_AFTER_SECONDS } from '../middleware/error-handler';
import type { ReservationResult } from '../services/reservation.types';

const STATUS_CODES = {
  RESERVED: 200,
  INSUFFICIENT_STOCK: 409,
  TRANSIENT_FAILURE: 503,
  VALIDATION_FAILED: 400,
} as const;

export function reservationStatusCode(result: ReservationResult): number {
  return STATUS_CODES[result.status];
}

function describe(result: ReservationResult): string {
  switch (result.status) {
    case 'RESERVED':
      return `Stock reserved for order ${result.orderId}`;
    case 'INSUFFICIENT_STOCK':
      return `Insufficient stock for product ${result.productId} (requested ${result.requested})`;
    case 'TRANSIENT_FAILURE':
      return result.message;
    case 'VALIDATION_FAILED':
      return 'Reservation request is invalid';
  }
}

/**
 * Write a reservation outcome using the API envelope. Only RESERVED is a
 * success; the other outcomes carry the full result in error details.
 */
export function sendReservationResult(res: Response, result: ReservationResult, successStatus: number = 200): void {
  if (result.status === 'RESERVED') {
    res.status(successStatus).json({ success: true, data: result });
    return;
  }

  const statusCode = reservationStatusCode(result);
  if (result.status === 'TRANSIENT_FAILURE') {
    res.set('Retry-After', String(RETRY_AFTER_SECONDS));
  }
  res.status(statusCode).json({
    success: false,
    error: {
      name: 'ReservationRejected',
      message: describe(result),
      code: result.status,
      statusCode,
      timestamp: new Date().toISOString(),
      details: { result },
    },
  });
}
