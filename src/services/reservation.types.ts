import type { OrderId, ProductId, Quantity, ReservationLine } from '../core/types';

export type ReservationIssueCode =
  | 'INVALID_ORDER_ID'
  | 'EMPTY_ORDER'
  | 'INVALID_QUANTITY'
  | 'INVALID_PRODUCT_ID'
  | 'UNKNOWN_PRODUCT';

export interface ReservationIssue {
  code: ReservationIssueCode;
  field: string;
  message: string;
  productId?: ProductId;
  value?: unknown;
}

export type TransientFailureReason = 'CONTENTION' | 'STORAGE_UNAVAILABLE' | 'STORAGE_FAULT';

export interface ReservedResult {
  status: 'RESERVED';
  orderId: OrderId;
  /** Coalesced lines in the order they were decremented. */
  lines: ReservationLine[];
  attempts: number;
}

export interface InsufficientStockResult {
  status: 'INSUFFICIENT_STOCK';
  orderId: OrderId;
  productId: ProductId;
  requested: Quantity;
  attempts: number;
}

export interface TransientFailureResult {
  status: 'TRANSIENT_FAILURE';
  orderId: OrderId;
  reason: TransientFailureReason;
  message: string;
  attempts: number;
}

export interface ValidationFailedResult {
  status: 'VALIDATION_FAILED';
  orderId: OrderId;
  issues: ReservationIssue[];
}

export type ReservationResult =
  | ReservedResult
  | InsufficientStockResult
  | TransientFailureResult
  | ValidationFailedResult;

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retryTimes: number;
  baseMs: number;
  jitterMs: number;
}

export interface ReservationService {
  reserve(orderId: OrderId, lines: readonly ReservationLine[]): Promise<ReservationResult>;
}
