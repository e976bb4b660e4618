import { MAX_QUANTITY, type OrderId, type ProductId, type Version } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

// Validation error for invalid input (400)
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }

  static invalidQuantity(quantity: number): ValidationError {
    return new ValidationError(
      `Invalid quantity: ${quantity}. Quantity must be a non-negative integer no greater than ${MAX_QUANTITY}.`,
      'availableQuantity',
      quantity
    );
  }

  static invalidLineQuantity(quantity: number): ValidationError {
    return new ValidationError(
      `Invalid quantity: ${quantity}. Quantity must be a positive integer no greater than ${MAX_QUANTITY}.`,
      'quantity',
      quantity
    );
  }

  static stockLevelOverflow(productId: ProductId, level: number): ValidationError {
    return new ValidationError(
      `Stock level for product ${productId} would reach ${level}, above the maximum of ${MAX_QUANTITY}`,
      'availableQuantity',
      level,
      { productId }
    );
  }

  static missingConfig(key: string): ValidationError {
    return new ValidationError(`Missing required configuration: ${key}`, key);
  }
}

// Not found error for missing resources (404)
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND_ERROR';
  readonly statusCode = 404;

  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly identifier: string,
    details?: Record<string, unknown>
  ) {
    super(message, { resourceType, identifier, ...details });
  }

  static stockEntry(productId: ProductId): NotFoundError {
    return new NotFoundError(
      `Stock entry not found for product ${productId}`,
      'StockEntry',
      productId,
      { productId }
    );
  }

  static order(orderId: OrderId): NotFoundError {
    return new NotFoundError(`Order not found: ${orderId}`, 'Order', orderId, { orderId });
  }
}

// Conflict error for duplicate resources (409)
export class ConflictError extends DomainError {
  readonly code = 'CONFLICT_ERROR';
  readonly statusCode = 409;

  static stockEntryExists(productId: ProductId): ConflictError {
    return new ConflictError(`Stock entry already exists for product ${productId}`, { productId });
  }
}

/**
 * Infrastructure fault raised by a ledger. Insufficient stock is never one of
 * these: it is a plain `false` from `tryDecrement`.
 */
export abstract class StorageError extends DomainError {
  abstract readonly transient: boolean;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, details);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

// Lock wait timeout, serialization failure or version mismatch
export class TransientConflictError extends StorageError {
  readonly code = 'TRANSIENT_CONFLICT_ERROR';
  readonly statusCode = 409;
  readonly transient = true;

  static versionMismatch(productId: ProductId, expectedVersion: Version, attempts: number): TransientConflictError {
    return new TransientConflictError(
      `Version conflict for product ${productId} after ${attempts} attempts (last expected version ${expectedVersion})`,
      { productId, expectedVersion, attempts }
    );
  }

  static lockTimeout(key: string, timeoutMs: number): TransientConflictError {
    return new TransientConflictError(
      `Timed out after ${timeoutMs}ms waiting for row lock on ${key}`,
      { key, timeoutMs }
    );
  }
}

// Storage could not be reached or could not persist
export class StorageUnavailableError extends StorageError {
  readonly code = 'STORAGE_UNAVAILABLE_ERROR';
  readonly statusCode = 503;
  readonly transient = true;
}

export function isTransientStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError && error.transient;
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError) {
    return {
      success: false as const,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
