import { LineQuantitySchema, MAX_QUANTITY, QuantitySchema, type ProductId, type Quantity } from '../core/types';
import { ValidationError } from '../core/errors';

// Argument checks shared by every ledger driver

export function assertLineQuantity(quantity: Quantity): void {
  if (!LineQuantitySchema.safeParse(quantity).success) {
    throw ValidationError.invalidLineQuantity(quantity);
  }
}

export function assertStockLevel(quantity: Quantity): void {
  if (!QuantitySchema.safeParse(quantity).success) {
    throw ValidationError.invalidQuantity(quantity);
  }
}

/** Level after adding `quantity` back, rejected when the column cannot hold it. */
export function restoredLevel(productId: ProductId, current: Quantity, quantity: Quantity): Quantity {
  const next = current + quantity;
  if (next > MAX_QUANTITY) {
    throw ValidationError.stockLevelOverflow(productId, next);
  }
  return next;
}
