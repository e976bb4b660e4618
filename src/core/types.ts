import { z } from 'zod';

// Base types
export type ProductId = string;
export type OrderId = string;
export type Version = number;
export type Quantity = number;

// Largest value of the INTEGER column that holds stock levels
export const MAX_QUANTITY = 2_147_483_647;

// Zod schemas for validation
export const ProductIdSchema = z.string().min(1).max(64);
export const OrderIdSchema = z.string().min(1).max(64);
export const VersionSchema = z.number().int().positive();
export const QuantitySchema = z.number().int().min(0).max(MAX_QUANTITY);
export const LineQuantitySchema = z.number().int().positive().max(MAX_QUANTITY);

// Stock entry: one row per product, availableQuantity is the only business-mutable field
export interface StockEntry {
  productId: ProductId;
  availableQuantity: Quantity;
  version: Version;
  updatedAt: Date;
}

export const StockEntrySchema = z.object({
  productId: ProductIdSchema,
  availableQuantity: QuantitySchema,
  version: VersionSchema,
  updatedAt: z.coerce.date(),
});

// Snapshot persisted by the file-backed ledger
export const StockSnapshotSchema = z.object({
  entries: z.array(StockEntrySchema),
  savedAt: z.string(),
});

export type StockSnapshot = z.infer<typeof StockSnapshotSchema>;

// Code-unit order, independent of the host locale
export function compareProductIds(a: ProductId, b: ProductId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface ReservationLine {
  productId: ProductId;
  quantity: Quantity;
}

// Quantities are checked by the coordinator so that a zero or negative
// quantity produces a reservation validation result rather than a 400 from zod
export const ReservationLineInputSchema = z.object({
  productId: z.string(),
  quantity: z.number(),
});

// API Request DTOs
export const CreateStockEntryRequestSchema = z.object({
  productId: ProductIdSchema,
  availableQuantity: QuantitySchema,
});

export const SetStockLevelRequestSchema = z.object({
  availableQuantity: QuantitySchema,
});

export const ReserveRequestSchema = z.object({
  orderId: OrderIdSchema,
  lines: z.array(ReservationLineInputSchema),
});

export const PlaceOrderRequestSchema = z.object({
  orderId: OrderIdSchema.optional(),
  lines: z.array(ReservationLineInputSchema),
});

export const ProductParamsSchema = z.object({
  productId: ProductIdSchema,
});

export const OrderParamsSchema = z.object({
  orderId: OrderIdSchema,
});

export const AvailabilityQuerySchema = z.object({
  quantity: z.coerce.number().pipe(LineQuantitySchema),
});

export const LowStockQuerySchema = z.object({
  threshold: z.coerce.number().int().min(0).optional(),
});

export const SeedFileSchema = z.array(CreateStockEntryRequestSchema);

// Order placement
export type OrderStatus = 'CONFIRMED' | 'CANCELLED';

export interface OrderRecord {
  orderId: OrderId;
  lines: ReservationLine[];
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
  cancelledAt?: Date;
}
