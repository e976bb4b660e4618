import type { Request } from 'express';
import { z } from 'zod';
import { ValidationError } from '../core/errors';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function toValidationError(part: string, error: z.ZodError): ValidationError {
  const fieldErrors = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  return new ValidationError(
    `${part} validation failed: ${fieldErrors.map((e) => `${e.field}: ${e.message}`).join(', ')}`,
    undefined,
    undefined,
    { fieldErrors }
  );
}

function parseWith<T>(part: string, schema: Schema<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toValidationError(part, result.error);
  }
  return result.data;
}

export const validateBody = <T>(schema: Schema<T>, req: Request): T => parseWith('Body', schema, req.body);

export const validateParams = <T>(schema: Schema<T>, req: Request): T => parseWith('Params', schema, req.params);

export const validateQuery = <T>(schema: Schema<T>, req: Request): T => parseWith('Query', schema, req.query);
