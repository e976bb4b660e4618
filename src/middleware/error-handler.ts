import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../core/logger';
import { DomainError, ErrorFactory, isTransientStorageError } from '../core/errors';

export const RETRY_AFTER_SECONDS = 1;

function isJsonSyntaxError(error: Error): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

const handleZodValidationError = (error: z.ZodError, res: Response) => {
  const fieldErrors = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  return res.status(400).json({
    success: false,
    error: {
      name: 'ValidationError',
      message: `Validation failed: ${fieldErrors.map((e) => `${e.field}: ${e.message}`).join(', ')}`,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
      details: { fieldErrors },
    },
  });
};

const handleJsonSyntaxError = (res: Response) => {
  return res.status(400).json({
    success: false,
    error: {
      name: 'ValidationError',
      message: 'Request body is not valid JSON',
      code: 'INVALID_JSON',
      statusCode: 400,
      timestamp: new Date().toISOString(),
    },
  });
};

const handleGenericError = (error: Error, res: Response) => {
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  return res.status(500).json({
    success: false,
    error: {
      name: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500,
      timestamp: new Date().toISOString(),
      ...(isDevelopment && { stack: error.stack }),
    },
  });
};

export const errorHandler = (error: Error, req: Request, res: Response, _next: NextFunction) => {
  if (isJsonSyntaxError(error)) {
    logger.warn({ req: { id: req.id, method: req.method, url: req.url } }, 'Malformed JSON body');
    return handleJsonSyntaxError(res);
  }

  if (error instanceof DomainError) {
    logger.warn({ error, req: { id: req.id, method: req.method, url: req.url } }, 'Request failed');
    if (isTransientStorageError(error)) {
      res.set('Retry-After', String(RETRY_AFTER_SECONDS));
    }
    return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
  }

  if (error instanceof z.ZodError) {
    return handleZodValidationError(error, res);
  }

  logger.error({ error, req: { id: req.id, method: req.method, url: req.url } }, 'Request error');
  return handleGenericError(error, res);
};
