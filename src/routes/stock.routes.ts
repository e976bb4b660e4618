import { Router, type NextFunction, type Request, type Response } from 'express';
import { logger } from '../core/logger';
import {
  AvailabilityQuerySchema,
  CreateStockEntryRequestSchema,
  LowStockQuerySchema,
  ProductParamsSchema,
  SetStockLevelRequestSchema,
} from '../core/types';
import { validateBody, validateParams, validateQuery } from '../middleware/validate';
import type { InventoryService } from '../services/inventory.service';

export function createStockRoutes(inventory: InventoryService): Router {
  const router = Router();

  // Reports come before /:productId so they are not read as product ids
  router.get('/reports/low-stock', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { threshold } = validateQuery(LowStockQuerySchema, req);
      res.json({ success: true, data: await inventory.getLowStock(threshold) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/reports/out-of-stock', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await inventory.getOutOfStock() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/reports/statistics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await inventory.getStatistics() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await inventory.listStock() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { productId, availableQuantity } = validateBody(CreateStockEntryRequestSchema, req);
      logger.info({ req: { id: req.id }, productId, availableQuantity }, 'Create stock entry requested');

      const entry = await inventory.createStockEntry(productId, availableQuantity);
      res.set('ETag', `"${entry.version}"`);
      res.status(201).json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:productId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { productId } = validateParams(ProductParamsSchema, req);
      const entry = await inventory.getStock(productId);

      res.set('ETag', `"${entry.version}"`);
      res.json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:productId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { productId } = validateParams(ProductParamsSchema, req);
      const { availableQuantity } = validateBody(SetStockLevelRequestSchema, req);
      logger.info({ req: { id: req.id }, productId, availableQuantity }, 'Set stock level requested');

      const entry = await inventory.setStockLevel(productId, availableQuantity);
      res.set('ETag', `"${entry.version}"`);
      res.json({ success: true, data: entry });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:productId/availability', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { productId } = validateParams(ProductParamsSchema, req);
      const { quantity } = validateQuery(AvailabilityQuerySchema, req);
      res.json({ success: true, data: await inventory.checkAvailability(productId, quantity) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
