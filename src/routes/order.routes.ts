import { Router, type NextFunction, type Request, type Response } from 'express';
import { logger } from '../core/logger';
import { OrderParamsSchema, PlaceOrderRequestSchema } from '../core/types';
import { validateBody, validateParams } from '../middleware/validate';
import type { OrderPlacementService } from '../services/order.placement';
import { sendReservationResult } from './reservation.response';

export function createOrderRoutes(orders: OrderPlacementService): Router {
  const router = Router();

  // POST / - place an order; replays return the stored order
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateBody(PlaceOrderRequestSchema, req);
      logger.info({ req: { id: req.id }, orderId: body.orderId, lines: body.lines.length }, 'Order placement requested');

      const outcome = await orders.placeOrder(body);
      switch (outcome.kind) {
        case 'created':
          res.status(201).json({ success: true, data: outcome.order });
          return;
        case 'replayed':
          res.json({ success: true, data: outcome.order, message: 'Order already placed' });
          return;
        case 'rejected':
          sendReservationResult(res, outcome.reservation);
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: await orders.listOrders() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:orderId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { orderId } = validateParams(OrderParamsSchema, req);
      res.json({ success: true, data: await orders.getOrder(orderId) });
    } catch (error) {
      next(error);
    }
  });

  // POST /:orderId/cancel - restores stock the first time only
  router.post('/:orderId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { orderId } = validateParams(OrderParamsSchema, req);
      logger.info({ req: { id: req.id }, orderId }, 'Order cancellation requested');

      const outcome = await orders.cancelOrder(orderId);
      res.json({
        success: true,
        data: outcome.order,
        message: outcome.restored ? 'Order cancelled' : 'Order was already cancelled',
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
