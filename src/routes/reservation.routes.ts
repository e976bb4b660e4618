import { Router, type NextFunction, type Request, type Response } from 'express';
import { logger } from '../core/logger';
import { ReserveRequestSchema } from '../core/types';
import { validateBody } from '../middleware/validate';
import type { ReservationService } from '../services/reservation.types';
import { sendReservationResult } from './reservation.response';

export function createReservationRoutes(reservations: ReservationService): Router {
  const router = Router();

  // POST / - reserve every line of an order or none of them
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { orderId, lines } = validateBody(ReserveRequestSchema, req);
      logger.info({ req: { id: req.id }, orderId, lines: lines.length }, 'Reservation requested');

      const result = await reservations.reserve(orderId, lines);
      sendReservationResult(res, result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
