import express, { type Express, type Request, type Response } from 'express';
import { errorHandler } from './middleware/error-handler';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { createHealthRoutes } from './routes/health.routes';
import { metricsRoutes } from './routes/metrics.routes';
import { createOrderRoutes } from './routes/order.routes';
import { createReservationRoutes } from './routes/reservation.routes';
import { createStockRoutes } from './routes/stock.routes';
import { OrderRepository } from './repositories/order.repo';
import type { StockLedger } from './repositories/stock.ledger.types';
import { InventoryService } from './services/inventory.service';
import { OrderPlacementService } from './services/order.placement';
import { ReservationCoordinator } from './services/reservation.coordinator';
import type { ReservationService, RetryPolicy } from './services/reservation.types';

export interface AppServices {
  ledger: StockLedger;
  reservations: ReservationService;
  inventory: InventoryService;
  orders: OrderPlacementService;
}

/**
 * Wire the services around one ledger
 */
export function createServices(ledger: StockLedger, retryPolicy?: RetryPolicy): AppServices {
  const reservations = new ReservationCoordinator(ledger, retryPolicy);
  return {
    ledger,
    reservations,
    inventory: new InventoryService(ledger),
    orders: new OrderPlacementService(reservations, ledger, new OrderRepository()),
  };
}

export function createApp(services: AppServices): Express {
  const app = express();

  // Middleware
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json());

  // Routes
  app.use('/api/health', createHealthRoutes(services.ledger));
  app.use('/api/metrics', metricsRoutes);
  app.use('/api/stock', createStockRoutes(services.inventory));
  app.use('/api/reservations', createReservationRoutes(services.reservations));
  app.use('/api/orders', createOrderRoutes(services.orders));

  // 404 handler for unknown routes
  app.use('*', (_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        name: 'NotFoundError',
        message: 'Route not found',
        code: 'NOT_FOUND',
        statusCode: 404,
        timestamp: new Date().toISOString(),
      },
    });
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
