import { Router } from 'express';
import { logger } from '../core/logger';
import type { StockLedger } from '../repositories/stock.ledger.types';

export function createHealthRoutes(ledger: StockLedger): Router {
  const router = Router();

  // Basic health check
  router.get('/', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Health check requested');
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // Liveness probe - the process is up
  router.get('/liveness', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Liveness check requested');
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Readiness probe - the ledger answers
  router.get('/readiness', async (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Readiness check requested');
    try {
      await ledger.ping();
      res.json({ ready: true, ledger: ledger.driver, timestamp: new Date().toISOString() });
    } catch (error) {
      logger.warn({ error }, 'Readiness check failed');
      res.status(503).json({
        ready: false,
        ledger: ledger.driver,
        error: error instanceof Error ? error.message : 'Ledger unavailable',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
