import { Router } from 'express';
import { logger } from '../core/logger';
import { metrics } from '../utils/metrics';

const router = Router();

// GET /metrics - Return current metrics as JSON
router.get('/', (req, res) => {
  logger.debug({ req: { id: req.id } }, 'Metrics requested');

  res.json({
    success: true,
    data: {
      ...metrics.getMetrics(),
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    },
  });
});

// POST /metrics/reset - Reset all metrics (for testing)
router.post('/reset', (req, res) => {
  logger.info({ req: { id: req.id } }, 'Metrics reset requested');

  metrics.reset();

  res.json({
    success: true,
    message: 'Metrics reset successfully',
  });
});

export { router as metricsRoutes };
