import { Router } from 'express';
import type { HealthController } from '../controllers';

export const createHealthRoutes = (healthController: HealthController): Router => {
  const router = Router();

  /**
   * GET /health
   * Lightweight status, no dependency round trips
   */
  router.get('/', healthController.healthCheck);

  /**
   * GET /health/detailed
   * Pings every dependency; 503 when one is down
   */
  router.get('/detailed', healthController.detailedHealthCheck);

  /**
   * GET /health/live
   * Liveness probe
   */
  router.get('/live', (req, res) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  return router;
};
