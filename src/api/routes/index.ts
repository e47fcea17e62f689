import { Router } from 'express';
import { createContactRoutes, type ContactRoutesOptions } from './contacts';
import { createHealthRoutes } from './health';
import type { HealthController } from '../controllers';

export interface RoutesOptions extends ContactRoutesOptions {
  healthController: HealthController;
}

/**
 * Mount route modules
 */
export const createRoutes = (options: RoutesOptions): Router => {
  const router = Router();

  router.use('/contacts', createContactRoutes(options));
  router.use('/health', createHealthRoutes(options.healthController));

  return router;
};
