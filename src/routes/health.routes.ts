import { Router } from 'express';
import { HealthController } from '../controllers';

export function createHealthRoutes(controller: HealthController): Router {
  const router = Router();

  /**
   * GET /health
   * Poller state for container health checks
   */
  router.get('/', controller.health.bind(controller));

  return router;
}
