import { Router } from 'express';
import { HealthController } from '../controllers';
import { createHealthRoutes } from './health.routes';

export default function createRoutes(healthController: HealthController): Router {
  const router = Router();

  router.use('/health', createHealthRoutes(healthController));

  return router;
}
