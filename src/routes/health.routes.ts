import { Router } from 'express';
import type { CompositionRoot } from '../app/composition-root';
import { HealthController } from '../controllers/health.controller';

export function createHealthRouter(root: CompositionRoot): Router {
  const router = Router();
  const healthController = new HealthController(root.db);

  /**
   * GET /api/v1/health
   * Liveness plus database reachability - no authentication required
   */
  router.get('/', healthController.getHealthCheck.bind(healthController));

  return router;
}
