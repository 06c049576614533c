import { Router } from 'express';
import { HealthController } from '../controllers/health.controller';
import type { HealthMonitor } from '../services/health-monitor.service';

export function createHealthRouter(monitor: HealthMonitor): Router {
  const router = Router();
  const controller = new HealthController(monitor);

  /**
   * GET /api/v1/health
   * Gateway health; pass ?probe=1 to refresh liveness with a live model call
   */
  router.get('/', controller.getHealth.bind(controller));

  return router;
}
