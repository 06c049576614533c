/**
 * Health Controller
 *
 * GET /api/v1/health reports cached liveness; `?probe=1` runs the model probes
 * first. 200 when every subsystem is live, 503 otherwise.
 */

import type { NextFunction, Request, Response } from 'express';
import type { HealthMonitor } from '../services/health-monitor.service';
import { ok } from '../utils/api-response';

function wantsProbe(value: unknown): boolean {
  return value === '1' || value === 'true';
}

export class HealthController {
  constructor(private readonly monitor: HealthMonitor) {}

  async getHealth(req: Request, res: Response, next: NextFunction) {
    try {
      const health = wantsProbe(req.query.probe) ? await this.monitor.probe() : this.monitor.getHealth();
      return ok(res, health, health.status === 'healthy' ? 200 : 503);
    } catch (error) {
      return next(error);
    }
  }
}
