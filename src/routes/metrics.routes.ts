import { Router } from 'express';
import * as client from 'prom-client';

export function createMetricsRouter(): Router {
  const router = Router();

  // Default global registry, so metrics from every module are included
  router.get('/', async (_req, res) => {
    res.set('Content-Type', client.register.contentType);
    res.end(await client.register.metrics());
  });

  return router;
}
