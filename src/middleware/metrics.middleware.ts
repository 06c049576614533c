import { NextFunction, Request, Response } from 'express';
import * as client from 'prom-client';

// Lazily register metrics once per process
const httpRequestCounter = (() => {
  const existing = client.register.getSingleMetric('http_requests_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status']
  });
})();

const httpRequestDuration = (() => {
  const existing = client.register.getSingleMetric('http_request_duration_seconds') as client.Histogram<string> | undefined;
  if (existing) return existing;
  return new client.Histogram({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status'],
    // model calls dominate; buckets reach past the default attempt timeout
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60]
  });
})();

function routeLabel(req: Request): string {
  // Matched route path keeps label cardinality bounded
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return 'unmatched';
}

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction) {
  const method = req.method;
  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const status = String(res.statusCode);
    const route = routeLabel(req);
    httpRequestCounter.inc({ method, route, status });
    endTimer({ method, route, status });
  });

  next();
}
