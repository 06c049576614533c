import express from 'express';
import cors, { type CorsOptions } from 'cors';
import helmet from 'helmet';
import type { CompositionRoot } from './app/composition-root';
import { traceIdMiddleware } from './middleware/trace-id.middleware';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
import { httpMetricsMiddleware } from './middleware/metrics.middleware';
import { createModelRouteLimiter } from './middleware/rate-limit.middleware';
import { errorHandler, notFoundHandler } from './middleware/error-handler.middleware';
import { createInterventionRouter } from './routes/intervention.routes';
import { createCurriculumRouter } from './routes/curriculum.routes';
import { createHealthRouter } from './routes/health.routes';
import { createMetricsRouter } from './routes/metrics.routes';
import { logger } from './utils/logger';

function corsOptions(allowed: string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Same-origin and server-to-server calls carry no Origin header
      if (!origin || allowed.includes(origin)) return callback(null, true);
      logger.warn('cors:origin-rejected', { origin });
      return callback(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Trace-Id'],
    exposedHeaders: ['X-Trace-Id'],
  };
}

export function createApp(root: CompositionRoot): express.Express {
  const app = express();
  const config = root.getConfig();

  // Correlation: assign/propagate X-Trace-Id for every request
  app.use(traceIdMiddleware);

  // Structured request logging (start/finish with correlation IDs)
  app.use(requestLoggingMiddleware);

  app.use(cors(corsOptions(config.corsOrigins)));
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: 'same-origin' },
    referrerPolicy: { policy: 'no-referrer' },
  }));

  app.use(express.json({ limit: '1mb' }));

  // HTTP request metrics (after security middleware, before routes)
  app.use(httpMetricsMiddleware);

  app.use('/metrics', createMetricsRouter());
  app.use('/api/v1/health', createHealthRouter(root.getHealthMonitor()));
  // One budget shared by every route that reaches the model
  const modelRouteLimiter = createModelRouteLimiter(config.rateLimit);
  app.use('/api/v1/interventions', modelRouteLimiter, createInterventionRouter(root.getInterventionService()));
  app.use('/api/v1/curriculum', modelRouteLimiter, createCurriculumRouter(root.getCurriculumService()));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
