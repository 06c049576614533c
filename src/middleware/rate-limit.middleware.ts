import rateLimit from 'express-rate-limit';
import { fail, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

/** Limits model-backed routes per client IP; each request can cost several upstream calls. */
export function createModelRouteLimiter({ windowMs, max }: RateLimitOptions) {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn('rate-limit:exceeded', { route: req.originalUrl, ip: req.ip });
      fail(res, ErrorCodes.RATE_LIMIT_EXCEEDED, 'Too many generation requests. Please try again later.', 429, {
        retryAfterMs: windowMs,
      });
    },
  });
}
