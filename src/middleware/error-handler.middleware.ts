import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../utils/errors';
import { fail, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';
import { getTraceId } from './trace-id.middleware';

export function notFoundHandler(req: Request, res: Response) {
  return fail(res, ErrorCodes.NOT_FOUND, `Route ${req.method} ${req.path} not found`, 404);
}

function isBodyParseError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'type' in err &&
    err.type === 'entity.parse.failed' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

/**
 * Maps every AppError subclass to its own status and code. Anything else is a
 * 500 whose message stays in the logs.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  // A stream that already sent headers is closed by Express itself
  if (res.headersSent) return next(err);
  const requestId = getTraceId(res);

  if (isBodyParseError(err)) {
    return fail(res, ErrorCodes.VALIDATION_ERROR, 'Malformed JSON body', 400);
  }

  if (err instanceof AppError) {
    const log = err.statusCode >= 500 ? logger.error : logger.warn;
    log('http:error', {
      requestId,
      route: req.path,
      name: err.name,
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
    });
    return fail(res, err.code, err.message, err.statusCode, err.details);
  }

  logger.error('http:unhandled-error', {
    requestId,
    route: req.path,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
}
