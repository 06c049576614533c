import { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

const HEADER_NAME = 'X-Trace-Id';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function traceIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const traceId = firstHeader(req.headers['x-trace-id']) ?? firstHeader(req.headers['trace-id']) ?? randomUUID();

  // Expose on response locals and header
  res.locals.traceId = traceId;
  res.setHeader(HEADER_NAME, traceId);
  next();
}

export function getTraceId(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : undefined;
}
