import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { fail, failFromZod, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

/** Replaces req.body with the parsed (and transformed) value, or answers 400. */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = await schema.parseAsync(req.body);
      return next();
    } catch (error) {
      if (error instanceof ZodError) {
        logger.debug('validation:rejected', { route: req.path, issues: error.issues.length });
        return failFromZod(res, error, 'body');
      }

      logger.error('validation:unexpected', { route: req.path, error: error instanceof Error ? error.message : String(error) });
      return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
    }
  };
}
