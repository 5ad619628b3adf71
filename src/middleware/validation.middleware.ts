import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodSchema } from 'zod';
import { fail, failFromZod, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

export function validate(schema: ZodSchema) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = await schema.parseAsync(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        logger.debug('Request body failed validation', { route: req.path, issues: error.issues.length });
        return failFromZod(res, error, 'body');
      }

      logger.error('Non-Zod validation error', { error: error instanceof Error ? error.message : String(error) });
      return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
    }
  };
}
