import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { fail, failFromZod, ErrorCodes } from '../utils/api-response';
import { AppError, PortalError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getTraceId } from './trace-id.middleware';

export function notFoundHandler(req: Request, res: Response) {
  return fail(res, ErrorCodes.NOT_FOUND, `Route ${req.method} ${req.path} not found`, 404);
}

// Express recognises error handlers by arity, so `next` stays in the signature.
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  if (error instanceof ZodError) {
    return failFromZod(res, error, 'body');
  }
  if (error instanceof AppError) {
    const details = error instanceof PortalError && error.httpStatus ? { httpStatus: error.httpStatus } : undefined;
    const log = error.isOperational && error.statusCode < 500 ? logger.warn : logger.error;
    log('http:error', {
      requestId: getTraceId(res),
      method: req.method,
      route: req.path,
      code: error.code,
      error: error.message,
    });
    return fail(res, error.code, error.message, error.statusCode, details);
  }

  logger.error('http:unhandled_error', {
    requestId: getTraceId(res),
    method: req.method,
    route: req.path,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
}
