import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { fail, ErrorCodes } from '../utils/api-response';
import { UnauthorizedError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface Operator {
  userId: string;
}

const operators = new WeakMap<Request, Operator>();

export function findOperator(req: Request): Operator | undefined {
  return operators.get(req);
}

/** The authenticated operator; only valid behind `authenticate`. */
export function requireOperator(req: Request): Operator {
  const operator = operators.get(req);
  if (!operator) {
    throw new UnauthorizedError();
  }
  return operator;
}

/**
 * Operator tokens are issued by the external identity provider and signed
 * with the shared HS256 secret; `sub` carries the operator's user id.
 */
export function createAuthenticate(secret: string) {
  return function authenticate(req: Request, res: Response, next: NextFunction) {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      return fail(res, ErrorCodes.AUTH_REQUIRED, 'No valid authorization token provided', 401);
    }

    try {
      const payload = jwt.verify(header.substring(7), secret, { algorithms: ['HS256'] });
      const userId = typeof payload === 'string' ? undefined : payload.sub;
      if (!userId) {
        return fail(res, ErrorCodes.INVALID_TOKEN, 'Token is missing a subject', 401);
      }
      operators.set(req, { userId });
      next();
    } catch (error) {
      logger.debug('Operator token rejected', { error: error instanceof Error ? error.message : String(error) });
      return fail(res, ErrorCodes.INVALID_TOKEN, 'Invalid or expired token', 401);
    }
  };
}
