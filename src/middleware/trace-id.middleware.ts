import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

const HEADER_NAME = 'X-Trace-Id';

function incomingTraceId(req: Request): string | undefined {
  const raw = req.headers['x-trace-id'] ?? req.headers['x-traceid'] ?? req.headers['trace-id'];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function traceIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const traceId = incomingTraceId(req) ?? uuidv4();

  // Expose on response locals and header
  res.locals.traceId = traceId;
  res.setHeader(HEADER_NAME, traceId);
  next();
}

export function getTraceId(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : undefined;
}
