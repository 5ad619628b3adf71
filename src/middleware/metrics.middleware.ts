import { NextFunction, Request, Response } from 'express';
import * as client from 'prom-client';

// Lazily register metrics once per process
const httpRequestCounter = (() => {
  const existing = client.register.getSingleMetric('krs_http_requests_total');
  if (existing instanceof client.Counter) return existing;
  return new client.Counter({
    name: 'krs_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['method', 'route', 'status'],
  });
})();

const httpRequestDuration = (() => {
  const existing = client.register.getSingleMetric('krs_http_request_duration_seconds');
  if (existing instanceof client.Histogram) return existing;
  return new client.Histogram({
    name: 'krs_http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status'],
    buckets: [0.05, 0.1, 0.2, 0.4, 0.8, 1.6, 3.2, 6.4, 12.8, 30],
  });
})();

function routeLabel(req: Request): string {
  // Prefer the matched route pattern so account ids do not explode cardinality
  const matched: unknown = req.route?.path;
  if (typeof matched === 'string') return `${req.baseUrl}${matched}`;
  return '/unmatched';
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
