import express from 'express';
import cors, { type CorsOptions } from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as client from 'prom-client';
import type { CompositionRoot } from './app/composition-root';
import { createAuthenticate } from './middleware/auth.middleware';
import { errorHandler, notFoundHandler } from './middleware/error-handler.middleware';
import { httpMetricsMiddleware } from './middleware/metrics.middleware';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
import { traceIdMiddleware } from './middleware/trace-id.middleware';
import { createAccountRouter } from './routes/account.routes';
import { createEnrollmentLogRouter, createEnrollmentRouter } from './routes/enrollment.routes';
import { createHealthRouter } from './routes/health.routes';
import { fail, ErrorCodes } from './utils/api-response';
import { logger } from './utils/logger';

function corsOptions(whitelist: string[], nodeEnv: string): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Non-browser clients send no Origin
      if (!origin || whitelist.includes(origin)) {
        return callback(null, true);
      }
      if (nodeEnv !== 'production') {
        logger.warn('CORS origin not in whitelist', { origin });
      }
      return callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Trace-Id'],
  };
}

export function createApp(root: CompositionRoot): express.Express {
  const app = express();
  const { config } = root;

  if (config.nodeEnv === 'test') {
    app.set('trust proxy', 'loopback');
  }

  // Correlation: assign/propagate X-Trace-Id for every request
  app.use(traceIdMiddleware);
  app.use(requestLoggingMiddleware);
  app.use(httpMetricsMiddleware);

  app.use(cors(corsOptions(config.corsWhitelist, config.nodeEnv)));
  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: 1000,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS' || req.path === '/api/v1/health' || req.path === '/metrics',
      handler: (req, res) => {
        logger.warn('Global rate limit exceeded', { path: req.path });
        return fail(res, ErrorCodes.RATE_LIMITED, 'Too many requests from this IP, please try again later.', 429);
      },
    })
  );
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    })
  );
  app.use(express.json({ limit: '100kb' }));

  const authenticate = createAuthenticate(config.operatorJwtSecret);

  app.use('/api/v1/health', createHealthRouter(root));
  app.use('/api/v1/accounts', createAccountRouter(root, authenticate));
  app.use('/api/v1/enrollments', createEnrollmentRouter(root, authenticate));
  app.use('/api/v1/enrollment-logs', createEnrollmentLogRouter(root, authenticate));

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', client.register.contentType);
      res.end(await client.register.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
