import type { Request, Response } from 'express';
import type { DbPort } from '../services/ports/db.port';
import { ok } from '../utils/api-response';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export class HealthController {
  constructor(private readonly db: DbPort) {}

  /** GET /api/v1/health (public) */
  async getHealthCheck(_req: Request, res: Response) {
    const started = Date.now();
    try {
      await this.db.queryOne('SELECT 1 AS health_check', [], { operation: 'health' });
      return ok(res, {
        status: 'healthy',
        database: 'up',
        latencyMs: Date.now() - started,
        uptimeSeconds: Math.round(process.uptime()),
      });
    } catch (error) {
      logger.warn('health.database.down', { error: errorMessage(error) });
      return ok(
        res,
        {
          status: 'degraded',
          database: 'down',
          latencyMs: Date.now() - started,
          uptimeSeconds: Math.round(process.uptime()),
        },
        503
      );
    }
  }
}
