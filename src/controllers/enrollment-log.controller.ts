import type { Request, Response, NextFunction } from 'express';
import { requireOperator } from '../middleware/auth.middleware';
import type { EnrollmentLogService } from '../services/enrollment-log.service';
import { failFromZod, ok } from '../utils/api-response';
import { enrollmentLogQuerySchema, enrollmentStatsQuerySchema } from '../utils/validation.schemas';

export class EnrollmentLogController {
  constructor(private readonly logs: EnrollmentLogService) {}

  /** GET /api/v1/enrollment-logs */
  async list(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const query = enrollmentLogQuerySchema.safeParse(req.query);
      if (!query.success) {
        return failFromZod(res, query.error, 'query');
      }
      const logs = await this.logs.list(userId, query.data);
      return ok(res, { logs, count: logs.length });
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/enrollment-logs/stats */
  async stats(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const query = enrollmentStatsQuerySchema.safeParse(req.query);
      if (!query.success) {
        return failFromZod(res, query.error, 'query');
      }
      const stats = await this.logs.stats(userId, query.data.accountId);
      return ok(res, { stats });
    } catch (error) {
      next(error);
    }
  }
}
