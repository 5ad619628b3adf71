import { Router, type RequestHandler } from 'express';
import type { CompositionRoot } from '../app/composition-root';
import { EnrollmentController } from '../controllers/enrollment.controller';
import { EnrollmentLogController } from '../controllers/enrollment-log.controller';
import { validate } from '../middleware/validation.middleware';
import { batchEnrollmentSchema } from '../utils/validation.schemas';

export function createEnrollmentRouter(root: CompositionRoot, authenticate: RequestHandler): Router {
  const router = Router();
  const enrollments = new EnrollmentController(root.accounts, root.orchestrator, root.config.enrollment);

  router.use(authenticate);
  router.post('/batch', validate(batchEnrollmentSchema), enrollments.batch.bind(enrollments));

  return router;
}

export function createEnrollmentLogRouter(root: CompositionRoot, authenticate: RequestHandler): Router {
  const router = Router();
  const logs = new EnrollmentLogController(root.enrollmentLogs);

  router.use(authenticate);
  router.get('/', logs.list.bind(logs));
  router.get('/stats', logs.stats.bind(logs));

  return router;
}
