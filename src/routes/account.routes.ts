import { Router, type RequestHandler } from 'express';
import { AccountController } from '../controllers/account.controller';
import { EnrollmentController } from '../controllers/enrollment.controller';
import { PortalController } from '../controllers/portal.controller';
import type { CompositionRoot } from '../app/composition-root';
import { validate } from '../middleware/validation.middleware';
import { createAccountSchema, enrollmentSchema, updateAccountSchema } from '../utils/validation.schemas';

export function createAccountRouter(root: CompositionRoot, authenticate: RequestHandler): Router {
  const router = Router();
  const accounts = new AccountController(root.accounts);
  const portal = new PortalController(root.accounts, root.sessions, root.config.enrollment);
  const enrollments = new EnrollmentController(root.accounts, root.orchestrator, root.config.enrollment);

  // All account routes require an operator token
  router.use(authenticate);

  // Stored accounts
  router.get('/', accounts.list.bind(accounts));
  router.post('/', validate(createAccountSchema), accounts.create.bind(accounts));
  router.get('/:id', accounts.get.bind(accounts));
  router.patch('/:id', validate(updateAccountSchema), accounts.update.bind(accounts));
  router.delete('/:id', accounts.remove.bind(accounts));
  router.post('/:id/toggle-status', accounts.toggleStatus.bind(accounts));
  router.post('/:id/test-connection', accounts.testConnection.bind(accounts));

  // Portal session control
  router.post('/:id/portal/login', portal.login.bind(portal));
  router.post('/:id/portal/logout', portal.logout.bind(portal));
  router.get('/:id/portal/session', portal.session.bind(portal));

  // Live portal reads
  router.get('/:id/courses/available', portal.availableCourses.bind(portal));
  router.get('/:id/courses/enrolled', portal.enrolledCourses.bind(portal));
  router.get('/:id/schedule', portal.schedule.bind(portal));
  router.get('/:id/registration-info', portal.registrationInfo.bind(portal));

  // Add / drop
  router.post('/:id/enrollments', validate(enrollmentSchema), enrollments.enroll.bind(enrollments));

  return router;
}
