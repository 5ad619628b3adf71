import type { Request, Response, NextFunction } from 'express';
import type { EnrollmentDefaults } from '../config/app.config';
import { requireOperator } from '../middleware/auth.middleware';
import type { AccountService } from '../services/account.service';
import type { CourseRef, EnrollmentOrchestrator } from '../services/enrollment-orchestrator.service';
import type { Account, EnrollmentAction } from '../types/account.types';
import { ok } from '../utils/api-response';
import { AccountInactiveError, ValidationError } from '../utils/errors';
import type { BatchEnrollmentBody, EnrollmentBody } from '../utils/validation.schemas';

function courseRefOf(body: EnrollmentBody | BatchEnrollmentBody): CourseRef {
  return {
    courseId: body.courseId,
    courseName: body.courseName || body.courseId,
    registrationId: body.registrationId,
  };
}

export class EnrollmentController {
  constructor(
    private readonly accounts: AccountService,
    private readonly orchestrator: EnrollmentOrchestrator,
    private readonly defaults: EnrollmentDefaults
  ) {}

  /** Request hash first, then the configured one for the action. */
  private resolveHash(action: EnrollmentAction, requested?: string): string {
    const hash = requested ?? (action === 'add' ? this.defaults.addHash : this.defaults.dropHash);
    if (!hash) {
      throw new ValidationError(`No enrollment hash supplied or configured for ${action}`);
    }
    return hash;
  }

  /** POST /api/v1/accounts/:id/enrollments */
  async enroll(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const body: EnrollmentBody = req.body;
      const hash = this.resolveHash(body.action, body.hash);
      const account = await this.accounts.get(userId, req.params.id);
      if (account.status !== 'active') {
        throw new AccountInactiveError();
      }
      const entry = await this.orchestrator.perform(account, body.action, courseRefOf(body), hash);
      return ok(res, { entry });
    } catch (error) {
      next(error);
    }
  }

  /** POST /api/v1/enrollments/batch */
  async batch(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const body: BatchEnrollmentBody = req.body;
      const hash = this.resolveHash(body.action, body.hash);

      let targets: Account[];
      if (body.accountIds) {
        targets = [];
        for (const accountId of body.accountIds) {
          targets.push(await this.accounts.get(userId, accountId));
        }
      } else {
        targets = await this.accounts.list(userId);
      }
      const active = targets.filter((account) => account.status === 'active');
      const skipped = targets.filter((account) => account.status !== 'active').map((account) => account.id);

      const entries = await this.orchestrator.performForAccounts(active, body.action, courseRefOf(body), hash);
      return ok(res, {
        entries,
        skipped,
        succeeded: entries.filter((entry) => entry.status === 'success').length,
        failed: entries.filter((entry) => entry.status === 'failed').length,
      });
    } catch (error) {
      next(error);
    }
  }
}
