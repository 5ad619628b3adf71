import type { Request, Response, NextFunction } from 'express';
import type { EnrollmentDefaults } from '../config/app.config';
import { requireOperator } from '../middleware/auth.middleware';
import type { AccountSessionManager, IdentifiedSession } from '../services/account-session.service';
import type { AccountService } from '../services/account.service';
import { buildTimetable, creditLimitOf, detectConflicts, summarizeCredits } from '../services/schedule-conflict.service';
import type { Account } from '../types/account.types';
import { failFromZod, ok } from '../utils/api-response';
import { AccountInactiveError } from '../utils/errors';
import { unwrap } from '../utils/result';
import { availableCoursesQuerySchema } from '../utils/validation.schemas';

/**
 * Session control and live reads against the portal for one stored account.
 * Nothing here is cached: every read is a fresh portal call.
 */
export class PortalController {
  constructor(
    private readonly accounts: AccountService,
    private readonly sessions: AccountSessionManager,
    private readonly defaults: EnrollmentDefaults
  ) {}

  private async activeAccount(req: Request): Promise<Account> {
    const { userId } = requireOperator(req);
    const account = await this.accounts.get(userId, req.params.id);
    if (account.status !== 'active') {
      throw new AccountInactiveError();
    }
    return account;
  }

  private withSession<T>(account: Account, fn: (identified: IdentifiedSession) => Promise<T>): Promise<T> {
    return this.sessions.runExclusive(account.id, async () => {
      const identified = unwrap(await this.sessions.ensureIdentified(account));
      return fn(identified);
    });
  }

  /** POST /api/v1/accounts/:id/portal/login */
  async login(req: Request, res: Response, next: NextFunction) {
    try {
      const account = await this.activeAccount(req);
      const profile = await this.sessions.runExclusive(account.id, async () => unwrap(await this.sessions.login(account)));
      return ok(res, {
        session: this.sessions.snapshot(account.id),
        profile: { studentId: profile.studentId, fullName: profile.fullName },
      });
    } catch (error) {
      next(error);
    }
  }

  /** POST /api/v1/accounts/:id/portal/logout */
  async logout(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const account = await this.accounts.get(userId, req.params.id);
      await this.sessions.runExclusive(account.id, async () => this.sessions.logout(account.id));
      return ok(res, { session: this.sessions.snapshot(account.id) });
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/accounts/:id/portal/session */
  async session(req: Request, res: Response, next: NextFunction) {
    try {
      const { userId } = requireOperator(req);
      const account = await this.accounts.get(userId, req.params.id);
      return ok(res, { session: this.sessions.snapshot(account.id) });
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/accounts/:id/courses/available?programId=&termLevel= */
  async availableCourses(req: Request, res: Response, next: NextFunction) {
    try {
      const query = availableCoursesQuerySchema.safeParse(req.query);
      if (!query.success) {
        return failFromZod(res, query.error, 'query');
      }
      const programId = query.data.programId ?? this.defaults.programId;
      const termLevel = query.data.termLevel ?? this.defaults.termLevel;
      const account = await this.activeAccount(req);
      const courses = await this.withSession(account, async ({ courses: portal }) =>
        unwrap(await portal.listAvailable(programId, termLevel))
      );
      return ok(res, { programId, termLevel, courses, count: courses.length });
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/accounts/:id/courses/enrolled */
  async enrolledCourses(req: Request, res: Response, next: NextFunction) {
    try {
      const account = await this.activeAccount(req);
      const { courses, maxCredits } = await this.withSession(account, async ({ session, courses: portal }) => ({
        courses: unwrap(await portal.listEnrolled()),
        maxCredits: creditLimitOf(session.profile(), this.defaults.maxCredits),
      }));
      return ok(res, { courses, summary: summarizeCredits(courses, maxCredits) });
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/accounts/:id/schedule */
  async schedule(req: Request, res: Response, next: NextFunction) {
    try {
      const account = await this.activeAccount(req);
      const slots = await this.withSession(account, async ({ courses: portal }) => unwrap(await portal.getSchedule()));
      return ok(res, { slots, conflicts: detectConflicts(slots), timetable: buildTimetable(slots) });
    } catch (error) {
      next(error);
    }
  }

  /** GET /api/v1/accounts/:id/registration-info */
  async registrationInfo(req: Request, res: Response, next: NextFunction) {
    try {
      const account = await this.activeAccount(req);
      const info = await this.withSession(account, async ({ courses: portal }) => ({
        studentStatus: unwrap(await portal.getStudentStatus()),
        academicYear: unwrap(await portal.getAcademicYear()),
        registrationSchedule: unwrap(await portal.getRegistrationSchedule()),
      }));
      return ok(res, info);
    } catch (error) {
      next(error);
    }
  }
}
