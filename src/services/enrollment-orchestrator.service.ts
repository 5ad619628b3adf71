import type { Account, EnrollmentAction, EnrollmentLogEntry } from '../types/account.types';
import type { AckMessage } from '../types/portal.types';
import { NotFoundError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { err, type Result } from '../utils/result';
import type { AccountSessionManager } from './account-session.service';
import type { EnrollmentLogRepositoryPort } from './ports/enrollment-log.repository.port';

export interface CourseRef {
  courseId: string;
  courseName: string;
  /**
   * Drop needs the enrollment's registration id; the portal rejects a course
   * id in its place. When absent it is looked up among the enrolled courses.
   */
  registrationId?: string;
}

export interface EnrollmentOrchestratorOptions {
  dropFlag: string;
  now?: () => Date;
}

/**
 * ensure session -> add or drop -> record outcome. Every attempt yields
 * exactly one log entry, whatever failed along the way.
 */
export class EnrollmentOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly sessions: AccountSessionManager,
    private readonly logs: EnrollmentLogRepositoryPort,
    private readonly options: EnrollmentOrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async perform(account: Account, action: EnrollmentAction, course: CourseRef, hash: string): Promise<EnrollmentLogEntry> {
    const outcome = await this.sessions.runExclusive(account.id, () => this.attempt(account, action, course, hash));
    const entry: EnrollmentLogEntry = {
      accountId: account.id,
      action,
      courseId: course.courseId,
      courseName: course.courseName,
      status: outcome.ok ? 'success' : 'failed',
      message: outcome.ok ? outcome.value.message : outcome.error.message,
      createdAt: this.now(),
    };
    await this.record(entry);
    return entry;
  }

  /** Sequential: one account at a time, in the order given. */
  async performForAccounts(
    accounts: readonly Account[],
    action: EnrollmentAction,
    course: CourseRef,
    hash: string
  ): Promise<EnrollmentLogEntry[]> {
    const entries: EnrollmentLogEntry[] = [];
    for (const account of accounts) {
      entries.push(await this.perform(account, action, course, hash));
    }
    return entries;
  }

  private async attempt(
    account: Account,
    action: EnrollmentAction,
    course: CourseRef,
    hash: string
  ): Promise<Result<AckMessage, Error>> {
    const ready = await this.sessions.ensureIdentified(account);
    if (!ready.ok) return ready;

    if (action === 'add') {
      return ready.value.courses.addCourse(course.courseId, hash);
    }
    let registrationId = course.registrationId;
    if (registrationId === undefined) {
      const enrolled = await ready.value.courses.listEnrolled();
      if (!enrolled.ok) return enrolled;
      registrationId = enrolled.value.find((entry) => entry.courseId === course.courseId)?.registrationId;
      if (!registrationId) {
        return err(new NotFoundError(`Course ${course.courseId} is not among the enrolled courses`));
      }
    }
    return ready.value.courses.dropCourse(registrationId, hash, this.options.dropFlag);
  }

  private async record(entry: EnrollmentLogEntry): Promise<void> {
    try {
      await this.logs.append(entry);
    } catch (error) {
      logger.error('enrollment.log.append_failed', {
        accountId: entry.accountId,
        action: entry.action,
        courseId: entry.courseId,
        status: entry.status,
        error: errorMessage(error),
      });
    }
  }
}
