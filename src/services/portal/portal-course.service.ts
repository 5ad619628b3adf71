import { NotAuthenticatedError, PortalError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { err, ok, type Result } from '../../utils/result';
import type { AckMessage, CourseSummary, EnrolledCourse, ScheduleSlot } from '../../types/portal.types';
import { bearer, sendPortalRequest, type PortalOperation } from './portal-http';
import type { PortalSession } from './portal-session';
import {
  availableCoursesSchema,
  enrolledCoursesSchema,
  jsonObjectSchema,
  scheduleSchema,
  transactionResponseSchema,
} from './portal.schemas';

export type PortalResult<T> = Result<T, PortalError | NotAuthenticatedError>;

const ADD_FAILED = 'Failed to add course';
const DROP_FAILED = 'Failed to drop course';

function transportError(failure: { message: string; httpStatus?: number }): PortalError {
  return new PortalError('transport', failure.message, failure.httpStatus);
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') return 'text';
  if (Array.isArray(data)) return 'array';
  return data === null ? 'null' : typeof data;
}

/**
 * Course-registration reads and writes for one identified portal session.
 * Every call is a single authenticated request; nothing is cached or retried.
 */
export class PortalCourseService {
  constructor(private readonly session: PortalSession) {}

  private get endpoints() {
    return this.session.config.endpoints;
  }

  private async getJson(operation: PortalOperation, url: string): Promise<PortalResult<unknown>> {
    const creds = this.session.credentials();
    if (!creds) {
      return err(new NotAuthenticatedError('Not authenticated or missing student id'));
    }
    const sent = await sendPortalRequest(this.session.http, operation, {
      method: 'GET',
      url,
      headers: bearer(creds.token),
    });
    return sent.ok ? ok(sent.value) : err(transportError(sent.error));
  }

  async listAvailable(programId: number | string, termLevel: number | string): Promise<PortalResult<CourseSummary[]>> {
    const url = `${this.endpoints.availableCourses}/${encodeURIComponent(String(programId))}/${encodeURIComponent(String(termLevel))}`;
    const body = await this.getJson('available_courses', url);
    if (!body.ok) return body;

    const parsed = availableCoursesSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(new PortalError('upstream', `Unexpected available-courses response (${describeBody(body.value)})`));
    }
    logger.info('portal.available_courses.fetched', { programId, termLevel, count: parsed.data.length });
    return ok(parsed.data);
  }

  async listEnrolled(): Promise<PortalResult<EnrolledCourse[]>> {
    const body = await this.getJson('enrolled_courses', this.endpoints.enrolledCourses);
    if (!body.ok) return body;

    // The portal occasionally answers with a non-array body; treat it as "no
    // enrollments" so listings keep working, but make it visible.
    if (!Array.isArray(body.value)) {
      logger.warn('portal.enrolled.unexpected_shape', { bodyType: describeBody(body.value) });
      return ok([]);
    }
    const parsed = enrolledCoursesSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(new PortalError('upstream', 'Unexpected enrolled-courses response (array of non-objects)'));
    }
    logger.info('portal.enrolled_courses.fetched', { count: parsed.data.length });
    return ok(parsed.data);
  }

  async getSchedule(): Promise<PortalResult<ScheduleSlot[]>> {
    const body = await this.getJson('schedule', this.endpoints.schedule);
    if (!body.ok) return body;

    const parsed = scheduleSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(new PortalError('upstream', `Unexpected schedule response (${describeBody(body.value)})`));
    }
    logger.info('portal.schedule.fetched', { slots: parsed.data.length });
    return ok(parsed.data);
  }

  async addCourse(courseId: string, enrollmentHash: string): Promise<PortalResult<AckMessage>> {
    const creds = this.session.credentials();
    if (!creds) {
      return err(new NotAuthenticatedError('Not authenticated or missing student id'));
    }
    logger.info('portal.add_course.attempt', { courseId, studentId: creds.studentId });

    const sent = await sendPortalRequest(this.session.http, 'add_course', {
      method: 'POST',
      url: `${this.endpoints.transaction}/${encodeURIComponent(enrollmentHash)}`,
      headers: bearer(creds.token),
      data: new URLSearchParams({ studentid: creds.studentId, courseid: courseId }),
    });
    if (!sent.ok) return err(transportError(sent.error));
    return this.readAck(sent.value, ADD_FAILED, 'Success record registration', { courseId });
  }

  /**
   * Drop an enrollment. Pass the enrollment's registrationId, not its courseId;
   * the endpoint accepts only the former and rejects anything else remotely.
   */
  async dropCourse(registrationId: string, dropHash: string, flag = '1'): Promise<PortalResult<AckMessage>> {
    const creds = this.session.credentials();
    if (!creds) {
      return err(new NotAuthenticatedError('Not authenticated or missing student id'));
    }
    logger.info('portal.drop_course.attempt', { registrationId, studentId: creds.studentId });

    const path = [dropHash, registrationId, creds.studentId, flag].map(encodeURIComponent).join('/');
    const sent = await sendPortalRequest(this.session.http, 'drop_course', {
      method: 'DELETE',
      url: `${this.endpoints.transaction}/${path}`,
      headers: bearer(creds.token),
    });
    if (!sent.ok) return err(transportError(sent.error));
    return this.readAck(sent.value, DROP_FAILED, 'Berhasil menghapus data registration', { registrationId });
  }

  async getStudentStatus(): Promise<PortalResult<Record<string, unknown>>> {
    return this.getObject('student_status', this.endpoints.studentStatus);
  }

  async getAcademicYear(): Promise<PortalResult<Record<string, unknown>>> {
    return this.getObject('academic_year', this.endpoints.academicYear);
  }

  async getRegistrationSchedule(): Promise<PortalResult<Record<string, unknown>>> {
    return this.getObject('registration_schedule', this.endpoints.registrationSchedule);
  }

  private async getObject(operation: PortalOperation, url: string): Promise<PortalResult<Record<string, unknown>>> {
    const body = await this.getJson(operation, url);
    if (!body.ok) return body;
    const parsed = jsonObjectSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(new PortalError('upstream', `Unexpected ${operation} response (${describeBody(body.value)})`));
    }
    return ok(parsed.data);
  }

  private readAck(
    data: unknown,
    failureDefault: string,
    successDefault: string,
    context: Record<string, string>
  ): PortalResult<AckMessage> {
    const parsed = transactionResponseSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('portal.transaction.unexpected_shape', { ...context, bodyType: describeBody(data) });
      return err(new PortalError('upstream', failureDefault));
    }
    if (parsed.data.status === 'Success') {
      logger.info('portal.transaction.success', context);
      return ok({ message: parsed.data.message ?? successDefault, raw: parsed.data });
    }
    const message = parsed.data.message ?? failureDefault;
    logger.warn('portal.transaction.rejected', { ...context, message });
    return err(new PortalError('upstream', message));
  }
}
