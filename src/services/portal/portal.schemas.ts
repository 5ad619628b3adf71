import { z } from 'zod';
import {
  WEEKDAYS,
  type CourseMeeting,
  type CourseSummary,
  type EnrolledCourse,
  type ScheduleSlot,
} from '../../types/portal.types';

// The portal is loose about types (ids arrive as numbers or strings, counts
// sometimes as strings), so scalar fields coerce and fall back instead of failing
// the whole payload.
const text = (fallback = '') =>
  z
    .union([z.string(), z.number()])
    .transform((v) => String(v))
    .catch(fallback);

const count = z.coerce.number().catch(0);
const optionalText = z.string().min(1).optional().catch(undefined);

export const loginResponseSchema = z
  .object({
    token: optionalText,
    access_token: optionalText,
    token_type: optionalText,
    expires: z.union([z.number(), z.string()]).optional().catch(undefined),
    expires_in: z.union([z.number(), z.string()]).optional().catch(undefined),
    meta: z
      .object({
        status: z.unknown().optional(),
        message: optionalText,
      })
      .optional()
      .catch(undefined),
  })
  .passthrough();

export type LoginResponse = z.infer<typeof loginResponseSchema>;

export const profileResponseSchema = z
  .object({
    numberid: z
      .union([z.string().min(1), z.number()])
      .transform((v) => String(v))
      .optional()
      .catch(undefined),
    fullname: optionalText,
  })
  .passthrough();

export const scopeResponseSchema = z
  .object({
    scope: z.array(z.string()).catch([]),
  })
  .passthrough();

const rawCourseSchema = z
  .object({
    courseid: text(),
    course_id: text(),
    subject_code: text(),
    subject_name: text('Unknown'),
    class: text(),
    credit: count,
    color: text(),
    quota: count,
    remaining_quota: count,
  })
  .passthrough();

const rawEnrolledCourseSchema = rawCourseSchema.extend({
  registrationid: text(),
  taking_status: text(),
});

type RawCourse = z.infer<typeof rawCourseSchema>;

function toCourseSummary(raw: RawCourse): CourseSummary {
  return {
    courseId: raw.courseid || raw.course_id,
    subjectCode: raw.subject_code,
    subjectName: raw.subject_name,
    classLabel: raw.class,
    creditUnits: raw.credit,
    categoryLabel: raw.color,
    quota: raw.quota,
    remainingQuota: raw.remaining_quota,
  };
}

export const availableCoursesSchema = z.array(rawCourseSchema).transform((rows) => rows.map(toCourseSummary));

export const enrolledCoursesSchema = z.array(rawEnrolledCourseSchema).transform((rows) =>
  rows.map(
    (raw): EnrolledCourse => ({
      ...toCourseSummary(raw),
      registrationId: raw.registrationid,
      takingStatus: raw.taking_status,
    })
  )
);

const meetingSchema = z
  .object({
    course_name: text('Unknown'),
    start_hour: text('N/A'),
    end_hour: text('N/A'),
    credit: count,
  })
  .passthrough()
  .transform(
    (raw): CourseMeeting => ({
      courseName: raw.course_name,
      startHour: raw.start_hour,
      endHour: raw.end_hour,
      creditUnits: raw.credit,
    })
  );

const meetingsSchema = z.array(meetingSchema);

const shiftSchema = z
  .object({
    shift_time: text('N/A'),
    shift_data: z.record(z.unknown()).catch({}),
  })
  .passthrough();

export const scheduleSchema = z.array(shiftSchema).transform((shifts) =>
  shifts.map((shift): ScheduleSlot => {
    const days: ScheduleSlot['days'] = {};
    for (const day of WEEKDAYS) {
      const parsed = meetingsSchema.safeParse(shift.shift_data[day]);
      if (parsed.success && parsed.data.length > 0) {
        days[day] = parsed.data;
      }
    }
    return { timeLabel: shift.shift_time, days };
  })
);

export const transactionResponseSchema = z
  .object({
    status: z.unknown().optional(),
    message: optionalText,
  })
  .passthrough();

export const jsonObjectSchema = z.record(z.unknown());

/** Best-effort message extraction from an error body. */
export function upstreamMessage(data: unknown): string | undefined {
  const parsed = z
    .object({
      message: optionalText,
      meta: z.object({ message: optionalText }).optional().catch(undefined),
    })
    .passthrough()
    .safeParse(data);
  if (!parsed.success) return undefined;
  return parsed.data.message ?? parsed.data.meta?.message;
}
