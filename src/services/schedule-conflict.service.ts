import { z } from 'zod';
import {
  WEEKDAYS,
  type Conflict,
  type CourseMeeting,
  type EnrolledCourse,
  type Profile,
  type ScheduleSlot,
  type Weekday,
} from '../types/portal.types';

export interface TimetableCell {
  meetings: CourseMeeting[];
  conflict: boolean;
}

export interface TimetableRow {
  timeLabel: string;
  cells: Record<Weekday, TimetableCell>;
}

export interface CreditSummary {
  courseCount: number;
  totalCredits: number;
  maxCredits: number;
  remainingCredits: number;
}

/**
 * Every (slot, day) cell holding more than one meeting, in slot order then
 * Monday..Sunday. Meetings keep their input order; the input is not mutated.
 */
export function detectConflicts(slots: readonly ScheduleSlot[]): Conflict[] {
  const conflicts: Conflict[] = [];
  for (const slot of slots) {
    for (const day of WEEKDAYS) {
      const meetings = slot.days[day] ?? [];
      if (meetings.length > 1) {
        conflicts.push({ day, timeLabel: slot.timeLabel, meetings: [...meetings] });
      }
    }
  }
  return conflicts;
}

export function buildTimetable(slots: readonly ScheduleSlot[]): TimetableRow[] {
  return slots.map((slot) => {
    const cell = (day: Weekday): TimetableCell => {
      const meetings = [...(slot.days[day] ?? [])];
      return { meetings, conflict: meetings.length > 1 };
    };
    return {
      timeLabel: slot.timeLabel,
      cells: {
        monday: cell('monday'),
        tuesday: cell('tuesday'),
        wednesday: cell('wednesday'),
        thursday: cell('thursday'),
        friday: cell('friday'),
        saturday: cell('saturday'),
        sunday: cell('sunday'),
      },
    };
  });
}

export function summarizeCredits(enrolled: readonly EnrolledCourse[], maxCredits: number): CreditSummary {
  const totalCredits = enrolled.reduce((sum, course) => sum + course.creditUnits, 0);
  return {
    courseCount: enrolled.length,
    totalCredits,
    maxCredits,
    remainingCredits: Math.max(0, maxCredits - totalCredits),
  };
}

const maxCreditSchema = z.coerce.number().int().positive();

/** The student's own limit (`max_credit` on the profile) when it is numeric. */
export function creditLimitOf(profile: Profile | null, fallback: number): number {
  const parsed = maxCreditSchema.safeParse(profile?.raw.max_credit);
  return parsed.success ? parsed.data : fallback;
}
