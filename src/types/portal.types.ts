export type PortalSessionState = 'unauthenticated' | 'authenticated' | 'identified';

export interface SessionHandle {
  token: string;
  tokenType: string;
  expiresIn?: number | string;
}

export interface Profile {
  studentId: string;
  fullName: string | null;
  raw: Record<string, unknown>;
}

export interface PortalSessionSnapshot {
  state: PortalSessionState;
  isAuthenticated: boolean;
  hasToken: boolean;
  studentId: string | null;
}

export interface CourseSummary {
  courseId: string;
  subjectCode: string;
  subjectName: string;
  classLabel: string;
  creditUnits: number;
  categoryLabel: string;
  quota: number;
  remainingQuota: number;
}

export interface EnrolledCourse extends CourseSummary {
  /** Enrollment record id; the drop endpoint accepts only this, never courseId. */
  registrationId: string;
  takingStatus: string;
}

export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export interface CourseMeeting {
  courseName: string;
  startHour: string;
  endHour: string;
  creditUnits: number;
}

export interface ScheduleSlot {
  timeLabel: string;
  days: Partial<Record<Weekday, CourseMeeting[]>>;
}

export interface Conflict {
  day: Weekday;
  timeLabel: string;
  meetings: CourseMeeting[];
}

export interface AckMessage {
  message: string;
  raw: Record<string, unknown>;
}
