import type { EnrollmentLogEntry, EnrollmentStatus, StoredEnrollmentLog } from '../../types/account.types';

export interface EnrollmentLogQuery {
  /** Restrict to accounts owned by this operator. */
  userId?: string;
  accountId?: string;
  status?: EnrollmentStatus;
  limit: number;
}

/** Append-only enrollment history, read newest first. */
export interface EnrollmentLogRepositoryPort {
  append(entry: EnrollmentLogEntry): Promise<StoredEnrollmentLog>;
  list(query: EnrollmentLogQuery): Promise<StoredEnrollmentLog[]>;
}
