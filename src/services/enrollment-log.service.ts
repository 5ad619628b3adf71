import type { EnrollmentStats, EnrollmentStatus, StoredEnrollmentLog } from '../types/account.types';
import type { EnrollmentLogRepositoryPort } from './ports/enrollment-log.repository.port';

export const DEFAULT_LOG_LIMIT = 100;
const STATS_WINDOW = 1000;

export interface LogFilter {
  accountId?: string;
  status?: EnrollmentStatus;
  limit?: number;
}

export class EnrollmentLogService {
  constructor(private readonly repo: EnrollmentLogRepositoryPort) {}

  async list(userId: string, filter: LogFilter = {}): Promise<StoredEnrollmentLog[]> {
    return this.repo.list({
      userId,
      accountId: filter.accountId,
      status: filter.status,
      limit: filter.limit ?? DEFAULT_LOG_LIMIT,
    });
  }

  /** Counts over the most recent entries only. */
  async stats(userId: string, accountId?: string): Promise<EnrollmentStats> {
    const entries = await this.repo.list({ userId, accountId, limit: STATS_WINDOW });
    return summarizeLogs(entries);
  }
}

export function summarizeLogs(entries: readonly StoredEnrollmentLog[]): EnrollmentStats {
  const stats: EnrollmentStats = { total: entries.length, success: 0, failed: 0, addActions: 0, dropActions: 0 };
  for (const entry of entries) {
    if (entry.status === 'success') stats.success += 1;
    else stats.failed += 1;
    if (entry.action === 'add') stats.addActions += 1;
    else stats.dropActions += 1;
  }
  return stats;
}
