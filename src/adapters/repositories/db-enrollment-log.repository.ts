import { validate as isUuid } from 'uuid';
import { z } from 'zod';
import type { DbPort, DbRow } from '../../services/ports/db.port';
import type { EnrollmentLogRepositoryPort } from '../../services/ports/enrollment-log.repository.port';
import type { StoredEnrollmentLog } from '../../types/account.types';

const LOGS_TABLE = 'krs.enrollment_logs';
const ACCOUNTS_TABLE = 'krs.accounts';

const logRowSchema = z.object({
  id: z.coerce.string(),
  account_id: z.coerce.string(),
  action: z.enum(['add', 'drop']),
  course_id: z.coerce.string(),
  course_name: z.coerce.string(),
  status: z.enum(['success', 'failed']),
  message: z.string().nullable().transform((value) => value ?? ''),
  created_at: z.coerce.date(),
  account_username: z.string().nullable().optional(),
  account_display_name: z.string().nullable().optional(),
});

export function mapEnrollmentLogRow(row: DbRow): StoredEnrollmentLog {
  const parsed = logRowSchema.parse(row);
  return {
    id: parsed.id,
    accountId: parsed.account_id,
    action: parsed.action,
    courseId: parsed.course_id,
    courseName: parsed.course_name,
    status: parsed.status,
    message: parsed.message,
    createdAt: parsed.created_at,
    accountUsername: parsed.account_username ?? null,
    accountDisplayName: parsed.account_display_name ?? null,
  };
}

export function createDbEnrollmentLogRepository(db: DbPort): EnrollmentLogRepositoryPort {
  return {
    async append(entry) {
      const id = db.generateId();
      await db.insert(
        LOGS_TABLE,
        {
          id,
          account_id: entry.accountId,
          action: entry.action,
          course_id: entry.courseId,
          course_name: entry.courseName,
          status: entry.status,
          message: entry.message,
          created_at: entry.createdAt,
        },
        { operation: 'enrollmentLog.append' }
      );
      return { ...entry, id };
    },

    async list(query) {
      // account_id is a UUID column: a malformed filter matches nothing
      if (query.accountId !== undefined && !isUuid(query.accountId)) {
        return [];
      }
      const where: string[] = [];
      const params: unknown[] = [];
      if (query.userId) {
        where.push('a.user_id = ?');
        params.push(query.userId);
      }
      if (query.accountId) {
        where.push('l.account_id = ?');
        params.push(query.accountId);
      }
      if (query.status) {
        where.push('l.status = ?');
        params.push(query.status);
      }
      const sql = `
        SELECT l.id, l.account_id, l.action, l.course_id, l.course_name, l.status, l.message, l.created_at,
               a.username AS account_username, a.display_name AS account_display_name
        FROM ${LOGS_TABLE} l
        JOIN ${ACCOUNTS_TABLE} a ON a.id = l.account_id
        ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
        ORDER BY l.created_at DESC
        LIMIT ?
      `;
      const rows = await db.query(sql, [...params, query.limit], { operation: 'enrollmentLog.list' });
      return rows.map(mapEnrollmentLogRow);
    },
  };
}
