import { validate as isUuid } from 'uuid';
import { z } from 'zod';
import type { DbPort, DbRow } from '../../services/ports/db.port';
import type { AccountPatch, AccountRepositoryPort, NewAccountRecord } from '../../services/ports/account.repository.port';
import type { Account } from '../../types/account.types';

const ACCOUNTS_TABLE = 'krs.accounts';

const ACCOUNT_COLUMNS = 'id, user_id, username, password_encrypted, display_name, status, created_at, updated_at';

const accountRowSchema = z.object({
  id: z.coerce.string(),
  user_id: z.coerce.string(),
  username: z.coerce.string(),
  password_encrypted: z.string(),
  display_name: z.string().nullable().optional(),
  status: z.enum(['active', 'inactive']),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export function mapAccountRow(row: DbRow): Account {
  const parsed = accountRowSchema.parse(row);
  return {
    id: parsed.id,
    userId: parsed.user_id,
    username: parsed.username,
    passwordEncrypted: parsed.password_encrypted,
    displayName: parsed.display_name ?? null,
    status: parsed.status,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
  };
}

function patchColumns(patch: AccountPatch): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (patch.username !== undefined) fields.username = patch.username;
  if (patch.passwordEncrypted !== undefined) fields.password_encrypted = patch.passwordEncrypted;
  if (patch.displayName !== undefined) fields.display_name = patch.displayName;
  if (patch.status !== undefined) fields.status = patch.status;
  return fields;
}

export function createDbAccountRepository(db: DbPort, now: () => Date = () => new Date()): AccountRepositoryPort {
  // Ids are UUID columns; anything else cannot match and would fail the cast.
  async function findById(accountId: string): Promise<Account | null> {
    if (!isUuid(accountId)) return null;
    const sql = `SELECT ${ACCOUNT_COLUMNS} FROM ${ACCOUNTS_TABLE} WHERE id = ?`;
    const row = await db.queryOne(sql, [accountId], { operation: 'account.findById' });
    return row ? mapAccountRow(row) : null;
  }

  return {
    async listByUser(userId) {
      const sql = `SELECT ${ACCOUNT_COLUMNS} FROM ${ACCOUNTS_TABLE} WHERE user_id = ? ORDER BY created_at DESC`;
      const rows = await db.query(sql, [userId], { operation: 'account.listByUser' });
      return rows.map(mapAccountRow);
    },

    findById,

    async create(record: NewAccountRecord) {
      const timestamp = now();
      const account: Account = {
        id: db.generateId(),
        userId: record.userId,
        username: record.username,
        passwordEncrypted: record.passwordEncrypted,
        displayName: record.displayName,
        status: 'active',
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      await db.insert(
        ACCOUNTS_TABLE,
        {
          id: account.id,
          user_id: account.userId,
          username: account.username,
          password_encrypted: account.passwordEncrypted,
          display_name: account.displayName,
          status: account.status,
          created_at: account.createdAt,
          updated_at: account.updatedAt,
        },
        { operation: 'account.create' }
      );
      return account;
    },

    async update(accountId, patch) {
      if (!isUuid(accountId)) return null;
      const fields = patchColumns(patch);
      if (Object.keys(fields).length > 0) {
        await db.update(ACCOUNTS_TABLE, accountId, { ...fields, updated_at: now() }, 'id', { operation: 'account.update' });
      }
      return findById(accountId);
    },

    async delete(accountId) {
      if (!isUuid(accountId)) return;
      await db.query(`DELETE FROM ${ACCOUNTS_TABLE} WHERE id = ?`, [accountId], { operation: 'account.delete' });
    },
  };
}
