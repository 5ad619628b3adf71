import type { Account, AccountStatus } from '../../types/account.types';

export interface NewAccountRecord {
  userId: string;
  username: string;
  passwordEncrypted: string;
  displayName: string | null;
}

export interface AccountPatch {
  username?: string;
  passwordEncrypted?: string;
  displayName?: string | null;
  status?: AccountStatus;
}

/** Credential store: account records owned by an operator. */
export interface AccountRepositoryPort {
  listByUser(userId: string): Promise<Account[]>;
  findById(accountId: string): Promise<Account | null>;
  create(record: NewAccountRecord): Promise<Account>;
  update(accountId: string, patch: AccountPatch): Promise<Account | null>;
  delete(accountId: string): Promise<void>;
}
