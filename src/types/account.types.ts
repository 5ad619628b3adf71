export type AccountStatus = 'active' | 'inactive';

export interface Account {
  id: string;
  userId: string;
  username: string;
  passwordEncrypted: string;
  displayName: string | null;
  status: AccountStatus;
  createdAt: Date;
  updatedAt: Date;
}

/** Account as returned to operators: never carries the ciphertext. */
export type PublicAccount = Omit<Account, 'passwordEncrypted'>;

export function toPublicAccount(account: Account): PublicAccount {
  const { passwordEncrypted: _omitted, ...rest } = account;
  return rest;
}

export type EnrollmentAction = 'add' | 'drop';
export type EnrollmentStatus = 'success' | 'failed';

export interface EnrollmentLogEntry {
  accountId: string;
  action: EnrollmentAction;
  courseId: string;
  courseName: string;
  status: EnrollmentStatus;
  message: string;
  createdAt: Date;
}

export interface StoredEnrollmentLog extends EnrollmentLogEntry {
  id: string;
  accountUsername?: string | null;
  accountDisplayName?: string | null;
}

export interface EnrollmentStats {
  total: number;
  success: number;
  failed: number;
  addActions: number;
  dropActions: number;
}
