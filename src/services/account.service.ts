import type { Account, AccountStatus } from '../types/account.types';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { AccountSessionManager } from './account-session.service';
import type { CredentialVault } from './credential-vault.service';
import type { AccountPatch, AccountRepositoryPort } from './ports/account.repository.port';

export interface CreateAccountInput {
  username: string;
  password: string;
  displayName?: string | null;
}

export interface UpdateAccountInput {
  username?: string;
  password?: string;
  displayName?: string | null;
  status?: AccountStatus;
}

export interface ConnectionTestResult {
  success: boolean;
  message: string;
  studentId?: string;
  fullName?: string | null;
}

export class AccountService {
  constructor(
    private readonly repo: AccountRepositoryPort,
    private readonly vault: CredentialVault,
    private readonly sessions: AccountSessionManager
  ) {}

  async create(userId: string, input: CreateAccountInput): Promise<Account> {
    const account = await this.repo.create({
      userId,
      username: input.username,
      passwordEncrypted: this.vault.encrypt(input.password),
      displayName: input.displayName ?? null,
    });
    logger.info('account.created', { accountId: account.id, userId });
    return account;
  }

  async list(userId: string): Promise<Account[]> {
    return this.repo.listByUser(userId);
  }

  /** Owner-scoped lookup; another operator's account reads as missing. */
  async get(userId: string, accountId: string): Promise<Account> {
    const account = await this.repo.findById(accountId);
    if (!account || account.userId !== userId) {
      throw new NotFoundError('Account not found');
    }
    return account;
  }

  async update(userId: string, accountId: string, input: UpdateAccountInput): Promise<Account> {
    await this.get(userId, accountId);
    const patch: AccountPatch = {};
    if (input.username !== undefined) patch.username = input.username;
    if (input.displayName !== undefined) patch.displayName = input.displayName;
    if (input.status !== undefined) patch.status = input.status;
    if (input.password !== undefined) patch.passwordEncrypted = this.vault.encrypt(input.password);

    const updated = await this.repo.update(accountId, patch);
    if (!updated) {
      throw new NotFoundError('Account not found');
    }
    if (input.password !== undefined || input.username !== undefined) {
      await this.dropSession(accountId);
      logger.info('account.credentials.rotated', { accountId });
    }
    return updated;
  }

  async setStatus(userId: string, accountId: string, status: AccountStatus): Promise<Account> {
    return this.update(userId, accountId, { status });
  }

  async toggleStatus(userId: string, accountId: string): Promise<Account> {
    const account = await this.get(userId, accountId);
    return this.setStatus(userId, accountId, account.status === 'active' ? 'inactive' : 'active');
  }

  async remove(userId: string, accountId: string): Promise<void> {
    await this.get(userId, accountId);
    await this.repo.delete(accountId);
    await this.dropSession(accountId);
    logger.info('account.deleted', { accountId, userId });
  }

  /** Waits behind any portal work already queued for the account. */
  private async dropSession(accountId: string): Promise<void> {
    await this.sessions.runExclusive(accountId, async () => this.sessions.forget(accountId));
  }

  async testConnection(userId: string, accountId: string): Promise<ConnectionTestResult> {
    const account = await this.get(userId, accountId);
    const result = await this.sessions.checkCredentials(account);
    if (!result.ok) {
      return { success: false, message: result.error.message };
    }
    return {
      success: true,
      message: 'Connection successful',
      studentId: result.value.studentId,
      fullName: result.value.fullName,
    };
  }
}
