import type { AxiosAdapter } from 'axios';
import type { PortalConfig } from '../config/app.config';
import type { Account } from '../types/account.types';
import type { PortalSessionSnapshot, Profile } from '../types/portal.types';
import { AuthError, CryptoError, NotAuthenticatedError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { err, ok, type Result } from '../utils/result';
import type { CredentialVault } from './credential-vault.service';
import { PortalCourseService } from './portal/portal-course.service';
import { PortalSession } from './portal/portal-session';

export type SessionFailure = AuthError | CryptoError | NotAuthenticatedError;

export interface IdentifiedSession {
  session: PortalSession;
  courses: PortalCourseService;
}

const UNAUTHENTICATED: PortalSessionSnapshot = {
  state: 'unauthenticated',
  isAuthenticated: false,
  hasToken: false,
  studentId: null,
};

/**
 * One PortalSession per account id. Sessions never share mutable state and all
 * portal work for an account goes through runExclusive, so a login, a listing
 * and an enrollment for the same account run in the order they were issued.
 */
export class AccountSessionManager {
  private readonly sessions = new Map<string, PortalSession>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly portal: PortalConfig,
    private readonly vault: CredentialVault,
    private readonly adapter?: AxiosAdapter
  ) {}

  private sessionFor(accountId: string): PortalSession {
    let session = this.sessions.get(accountId);
    if (!session) {
      session = new PortalSession(this.portal, this.adapter);
      this.sessions.set(accountId, session);
    }
    return session;
  }

  snapshot(accountId: string): PortalSessionSnapshot {
    return this.sessions.get(accountId)?.snapshot() ?? { ...UNAUTHENTICATED };
  }

  async runExclusive<T>(accountId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(accountId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(accountId, tail);
    try {
      return await run;
    } finally {
      if (this.queues.get(accountId) === tail) {
        this.queues.delete(accountId);
      }
    }
  }

  /**
   * Bring the account's session to `identified`, authenticating with the
   * stored credential when needed. The decrypted password lives only for the
   * duration of the login call.
   */
  async ensureIdentified(account: Account): Promise<Result<IdentifiedSession, SessionFailure>> {
    const session = this.sessionFor(account.id);
    if (session.state === 'identified') {
      return ok({ session, courses: new PortalCourseService(session) });
    }
    const profile = await this.authenticate(account, session);
    if (!profile.ok) return profile;
    return ok({ session, courses: new PortalCourseService(session) });
  }

  /** Fresh login regardless of the current state. */
  async login(account: Account): Promise<Result<Profile, SessionFailure>> {
    return this.authenticate(account, this.sessionFor(account.id));
  }

  /** Login and identity check on a throwaway session; the live one is untouched. */
  async checkCredentials(account: Account): Promise<Result<Profile, SessionFailure>> {
    const session = new PortalSession(this.portal, this.adapter);
    try {
      return await this.authenticate(account, session);
    } finally {
      session.logout();
    }
  }

  logout(accountId: string): void {
    this.sessions.get(accountId)?.logout();
  }

  /** Drop everything held for the account, e.g. after a credential change. */
  forget(accountId: string): void {
    this.logout(accountId);
    this.sessions.delete(accountId);
  }

  private async authenticate(account: Account, session: PortalSession): Promise<Result<Profile, SessionFailure>> {
    let password: string;
    try {
      password = this.vault.decrypt(account.passwordEncrypted);
    } catch (error) {
      logger.error('account.credential.decrypt_failed', { accountId: account.id, error: errorMessage(error) });
      return err(error instanceof CryptoError ? error : new CryptoError());
    }

    const handle = await session.authenticate(account.username, password);
    if (!handle.ok) {
      logger.warn('account.session.login_failed', { accountId: account.id, error: handle.error.message });
      return handle;
    }
    const profile = await session.resolveIdentity();
    if (!profile.ok) {
      session.logout();
      logger.warn('account.session.identity_failed', { accountId: account.id, error: profile.error.message });
      return profile;
    }
    logger.info('account.session.identified', { accountId: account.id });
    return profile;
  }
}
