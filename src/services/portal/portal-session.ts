import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { PortalConfig } from '../../config/app.config';
import { AuthError, NotAuthenticatedError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { err, ok, type Result } from '../../utils/result';
import type { PortalSessionSnapshot, PortalSessionState, Profile, SessionHandle } from '../../types/portal.types';
import { bearer, createPortalHttp, sendPortalRequest } from './portal-http';
import { loginResponseSchema, profileResponseSchema, scopeResponseSchema, type LoginResponse } from './portal.schemas';

const INVALID_RESPONSE = 'Invalid response from server';

function readSessionHandle(body: LoginResponse): SessionHandle | null {
  if (body.token && body.meta?.status === 200) {
    return { token: body.token, tokenType: 'Bearer', expiresIn: body.expires };
  }
  if (body.access_token) {
    return { token: body.access_token, tokenType: body.token_type ?? 'Bearer', expiresIn: body.expires_in };
  }
  return null;
}

/**
 * PortalSession - bearer token and student identifier for one account.
 *
 * unauthenticated --authenticate--> authenticated --resolveIdentity--> identified.
 * logout() returns to unauthenticated from any state. There is no refresh: an
 * expired token surfaces as a failed call and the caller authenticates again.
 */
export class PortalSession {
  readonly http: AxiosInstance;
  private token: string | null = null;
  private studentId: string | null = null;
  private resolvedProfile: Profile | null = null;

  constructor(readonly config: PortalConfig, adapter?: AxiosAdapter) {
    this.http = createPortalHttp(config, adapter);
  }

  get state(): PortalSessionState {
    if (!this.token) return 'unauthenticated';
    return this.studentId ? 'identified' : 'authenticated';
  }

  snapshot(): PortalSessionSnapshot {
    const state = this.state;
    return {
      state,
      isAuthenticated: state === 'identified',
      hasToken: this.token !== null,
      studentId: this.studentId,
    };
  }

  /** Credentials for an identified session, or null when not identified. */
  credentials(): { token: string; studentId: string } | null {
    if (!this.token || !this.studentId) return null;
    return { token: this.token, studentId: this.studentId };
  }

  /** Profile from the last resolveIdentity, while the session stays identified. */
  profile(): Profile | null {
    return this.state === 'identified' ? this.resolvedProfile : null;
  }

  async authenticate(username: string, password: string): Promise<Result<SessionHandle, AuthError>> {
    this.logout();
    logger.info('portal.login.attempt', { username });

    const sent = await sendPortalRequest(this.http, 'login', {
      method: 'POST',
      url: this.config.endpoints.login,
      headers: { 'accept-language': this.config.acceptLanguage },
      data: new URLSearchParams({ username, password }),
    });
    if (!sent.ok) {
      return err(new AuthError(`Login failed: ${sent.error.message}`));
    }

    const parsed = loginResponseSchema.safeParse(sent.value);
    const handle = parsed.success ? readSessionHandle(parsed.data) : null;
    if (!handle) {
      const message = (parsed.success ? parsed.data.meta?.message : undefined) ?? INVALID_RESPONSE;
      logger.warn('portal.login.rejected', { username, message });
      return err(new AuthError(message));
    }

    this.token = handle.token;
    logger.info('portal.login.success', { username });
    return ok(handle);
  }

  async resolveIdentity(): Promise<Result<Profile, AuthError | NotAuthenticatedError>> {
    const token = this.token;
    if (!token) {
      return err(new NotAuthenticatedError());
    }

    const sent = await sendPortalRequest(this.http, 'profile', {
      method: 'GET',
      url: this.config.endpoints.profile,
      headers: bearer(token),
    });
    if (!sent.ok) {
      return err(new AuthError(sent.error.message));
    }

    const parsed = profileResponseSchema.safeParse(sent.value);
    if (!parsed.success) {
      return err(new AuthError(INVALID_RESPONSE));
    }
    const studentId = parsed.data.numberid;
    if (!studentId) {
      return err(new AuthError('Profile response did not include a student number'));
    }

    // A logout may have raced the profile call; only bind to the token we asked with.
    if (this.token !== token) {
      return err(new NotAuthenticatedError('Session was cleared during identity lookup'));
    }
    this.studentId = studentId;
    const profile: Profile = { studentId, fullName: parsed.data.fullname ?? null, raw: parsed.data };
    this.resolvedProfile = profile;
    logger.info('portal.profile.resolved', { fullName: parsed.data.fullname ?? 'Unknown' });
    return ok(profile);
  }

  async getScopes(): Promise<Result<string[], AuthError | NotAuthenticatedError>> {
    const token = this.token;
    if (!token) {
      return err(new NotAuthenticatedError());
    }
    const sent = await sendPortalRequest(this.http, 'scope', {
      method: 'GET',
      url: this.config.endpoints.scope,
      headers: bearer(token),
    });
    if (!sent.ok) {
      return err(new AuthError(sent.error.message));
    }
    const parsed = scopeResponseSchema.safeParse(sent.value);
    return ok(parsed.success ? parsed.data.scope : []);
  }

  logout(): void {
    if (this.token || this.studentId) {
      logger.debug('portal.session.cleared');
    }
    this.token = null;
    this.studentId = null;
    this.resolvedProfile = null;
  }
}
