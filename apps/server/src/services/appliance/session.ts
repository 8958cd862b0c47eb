/**
 * Appliance Session Manager
 *
 * Holds the single appliance session (SID) for the process:
 * - Authenticates on demand and re-authenticates on expiry
 * - Single-flight: concurrent callers share one in-flight login
 * - Transparent one-shot re-authentication when the appliance rejects the SID
 * - Logs the session out on shutdown
 */

import { APPLIANCE_API, APPLIANCE_LIMITS, type SessionStatus } from '@dnspresence/shared';
import {
  AuthenticationError,
  MalformedResponseError,
  SessionExpiredError,
  UnreachableError,
} from '../../utils/errors.js';
import { applianceHeaders, fetchWithStatus, isNetworkError } from '../../utils/http.js';
import { AuthResponseSchema, parseAuthResponse } from './parser.js';
import type { ApplianceSession } from './types.js';

export interface SessionManagerOptions {
  /** Normalized appliance base URL, e.g. http://192.168.1.2 */
  baseUrl: string;
  password?: string;
  timeoutMs?: number;
}

/**
 * Anything that can run work under a valid appliance session
 */
export interface SessionProvider {
  withSession<T>(work: (session: ApplianceSession) => Promise<T>): Promise<T>;
  invalidate(session?: ApplianceSession): void;
  updatePassword(password: string | undefined): Promise<void>;
  close(): Promise<void>;
}

export class SessionManager implements SessionProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private password: string | undefined;
  private session: ApplianceSession | null = null;
  private pending: Promise<ApplianceSession> | null = null;

  constructor(options: SessionManagerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.password = options.password;
    this.timeoutMs = options.timeoutMs ?? APPLIANCE_LIMITS.REQUEST_TIMEOUT_MS;
  }

  /**
   * Current session status without triggering authentication
   */
  get status(): SessionStatus {
    if (!this.session) return 'unauthenticated';
    return this.isExpired(this.session) ? 'expired' : 'authenticated';
  }

  /**
   * Return a valid session, authenticating if none is held or it has expired
   */
  async ensureSession(): Promise<ApplianceSession> {
    const held = this.session;
    if (held && !this.isExpired(held)) {
      return held;
    }
    if (held) {
      held.status = 'expired';
      this.session = null;
    }

    if (!this.pending) {
      this.pending = this.authenticate().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Run work under a session, re-authenticating once if the appliance
   * reports the session as expired
   */
  async withSession<T>(work: (session: ApplianceSession) => Promise<T>): Promise<T> {
    const session = await this.ensureSession();
    try {
      const result = await work(session);
      this.touch(session);
      return result;
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) throw error;
      console.warn('[Session] Appliance rejected the session, re-authenticating');
      this.invalidate(session);
    }

    const fresh = await this.ensureSession();
    try {
      const result = await work(fresh);
      this.touch(fresh);
      return result;
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        this.invalidate(fresh);
        throw new AuthenticationError('Appliance rejected a freshly issued session');
      }
      throw error;
    }
  }

  /**
   * Drop the held session. With an argument, only if it is still the held one.
   */
  invalidate(session?: ApplianceSession): void {
    if (!this.session) return;
    if (session && session !== this.session) return;
    this.session.status = 'expired';
    this.session = null;
  }

  /**
   * Swap credentials; the old session is logged out first
   */
  async updatePassword(password: string | undefined): Promise<void> {
    await this.close();
    this.password = password;
  }

  /**
   * Log the held session out. Failures are logged, never thrown.
   */
  async close(): Promise<void> {
    if (this.pending) {
      try {
        await this.pending;
      } catch (error) {
        console.warn('[Session] Pending authentication failed during close:', error);
      }
    }

    const session = this.session;
    this.session = null;
    if (!session?.sid) return;
    session.status = 'expired';

    try {
      const { ok, status } = await fetchWithStatus<unknown>(`${this.baseUrl}${APPLIANCE_API.AUTH}`, {
        method: 'DELETE',
        headers: applianceHeaders(session.sid),
        service: 'appliance',
        timeout: this.timeoutMs,
      });
      // 401 means the appliance already forgot the session
      if (!ok && status !== 401) {
        console.warn(`[Session] Logout returned HTTP ${status}`);
      } else {
        console.log('[Session] Logged out of appliance');
      }
    } catch (error) {
      console.warn('[Session] Logout failed:', error);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private isExpired(session: ApplianceSession): boolean {
    if (session.status !== 'authenticated') return true;
    if (session.expiresAt === null) return false;
    return Date.now() >= session.expiresAt.getTime() - APPLIANCE_LIMITS.SESSION_EXPIRY_MARGIN_MS;
  }

  /**
   * The appliance extends validity on every authenticated request
   */
  private touch(session: ApplianceSession): void {
    if (session !== this.session || session.validitySeconds === null) return;
    session.expiresAt = new Date(Date.now() + session.validitySeconds * 1000);
  }

  private rejected(reason: string | null | undefined): AuthenticationError {
    const detail = reason ?? 'password incorrect';
    return new AuthenticationError(
      this.password
        ? `Appliance rejected the password (${detail})`
        : `Appliance requires a password (${detail})`
    );
  }

  private async authenticate(): Promise<ApplianceSession> {
    const url = `${this.baseUrl}${APPLIANCE_API.AUTH}`;

    const response = await fetchWithStatus<unknown>(url, {
      method: 'POST',
      headers: applianceHeaders(),
      body: JSON.stringify({ password: this.password ?? '' }),
      service: 'appliance',
      timeout: this.timeoutMs,
    }).catch((error: unknown) => {
      if (isNetworkError(error)) {
        throw new UnreachableError(`Cannot reach appliance at ${this.baseUrl}`, { url });
      }
      throw error;
    });

    if (response.status === 429) {
      throw new AuthenticationError('Appliance is rate limiting login attempts');
    }
    if (response.status >= 500) {
      throw new UnreachableError(`Appliance login failed with HTTP ${response.status}`, { url });
    }
    if (response.status !== 401 && !response.ok) {
      throw new MalformedResponseError(`Unexpected login response: HTTP ${response.status}`, {
        url,
      });
    }

    if (response.status === 401) {
      const parsed = AuthResponseSchema.safeParse(response.data);
      throw this.rejected(parsed.success ? parsed.data.session.message : null);
    }
    const result = parseAuthResponse(response.data);
    if (!result.valid) {
      throw this.rejected(result.message);
    }

    const now = Date.now();
    const validitySeconds = result.validity != null && result.validity > 0 ? result.validity : null;
    const session: ApplianceSession = {
      sid: result.sid ?? null,
      status: 'authenticated',
      issuedAt: new Date(now),
      expiresAt: validitySeconds !== null ? new Date(now + validitySeconds * 1000) : null,
      validitySeconds,
    };

    console.log(
      session.sid
        ? `[Session] Authenticated with appliance (valid for ${validitySeconds ?? 'unlimited'}s)`
        : '[Session] Appliance has no password set, continuing without a session'
    );

    this.session = session;
    return session;
  }
}
