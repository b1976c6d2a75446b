import type { Logger } from '../logger.js';
import type { CapitalCredentials } from '../config.js';
import { AuthError, FetchError, errorMessage } from '../lib/errors.js';
import type { CapitalHttpTransport } from './capitalHttp.js';

/** Capital.com drops a session after 10 minutes. */
export const SESSION_VALIDITY_MS = 10 * 60 * 1000;

export interface CapitalSession {
  cst: string;
  securityToken: string;
  createdAtMs: number;
}

/** Runs a session request in the shared request schedule. */
export type PaceFn = <T>(task: () => Promise<T>) => Promise<T>;

export interface SessionManagerOptions {
  transport: CapitalHttpTransport;
  pace?: PaceFn;
  credentials: CapitalCredentials;
  logger: Logger;
  validityMs?: number;
  now?: () => number;
}

/**
 * Owns the provider session: authenticates, tracks token age, and
 * re-authenticates transparently once the validity window has elapsed.
 */
export class SessionManager {
  private session: CapitalSession | null = null;
  private authCount = 0;
  private readonly transport: CapitalHttpTransport;
  private readonly pace: PaceFn;
  private readonly credentials: CapitalCredentials;
  private readonly logger: Logger;
  private readonly validityMs: number;
  private readonly now: () => number;

  constructor(options: SessionManagerOptions) {
    this.transport = options.transport;
    this.pace = options.pace ?? ((task) => task());
    this.credentials = options.credentials;
    this.logger = options.logger;
    this.validityMs = options.validityMs ?? SESSION_VALIDITY_MS;
    this.now = options.now ?? Date.now;
  }

  get current(): CapitalSession | null {
    return this.session;
  }

  /** Number of successful authentications so far. */
  get authenticationCount(): number {
    return this.authCount;
  }

  isExpired(nowMs: number = this.now()): boolean {
    return !this.session || nowMs - this.session.createdAtMs >= this.validityMs;
  }

  async authenticate(credentials: CapitalCredentials = this.credentials): Promise<CapitalSession> {
    let headers: Headers;
    try {
      const response = await this.pace(() =>
        this.transport.send({
          method: 'POST',
          path: '/api/v1/session',
          label: 'Create session',
          headers: { 'X-CAP-API-KEY': credentials.apiKey },
          body: {
            identifier: credentials.identifier,
            password: credentials.password,
            encryptedPassword: false,
          },
        }),
      );
      headers = response.headers;
    } catch (err: unknown) {
      this.session = null;
      const status = err instanceof FetchError ? err.httpStatus : null;
      throw new AuthError(`Authentication failed: ${errorMessage(err)}`, { httpStatus: status, cause: err });
    }

    const cst = String(headers.get('cst') || '').trim();
    const securityToken = String(headers.get('x-security-token') || '').trim();
    if (!cst || !securityToken) {
      this.session = null;
      throw new AuthError('Authentication failed: session tokens missing from response headers');
    }

    this.session = { cst, securityToken, createdAtMs: this.now() };
    this.authCount += 1;
    this.logger.info({ event: 'session_created', authCount: this.authCount }, 'Capital.com session created');
    return this.session;
  }

  /** Return a live session, authenticating first if it is absent or expired. */
  async ensureSession(): Promise<CapitalSession> {
    if (this.session && !this.isExpired()) return this.session;
    if (this.session) {
      this.logger.info({ event: 'session_expired', ageMs: this.now() - this.session.createdAtMs }, 'Session expired; re-authenticating');
    }
    return this.authenticate();
  }

  async authHeaders(): Promise<Record<string, string>> {
    const session = await this.ensureSession();
    return { CST: session.cst, 'X-SECURITY-TOKEN': session.securityToken };
  }

  /** Keep-alive. Failures are logged, never thrown. */
  async ping(): Promise<boolean> {
    const session = this.session;
    if (!session) return false;
    try {
      await this.pace(() =>
        this.transport.send({
          method: 'GET',
          path: '/api/v1/ping',
          label: 'Ping',
          headers: { CST: session.cst, 'X-SECURITY-TOKEN': session.securityToken },
        }),
      );
      this.logger.debug({ event: 'session_ping' }, 'Session keep-alive sent');
      return true;
    } catch (err: unknown) {
      this.logger.warn({ event: 'session_ping_failed', error: errorMessage(err) }, 'Session keep-alive failed');
      return false;
    }
  }

  /** Forget the stored session so the next call re-authenticates. */
  invalidate(): void {
    this.session = null;
  }

  async logout(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;
    try {
      await this.pace(() =>
        this.transport.send({
          method: 'DELETE',
          path: '/api/v1/session',
          label: 'Logout',
          headers: { CST: session.cst, 'X-SECURITY-TOKEN': session.securityToken },
        }),
      );
      this.logger.info({ event: 'session_closed' }, 'Capital.com session closed');
    } catch (err: unknown) {
      this.logger.warn({ event: 'session_logout_failed', error: errorMessage(err) }, 'Logout failed');
    }
  }
}
