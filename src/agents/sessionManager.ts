/**
 * sessionManager.ts — Authenticated access to the router's management pages.
 *
 * The router can drop a session at any moment; when that happens it serves
 * its login form instead of the requested page.  The manager hides this from
 * the reporters:
 *   1. **Cookie persistence** — reuses the cookie saved by a previous run.
 *   2. **Login** — posts the credentials and saves the new cookie.
 *   3. **Re-authentication** — a rejected fetch triggers a login and the same
 *      fetch again, at most `maxReauth` times.
 *
 * States: no-session → authenticating → authenticated, and back to
 * authenticating whenever a fetch comes back with the login form.
 */

import { DateTime } from 'luxon';
import { Logger } from '../core/logger';
import { AuthenticationError, TransportError } from '../core/errors';
import {
  ACCOUNT_ID,
  LOGIN_PATH,
  type Credentials,
  type FetchedPage,
  type PluginConfig,
  type Session,
  type SessionState,
} from '../core/types';
import type { HttpTransport, LightFetchResult } from '../middleware/lightFetcher';
import type { StateStore } from './sessionStore';

const logger = new Logger('SessionManager');

/** Turn Set-Cookie header values into a Cookie request header. */
export function cookieHeaderFrom(
  setCookie: string | string[] | undefined,
): string | null {
  if (setCookie === undefined) return null;
  const values = Array.isArray(setCookie) ? setCookie : [setCookie];
  const pairs = values
    .map((value) => value.split(';')[0].trim())
    .filter((pair) => pair.includes('='));
  return pairs.length > 0 ? pairs.join('; ') : null;
}

export class SessionManager {
  private state: SessionState = 'no-session';
  private session: Session | null = null;
  private cacheChecked = false;

  constructor(
    private readonly config: PluginConfig,
    private readonly transport: HttpTransport,
    private readonly store: StateStore,
  ) {}

  getState(): SessionState {
    return this.state;
  }

  /**
   * Return a usable session, logging in when there is none.
   *
   * The persisted cookie is consulted once per run; after a rejected fetch
   * only a fresh login can restore the session.
   *
   * @throws AuthenticationError on bad or missing credentials.
   * @throws TransportError when the login request gets no usable response.
   */
  async ensureAuthenticated(): Promise<Session> {
    if (this.state === 'authenticated' && this.session) {
      return this.session;
    }

    if (!this.cacheChecked) {
      this.cacheChecked = true;
      const cached = await this.loadCachedSession();
      if (cached) {
        this.session = cached;
        this.state = 'authenticated';
        return cached;
      }
    }

    return this.login();
  }

  /**
   * GET a page relative to the base URL with the session cookie attached.
   *
   * @throws TransportError when the router is unreachable or answers with an
   *   unexpected status.
   * @throws AuthenticationError when the session keeps being rejected.
   */
  async fetch(path: string): Promise<FetchedPage> {
    const url = this.config.baseUrl + path;
    let reauthentications = 0;

    for (;;) {
      const session = await this.ensureAuthenticated();
      const response = await this.transport(url, {
        method: 'GET',
        cookieHeader: session.token,
        headers: { 'user-agent': this.config.userAgent },
        timeout: this.config.timeoutMs,
        followRedirect: true,
      });

      if (!this.isSessionRejected(response)) {
        if (response.statusCode < 200 || response.statusCode >= 300) {
          throw new TransportError(`GET ${url} answered HTTP ${response.statusCode}`);
        }
        const page: FetchedPage = { url, body: response.body };
        await this.store.savePage(page);
        logger.info(`Fetched ${url} (${response.body.length} bytes)`);
        return page;
      }

      if (reauthentications >= this.config.maxReauth) {
        throw new AuthenticationError(
          `Session still rejected for ${url} after ${reauthentications} re-authentication(s)`,
        );
      }

      reauthentications += 1;
      logger.warn(`Session rejected for ${url}, re-authenticating…`);
      this.session = null;
      this.state = 'authenticating';
    }
  }

  // ── Login ──────────────────────────────────────────────

  private credentials(): Credentials {
    if (!this.config.password) {
      throw new AuthenticationError(
        'Cannot log in: FREEBOX_PASSWORD is not set',
      );
    }
    return { accountId: ACCOUNT_ID, secret: this.config.password };
  }

  private async login(): Promise<Session> {
    this.state = 'authenticating';
    const { accountId, secret } = this.credentials();
    const url = this.config.baseUrl + LOGIN_PATH;

    logger.info(`Logging in to ${url}…`);

    const response = await this.transport(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        'user-agent': this.config.userAgent,
      },
      body: new URLSearchParams({ login: accountId, password: secret }).toString(),
      timeout: this.config.timeoutMs,
      followRedirect: false,
    });

    if (response.statusCode >= 400) {
      this.state = 'no-session';
      throw new TransportError(`POST ${url} answered HTTP ${response.statusCode}`);
    }

    if (response.body.includes(this.config.badPassMarker)) {
      this.state = 'no-session';
      throw new AuthenticationError('Login rejected: wrong password');
    }

    const token = cookieHeaderFrom(response.headers['set-cookie']);
    if (token === null) {
      this.state = 'no-session';
      throw new AuthenticationError('Login response carried no session cookie');
    }

    const session: Session = {
      token,
      acquiredAt: DateTime.utc().toISO(),
    };
    await this.store.saveSession(session);

    this.session = session;
    this.state = 'authenticated';
    logger.info('Login successful');
    return session;
  }

  // ── Helpers ────────────────────────────────────────────

  private async loadCachedSession(): Promise<Session | null> {
    const saved = await this.store.loadSession();
    if (!saved) return null;

    if (this.config.cookieTtlHours > 0) {
      const acquired = DateTime.fromISO(saved.acquiredAt);
      if (!acquired.isValid) {
        logger.warn(`Saved session has an unreadable timestamp "${saved.acquiredAt}", discarding`);
        return null;
      }
      const ageHours = DateTime.utc().diff(acquired, 'hours').hours;
      if (ageHours > this.config.cookieTtlHours) {
        logger.info(
          `Saved session is ${ageHours.toFixed(1)}h old ` +
            `(TTL: ${this.config.cookieTtlHours}h), discarding`,
        );
        return null;
      }
    }

    logger.debug(`Reusing session acquired at ${saved.acquiredAt}`);
    return saved;
  }

  private isSessionRejected(response: LightFetchResult): boolean {
    if (response.statusCode === 401 || response.statusCode === 403) return true;
    return (
      response.statusCode >= 200 &&
      response.statusCode < 300 &&
      response.body.includes(this.config.badPassMarker)
    );
  }
}
