import type { Session } from '../models/device.model';
import { isSessionExpired } from '../models/device.model';
import {
  SessionClient,
  type CookieJar,
  type HttpTransport,
  type SessionRequest,
  type SessionResponse,
} from '../services/session-client.service';
import { AuthenticationFailedError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { AdapterContext } from './adapter';

export const SESSION_TTL_MS = 15 * 60 * 1000;

export interface SessionAdapterOptions {
  readonly transport?: HttpTransport;
  readonly webPort?: number;
  readonly timeoutMs?: number;
}

/**
 * Shared session handling for adapters that talk to a device web interface.
 * A request answered as unauthenticated gets exactly one re-login and one
 * retry; a second rejection is AuthenticationFailed.
 */
export abstract class SessionAdapter {
  protected readonly client: SessionClient;

  protected constructor(protected readonly ctx: AdapterContext, options: SessionAdapterOptions = {}) {
    const port = options.webPort ?? 80;
    const host = port === 80 ? ctx.address : `${ctx.address}:${port}`;
    this.client = new SessionClient(`http://${host}`, {
      timeoutMs: options.timeoutMs,
      transport: options.transport,
    });
  }

  abstract authenticate(): Promise<void>;

  protected isUnauthenticated(res: SessionResponse): boolean {
    if (res.statusCode === 401 || res.statusCode === 403) return true;
    if (res.statusCode === 301 || res.statusCode === 302 || res.statusCode === 303) {
      const location = res.headers.location ?? '';
      return /login/i.test(location);
    }
    return false;
  }

  protected storeSession(cookies: CookieJar): Session {
    const now = Date.now();
    const session: Session = {
      deviceId: this.ctx.deviceId,
      cookies,
      issuedAt: new Date(now).toISOString(),
      expiresAt: new Date(now + SESSION_TTL_MS).toISOString(),
    };
    this.ctx.session.replace(session);
    return session;
  }

  private async currentCookies(): Promise<CookieJar> {
    const existing = this.ctx.session.get();
    if (existing && !isSessionExpired(existing)) return existing.cookies;
    await this.authenticate();
    return this.ctx.session.get()?.cookies ?? {};
  }

  protected async sessionRequest(path: string, req: SessionRequest = {}): Promise<SessionResponse> {
    const first = await this.client.request(path, { ...req, cookies: await this.currentCookies() });
    if (!this.isUnauthenticated(first)) return first;

    logger.warn({ deviceId: this.ctx.deviceId, path, status: first.statusCode }, 'Session rejected, re-authenticating');
    this.ctx.session.replace(null);
    await this.authenticate();

    const second = await this.client.request(path, { ...req, cookies: this.ctx.session.get()?.cookies ?? {} });
    if (this.isUnauthenticated(second)) {
      this.ctx.session.replace(null);
      throw new AuthenticationFailedError(
        `Device rejected the session again after re-authentication (${path})`,
        this.ctx.deviceId
      );
    }
    return second;
  }
}
