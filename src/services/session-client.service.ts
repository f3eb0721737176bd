import { httpRequest, type HttpMethod, type HttpResponse } from '../utils/http-request';

export type CookieJar = Readonly<Record<string, string>>;

export interface SessionRequest {
  readonly method?: HttpMethod;
  readonly cookies?: CookieJar;
  readonly form?: Readonly<Record<string, string>>;
  readonly json?: unknown;
  readonly body?: Buffer;
  readonly contentType?: string;
  readonly query?: Readonly<Record<string, string>>;
  readonly headers?: Readonly<Record<string, string>>;
  readonly timeoutMs?: number;
}

export interface SessionResponse extends HttpResponse {
  /** Request cookies with every Set-Cookie of the response applied */
  readonly cookies: CookieJar;
  /** Names of cookies the response set */
  readonly setCookieNames: readonly string[];
}

export type HttpTransport = typeof httpRequest;

/** Parse Set-Cookie header values into name/value pairs (attributes ignored). */
export function parseSetCookie(values: readonly string[] | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const header of values ?? []) {
    const pair = header.split(';', 1)[0] ?? '';
    const idx = pair.indexOf('=');
    if (idx <= 0) continue;
    result[pair.slice(0, idx).trim()] = pair.slice(idx + 1).trim();
  }
  return result;
}

export function serializeCookies(cookies: CookieJar): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * HTTP helper for one device's web interface. Holds no cookies itself: the
 * caller passes the jar in and gets the updated jar back.
 */
export class SessionClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: HttpTransport;

  constructor(baseUrl: string, options: { timeoutMs?: number; transport?: HttpTransport } = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.transport = options.transport ?? httpRequest;
  }

  url(path: string, query?: Readonly<Record<string, string>>): string {
    const qs = query ? new URLSearchParams(query).toString() : '';
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;
  }

  async request(path: string, req: SessionRequest = {}): Promise<SessionResponse> {
    const headers: Record<string, string> = { ...req.headers };
    const jar: CookieJar = req.cookies ?? {};
    if (Object.keys(jar).length > 0) {
      headers.Cookie = serializeCookies(jar);
    }

    let body: string | Buffer | undefined;
    if (req.form) {
      body = new URLSearchParams(req.form).toString();
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    } else if (req.json !== undefined) {
      body = JSON.stringify(req.json);
      headers['Content-Type'] = 'application/json';
    } else if (req.body) {
      body = req.body;
      headers['Content-Type'] = req.contentType ?? 'application/octet-stream';
    }

    const method = req.method ?? (body === undefined ? 'GET' : 'POST');
    const response = await this.transport(this.url(path, req.query), {
      method,
      headers,
      body,
      timeoutMs: req.timeoutMs ?? this.timeoutMs,
    });

    const set = parseSetCookie(response.headers['set-cookie']);
    return {
      ...response,
      cookies: { ...jar, ...set },
      setCookieNames: Object.keys(set),
    };
  }
}
