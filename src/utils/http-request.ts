import http from 'http';
import https from 'https';
import { UnreachableError, toGatewayError } from './errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequestOptions {
  readonly method?: HttpMethod;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string | Buffer;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly headers: http.IncomingHttpHeaders;
  readonly body: string;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Single HTTP(S) exchange. Redirects are returned to the caller, not followed:
 * device login pages answer with 302 and the caller needs to see it.
 */
export function httpRequest(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
  const { method = 'GET', headers = {}, body, timeoutMs = DEFAULT_TIMEOUT_MS } = options;
  const transport = url.startsWith('https:') ? https : http;

  return new Promise((resolve, reject) => {
    const requestHeaders: Record<string, string | number> = {
      'User-Agent': 'print-fleet-gateway',
      ...headers,
    };
    if (body !== undefined) {
      requestHeaders['Content-Length'] = Buffer.byteLength(body);
    }

    const req = transport.request(url, { method, headers: requestHeaders }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => { chunks.push(chunk); });
      res.on('end', () => {
        resolve({
          statusCode: res.statusCode || 0,
          headers: res.headers,
          body: Buffer.concat(chunks).toString('utf-8'),
        });
      });
      res.on('error', (error) => reject(toGatewayError(error)));
    });

    req.on('error', (error) => reject(toGatewayError(error)));
    req.setTimeout(timeoutMs, () => {
      req.destroy();
      reject(new UnreachableError(`${method} ${url} timed out after ${timeoutMs}ms`));
    });

    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
}

export function isSuccess(response: HttpResponse): boolean {
  return response.statusCode >= 200 && response.statusCode < 300;
}
