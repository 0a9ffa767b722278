import { AuthError, InvalidRequestError, TransientNetworkError } from '../errors';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Request/response exchange used by the job client. Implementations throw
 * TransientNetworkError when no response could be obtained; any HTTP status
 * is returned as a response.
 */
export interface HttpTransport {
  send(req: HttpRequest): Promise<HttpResponse>;
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Transport over the global fetch. Each request is bounded by `timeoutMs`.
 */
export class FetchTransport implements HttpTransport {
  async send(req: HttpRequest): Promise<HttpResponse> {
    try {
      const resp = await fetch(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: AbortSignal.timeout(req.timeoutMs)
      });
      return { status: resp.status, body: await resp.text() };
    } catch (e) {
      throw new TransientNetworkError(`${req.method} ${req.url} failed: ${describeError(e)}`);
    }
  }
}

/**
 * Map a non-2xx response onto the error taxonomy. Returns normally for 2xx.
 */
export function assertOk(resp: HttpResponse, what: string): void {
  const { status, body } = resp;
  if (status >= 200 && status < 300) return;
  const message = `${what} failed: HTTP ${status}${body ? ` ${truncate(body, 200)}` : ''}`;
  if (status === 401 || status === 403) throw new AuthError(message, status, body);
  // request timeout and throttling are worth another attempt
  if (status === 408 || status === 429 || status >= 500) throw new TransientNetworkError(message, status, body);
  throw new InvalidRequestError(message, status, body);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…(${text.length} chars)` : text;
}
