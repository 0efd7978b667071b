import { CookieJar } from 'tough-cookie';
import { SubmissionFailure, errorMessage } from './errors.js';

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

export type PageResult =
  | { ok: true; url: string; status: number; html: string }
  | { ok: false; url: string; status?: number; reason: string };

export interface HttpResponse {
  status: number;
  /** Final URL after redirects */
  url: string;
  body: string;
  contentType: string;
}

export interface HttpSessionOptions {
  timeoutMs: number;
  /** Cancels every request of the session */
  signal?: AbortSignal;
}

/**
 * One attempt's worth of HTTP: browser-like headers, a per-request timeout,
 * and a cookie jar for the attempt. Cookies are scoped by domain, path and
 * expiry, so a site's session cookie reaches its own image and form endpoints
 * and nothing else. No retries.
 */
export class HttpSession {
  private readonly cookieJar = new CookieJar();

  constructor(private readonly opts: HttpSessionOptions) {}

  /**
   * Single GET. Network errors, a body that fails to arrive and non-2xx
   * responses come back as `{ ok: false }`.
   */
  async getPage(url: string): Promise<PageResult> {
    try {
      const response = await this.fetch(url, { method: 'GET' });
      if (!response.ok) {
        return { ok: false, url, status: response.status, reason: `GET ${url} returned HTTP ${response.status}` };
      }
      const html = await response.text();
      return { ok: true, url: response.url || url, status: response.status, html };
    } catch (err) {
      this.rethrowIfCancelled(err);
      return { ok: false, url, reason: `GET ${url} failed: ${errorMessage(err)}` };
    }
  }

  async getBytes(url: string): Promise<Uint8Array> {
    const response = await this.fetch(url, { method: 'GET' });
    if (!response.ok) {
      throw new Error(`GET ${url} returned HTTP ${response.status}`);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Send a form. Redirects are followed; the response is returned whatever
   * its status. A transport failure, including a body that breaks off, is a
   * `fetch_failed` SubmissionFailure.
   */
  async send(url: string, init: { method: 'GET' | 'POST'; body?: URLSearchParams }): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    if (init.body) headers['Content-Type'] = 'application/x-www-form-urlencoded';

    try {
      const response = await this.fetch(url, { method: init.method, body: init.body?.toString(), headers });
      return {
        status: response.status,
        url: response.url || url,
        body: await response.text(),
        contentType: response.headers.get('content-type') ?? '',
      };
    } catch (err) {
      this.rethrowIfCancelled(err);
      throw new SubmissionFailure('fetch_failed', `${init.method} ${url} failed: ${errorMessage(err)}`);
    }
  }

  private async fetch(
    url: string,
    init: { method: string; body?: string; headers?: Record<string, string> },
  ): Promise<Response> {
    const signals = [AbortSignal.timeout(this.opts.timeoutMs)];
    if (this.opts.signal) signals.push(this.opts.signal);

    const headers: Record<string, string> = { ...BROWSER_HEADERS, ...init.headers };
    const cookie = await this.cookieJar.getCookieString(url);
    if (cookie) headers.Cookie = cookie;

    const response = await fetch(url, {
      method: init.method,
      body: init.body,
      headers,
      redirect: 'follow',
      signal: AbortSignal.any(signals),
    });
    await this.storeCookies(response, url);
    return response;
  }

  private rethrowIfCancelled(err: unknown): void {
    if (this.opts.signal?.aborted) throw err;
  }

  private async storeCookies(response: Response, requestUrl: string): Promise<void> {
    // Only the final hop's Set-Cookie headers are visible after redirects
    const setBy = response.url || requestUrl;
    for (const raw of response.headers.getSetCookie()) {
      await this.cookieJar.setCookie(raw, setBy, { ignoreError: true });
    }
  }
}
