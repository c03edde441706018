/**
 * Portal HTTP Client
 * fetch-based transport with per-domain cookie handling across redirects
 */
import { CookieJar } from './cookieJar';
import { PortalApiError } from './errors';
import type {
  HttpClient,
  HttpRequestOptions,
  HttpResponse,
  StoredCookie,
} from './types';

const USER_AGENT = 'solar-portal-client/1.0';
const MAX_REDIRECTS = 10;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Encode a form body as application/x-www-form-urlencoded
 */
export function encodeForm(form: Record<string, string | number>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    params.append(key, String(value));
  }
  return params.toString();
}

/**
 * HTTP client shared by portal clients. Owns the only copy of the session cookies.
 */
export class PortalHttpClient implements HttpClient {
  readonly cookieJar: CookieJar;

  constructor(cookieJar: CookieJar = new CookieJar()) {
    this.cookieJar = cookieJar;
  }

  /**
   * Send a request, following redirects hop by hop so that cookies set on
   * every hop reach the jar. 301/302 after POST and 303 continue as GET.
   */
  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const signal = AbortSignal.timeout(options.timeoutMs);
    let currentUrl = url;
    let method = options.method;
    let body = options.form ? encodeForm(options.form) : undefined;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const headers: Record<string, string> = {
        'User-Agent': USER_AGENT,
        'Accept': '*/*',
        ...options.headers,
      };

      const cookieHeader = this.cookieJar.headerFor(currentUrl);
      if (cookieHeader) {
        headers['Cookie'] = cookieHeader;
      }
      if (body !== undefined) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
      }

      const response = await fetch(currentUrl, {
        method,
        headers,
        body,
        redirect: 'manual',
        signal,
      });

      this.cookieJar.setFromHeaders(currentUrl, response.headers.getSetCookie());

      const location = response.headers.get('location');
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return {
          status: response.status,
          ok: response.ok,
          text: () => response.text(),
        };
      }

      await response.body?.cancel();
      currentUrl = new URL(location, currentUrl).toString();
      if (response.status === 303 || (method === 'POST' && response.status !== 307 && response.status !== 308)) {
        method = 'GET';
        body = undefined;
      }
    }

    throw new PortalApiError(`Too many redirects for ${url}`);
  }

  findCookie(domain: string, name: string): StoredCookie | undefined {
    return this.cookieJar.find(domain, name);
  }
}
