/**
 * Cookie Jar
 * In-memory per-domain cookie store fed from Set-Cookie response headers
 */
import type { StoredCookie } from './types';
import { MILLISECONDS_PER_SECOND } from '../utils/dateUtils';

/**
 * Parse a single Set-Cookie header into a cookie.
 * Returns null for headers without a name=value pair.
 */
export function parseSetCookie(
  header: string,
  requestUrl: URL,
  now: number = Date.now(),
): StoredCookie | null {
  const [pair, ...attributes] = header.split(';');
  const separator = pair.indexOf('=');
  if (separator <= 0) {
    return null;
  }

  const cookie: StoredCookie = {
    name: pair.slice(0, separator).trim(),
    value: pair.slice(separator + 1).trim(),
    domain: requestUrl.hostname.toLowerCase(),
    path: '/',
    createdAt: now,
  };

  let expiresAt: number | undefined;
  for (const attribute of attributes) {
    const eq = attribute.indexOf('=');
    const attrName = (eq === -1 ? attribute : attribute.slice(0, eq)).trim().toLowerCase();
    const attrValue = eq === -1 ? '' : attribute.slice(eq + 1).trim();

    switch (attrName) {
      case 'domain': {
        const domain = attrValue.replace(/^\./, '').toLowerCase();
        // A Domain the request host does not belong to is ignored
        if (domain && domainMatches(cookie.domain, domain)) {
          cookie.domain = domain;
        }
        break;
      }
      case 'path':
        if (attrValue.startsWith('/')) {
          cookie.path = attrValue;
        }
        break;
      case 'max-age': {
        const seconds = Number(attrValue);
        if (attrValue !== '' && Number.isInteger(seconds)) {
          cookie.maxAge = seconds;
        }
        break;
      }
      case 'expires': {
        const time = Date.parse(attrValue);
        if (!Number.isNaN(time)) {
          expiresAt = time;
        }
        break;
      }
      default:
        break;
    }
  }

  // Max-Age wins over Expires
  if (cookie.maxAge !== undefined) {
    cookie.expiresAt = now + cookie.maxAge * MILLISECONDS_PER_SECOND;
  } else if (expiresAt !== undefined) {
    cookie.expiresAt = expiresAt;
  }

  return cookie;
}

function isExpired(cookie: StoredCookie, now: number): boolean {
  return cookie.expiresAt !== undefined && cookie.expiresAt <= now;
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) {
    return true;
  }
  if (!requestPath.startsWith(cookiePath)) {
    return false;
  }
  return cookiePath.endsWith('/') || requestPath[cookiePath.length] === '/';
}

/**
 * Cookie store keyed by domain, then by name and path
 */
export class CookieJar {
  private cookies: Map<string, Map<string, StoredCookie>> = new Map();

  get size(): number {
    let count = 0;
    for (const byKey of this.cookies.values()) {
      count += byKey.size;
    }
    return count;
  }

  /**
   * Store cookies from a response's Set-Cookie headers
   */
  setFromHeaders(requestUrl: string, setCookieHeaders: string[], now: number = Date.now()): void {
    const url = new URL(requestUrl);
    for (const header of setCookieHeaders) {
      const cookie = parseSetCookie(header, url, now);
      if (!cookie) {
        continue;
      }

      let byKey = this.cookies.get(cookie.domain);
      if (!byKey) {
        byKey = new Map();
        this.cookies.set(cookie.domain, byKey);
      }

      const key = `${cookie.name};${cookie.path}`;
      if (isExpired(cookie, now)) {
        // Server-side deletion
        byKey.delete(key);
      } else {
        byKey.set(key, cookie);
      }
    }
  }

  /**
   * Find an unexpired cookie by exact domain and name
   */
  find(domain: string, name: string, now: number = Date.now()): StoredCookie | undefined {
    const byKey = this.cookies.get(domain);
    if (!byKey) {
      return undefined;
    }
    for (const cookie of byKey.values()) {
      if (cookie.name === name && !isExpired(cookie, now)) {
        return cookie;
      }
    }
    return undefined;
  }

  /**
   * Build the Cookie header for a request, or undefined if no cookie applies
   */
  headerFor(requestUrl: string, now: number = Date.now()): string | undefined {
    const url = new URL(requestUrl);
    const host = url.hostname.toLowerCase();
    const pairs: string[] = [];

    for (const [domain, byKey] of this.cookies) {
      if (!domainMatches(host, domain)) {
        continue;
      }
      for (const cookie of byKey.values()) {
        if (!isExpired(cookie, now) && pathMatches(url.pathname, cookie.path)) {
          pairs.push(`${cookie.name}=${cookie.value}`);
        }
      }
    }

    return pairs.length > 0 ? pairs.join('; ') : undefined;
  }

  clear(): void {
    this.cookies.clear();
  }
}
