/**
 * Minimal in-memory cookie jar for the upstream session.
 *
 * undici parses the `Set-Cookie` headers; the jar only stores and matches:
 * host-only and `Domain=` cookies, `Path`, `Max-Age` / `Expires`.
 * Secure/SameSite flags are ignored since every upstream URL is HTTPS.
 */

import { getSetCookies, type Cookie, type Headers } from 'undici';

export interface StoredCookie {
  name: string;
  value: string;
  /** Lowercased domain without a leading dot */
  domain: string;
  hostOnly: boolean;
  path: string;
  /** Epoch milliseconds, undefined for session cookies */
  expiresAt?: number;
}

function defaultPath(pathname: string): string {
  if (!pathname.startsWith('/')) return '/';
  const lastSlash = pathname.lastIndexOf('/');
  return lastSlash <= 0 ? '/' : pathname.slice(0, lastSlash);
}

function domainMatches(host: string, cookie: StoredCookie): boolean {
  if (cookie.hostOnly) return host === cookie.domain;
  return host === cookie.domain || host.endsWith(`.${cookie.domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith('/') || requestPath.charAt(cookiePath.length) === '/';
}

function expiryOf(cookie: Cookie, now: number): number | undefined {
  // Max-Age takes precedence over Expires
  if (cookie.maxAge !== undefined) return now + cookie.maxAge * 1000;
  if (cookie.expires === undefined) return undefined;
  const expires = cookie.expires instanceof Date ? cookie.expires.getTime() : cookie.expires;
  return Number.isNaN(expires) ? undefined : expires;
}

/**
 * Turn a cookie parsed by undici into a stored one. Returns null for a cookie
 * without a name or whose Domain does not cover the request host.
 */
export function toStoredCookie(cookie: Cookie, requestUrl: URL, now: number = Date.now()): StoredCookie | null {
  // getSetCookies yields null for lines it cannot parse at all
  if (!cookie?.name) return null;

  const host = requestUrl.hostname.toLowerCase();
  const domain = cookie.domain?.replace(/^\./, '').toLowerCase();
  if (domain && host !== domain && !host.endsWith(`.${domain}`)) return null;

  return {
    name: cookie.name,
    value: cookie.value,
    domain: domain || host,
    hostOnly: !domain,
    path: cookie.path?.startsWith('/') ? cookie.path : defaultPath(requestUrl.pathname),
    expiresAt: expiryOf(cookie, now),
  };
}

/** Every `Set-Cookie` of a response, parsed and checked against the request URL. */
export function parseSetCookies(headers: Headers, requestUrl: URL, now: number = Date.now()): StoredCookie[] {
  return getSetCookies(headers)
    .map((cookie) => toStoredCookie(cookie, requestUrl, now))
    .filter((cookie): cookie is StoredCookie => cookie !== null);
}

export class CookieJar {
  private cookies = new Map<string, StoredCookie>();

  private static key(cookie: StoredCookie): string {
    return `${cookie.domain};${cookie.path};${cookie.name}`;
  }

  /** Store every `Set-Cookie` of a response. Returns the accepted cookies. */
  store(headers: Headers, requestUrl: string | URL, now: number = Date.now()): StoredCookie[] {
    const url = typeof requestUrl === 'string' ? new URL(requestUrl) : requestUrl;
    const accepted: StoredCookie[] = [];

    for (const cookie of parseSetCookies(headers, url, now)) {
      const key = CookieJar.key(cookie);
      if (cookie.expiresAt !== undefined && cookie.expiresAt <= now) {
        this.cookies.delete(key);
        continue;
      }
      this.cookies.set(key, cookie);
      accepted.push(cookie);
    }

    return accepted;
  }

  /** Cookies applicable to a URL, longest path first. */
  match(requestUrl: string | URL, now: number = Date.now()): StoredCookie[] {
    const url = typeof requestUrl === 'string' ? new URL(requestUrl) : requestUrl;
    const host = url.hostname.toLowerCase();
    const path = url.pathname || '/';
    const matched: StoredCookie[] = [];

    for (const [key, cookie] of this.cookies) {
      if (cookie.expiresAt !== undefined && cookie.expiresAt <= now) {
        this.cookies.delete(key);
        continue;
      }
      if (domainMatches(host, cookie) && pathMatches(path, cookie.path)) {
        matched.push(cookie);
      }
    }

    return matched.sort((a, b) => b.path.length - a.path.length);
  }

  /** `Cookie` request header value for a URL, or undefined when nothing applies. */
  headerFor(requestUrl: string | URL, now: number = Date.now()): string | undefined {
    const matched = this.match(requestUrl, now);
    if (matched.length === 0) return undefined;
    return matched.map((c) => `${c.name}=${c.value}`).join('; ');
  }

  get size(): number {
    return this.cookies.size;
  }

  clear(): void {
    this.cookies.clear();
  }
}
