/**
 * Upstream client for anime1.me
 *
 * Every call runs on a session context (one undici Agent + one cookie jar).
 * The context is created lazily and can be reset to recover from a wedged
 * session. Calls lease the context they start on; a reset retires the old
 * context and closes its pool only after the last lease on it is released,
 * so in-flight pages and open video streams are never cut off by a reset.
 */

import { fetch as undiciFetch, Agent, type Response } from 'undici';
import { CookieJar, parseSetCookies } from './cookie-jar.js';
import { parsePage } from './extractor.js';
import {
  RESOLVE_API_URL,
  UPSTREAM_HOST,
  UPSTREAM_URL,
  getApiHeaders,
  getPageHeaders,
  getVideoHeaders,
} from './headers.js';
import type { Category, PageContent, Post, ResolvedVideo } from '../types.js';
import {
  InvalidUrlError,
  MalformedPageError,
  RelayError,
  UpstreamError,
  UpstreamUnavailableError,
} from '../types.js';
import { isDebugEnabled } from './debug.js';

/** Seconds subtracted from the upstream expiry to stay clear of the boundary. */
export const EXPIRE_OFFSET_SECONDS = 5;

const DEFAULT_TIMEOUT_MS = 30000;

// HTTP/2 omits reason phrases
const HTTP_STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  410: 'Gone',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export interface UpstreamClientOptions {
  /** Timeout for page and API calls, and for video calls until headers arrive (ms) */
  timeoutMs?: number;
}

interface SessionContext {
  id: number;
  agent: Agent;
  jar: CookieJar;
  leases: number;
  retired: boolean;
}

/** A response from the backing video server, bound to the session it was opened on. */
export interface VideoResponse {
  response: Response;
  /** Releases the session lease. Idempotent. */
  release(): void;
}

interface ResolvePayload {
  s: Array<{ src: string; type: string }>;
}

function isResolvePayload(value: unknown): value is ResolvePayload {
  if (typeof value !== 'object' || value === null || !('s' in value)) return false;
  const sources = value.s;
  if (!Array.isArray(sources) || sources.length === 0) return false;
  const first: unknown = sources[0];
  return typeof first === 'object' && first !== null &&
    'src' in first && typeof first.src === 'string' &&
    'type' in first && typeof first.type === 'string';
}

function causeDetail(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
    return `${cause.message} ${code}`.trim();
  }
  return typeof cause === 'string' ? cause : '';
}

function isAbortError(error: unknown): error is Error {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * True when the URL belongs to the upstream site (the host itself or any of
 * its subdomains). Never throws.
 */
export function isUpstreamUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
    const host = parsed.hostname.toLowerCase();
    return host === UPSTREAM_HOST || host.endsWith(`.${UPSTREAM_HOST}`);
  } catch {
    return false;
  }
}

export class UpstreamClient {
  private readonly timeoutMs: number;
  private session: SessionContext | null = null;
  private nextSessionId = 1;
  private closed = false;
  private readonly closing = new Set<Promise<void>>();

  constructor(options: UpstreamClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  // ── Session lifecycle ───────────────────────────────────────────────────────

  private createSession(): SessionContext {
    const session: SessionContext = {
      id: this.nextSessionId++,
      agent: new Agent({
        connections: 16,
        keepAliveTimeout: 60000,
        keepAliveMaxTimeout: 60000,
      }),
      jar: new CookieJar(),
      leases: 0,
      retired: false,
    };
    if (isDebugEnabled()) console.debug('[relay]', `upstream session #${session.id} created`);
    return session;
  }

  private acquire(): { session: SessionContext; release: () => void } {
    if (this.closed) {
      throw new RelayError('Upstream client is closed', 'CLOSED');
    }
    if (!this.session) {
      this.session = this.createSession();
    }

    const session = this.session;
    session.leases++;
    let released = false;

    return {
      session,
      release: () => {
        if (released) return;
        released = true;
        session.leases--;
        if (session.retired && session.leases === 0) {
          this.dispose(session);
        }
      },
    };
  }

  private dispose(session: SessionContext): void {
    const pending = session.agent
      .close()
      .catch((error: unknown) => {
        console.warn('[relay]', `closing upstream session #${session.id} failed:`, error instanceof Error ? error.message : error);
      })
      .finally(() => {
        this.closing.delete(pending);
      });
    this.closing.add(pending);
    if (isDebugEnabled()) console.debug('[relay]', `upstream session #${session.id} closed`);
  }

  private retire(session: SessionContext): void {
    session.retired = true;
    if (session.leases === 0) {
      this.dispose(session);
    }
  }

  /** Id of the current session context, or null when none has been created yet. */
  get sessionId(): number | null {
    return this.session?.id ?? null;
  }

  /**
   * Drop the cookie jar and connection pool. The next call starts a fresh
   * session; calls already in flight finish on the old one.
   */
  reset(): void {
    const old = this.session;
    this.session = null;
    if (old) {
      if (isDebugEnabled()) console.debug('[relay]', `upstream session #${old.id} reset (${old.leases} in flight)`);
      this.retire(old);
    }
  }

  /** Open a warm connection (and pick up initial cookies) before the first real request. */
  async preheat(): Promise<void> {
    await this.fetchText(`${UPSTREAM_URL}/`);
  }

  /** Retire the session and wait for idle pools to close. Further calls fail. */
  async close(): Promise<void> {
    this.closed = true;
    this.reset();
    await Promise.all([...this.closing]);
  }

  // ── Transport ───────────────────────────────────────────────────────────────

  private translateError(error: unknown, url: string, timedOut: boolean): Error {
    if (error instanceof RelayError) return error;

    const host = (() => {
      try {
        return new URL(url).hostname;
      } catch {
        return url;
      }
    })();

    if (timedOut) {
      return new UpstreamUnavailableError(`Request to ${host} timed out after ${this.timeoutMs}ms`, true);
    }
    if (isAbortError(error)) {
      return error;
    }
    if (error instanceof Error) {
      const detail = causeDetail(error);
      if (detail.includes('ENOTFOUND') || detail.includes('getaddrinfo')) {
        return new UpstreamUnavailableError(`DNS resolution failed for ${host}`);
      }
      if (detail.includes('ECONNREFUSED')) {
        return new UpstreamUnavailableError(`Connection refused by ${host}`);
      }
      if (detail.includes('ECONNRESET') || detail.includes('EPIPE')) {
        return new UpstreamUnavailableError(`Connection reset by ${host}`);
      }
      if (detail.includes('ETIMEDOUT') || detail.includes('ENETUNREACH')) {
        return new UpstreamUnavailableError(`Network unreachable for ${host}`, true);
      }
      if (detail.includes('certificate') || detail.includes('CERT') || detail.includes('SSL') || detail.includes('TLS')) {
        return new UpstreamUnavailableError(`TLS error talking to ${host}`);
      }
      if (error instanceof TypeError) {
        return new UpstreamUnavailableError(`Failed to reach ${host}: ${error.message}${detail ? ` (${detail})` : ''}`);
      }
      return error;
    }
    return new UpstreamUnavailableError(`Failed to reach ${host}: ${String(error)}`);
  }

  /**
   * Issue one request on the given session. Cookies from the jar are attached
   * and the response's cookies stored. Non-2xx statuses become UpstreamError.
   */
  private async send(
    session: SessionContext,
    url: string,
    init: { method?: string; headers: Record<string, string>; body?: string; signal: AbortSignal },
    extraCookies: readonly string[] = [],
  ): Promise<Response> {
    const headers = { ...init.headers };
    const cookie = mergeCookies(session.jar.headerFor(url), extraCookies);
    if (cookie) headers['Cookie'] = cookie;

    if (isDebugEnabled()) console.debug('[relay]', `${init.method ?? 'GET'} ${url}`);

    const response = await undiciFetch(url, {
      method: init.method ?? 'GET',
      headers,
      body: init.body,
      signal: init.signal,
      dispatcher: session.agent,
    });

    session.jar.store(response.headers, url);

    if (!response.ok) {
      await response.body?.cancel().catch(() => undefined);
      const statusText = response.statusText || HTTP_STATUS_TEXT[response.status] || 'Unknown Error';
      throw new UpstreamError(response.status, `HTTP ${response.status}: ${statusText}`);
    }

    return response;
  }

  /** Run `fn` with a leased session under the request timeout. */
  private async withSession<T>(url: string, fn: (session: SessionContext, signal: AbortSignal) => Promise<T>): Promise<T> {
    const lease = this.acquire();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fn(lease.session, controller.signal);
    } catch (error) {
      throw this.translateError(error, url, controller.signal.aborted);
    } finally {
      clearTimeout(timer);
      lease.release();
    }
  }

  private async fetchText(url: string): Promise<string> {
    return this.withSession(url, async (session, signal) => {
      const response = await this.send(session, url, { headers: getPageHeaders(), signal });
      return response.text();
    });
  }

  // ── Pages ───────────────────────────────────────────────────────────────────

  async fetchPage(url: string): Promise<PageContent> {
    const html = await this.fetchText(url);
    return parsePage(html);
  }

  /**
   * Fetch any upstream URL and classify it. Fails with InvalidUrlError before
   * any network I/O when the URL is not on the upstream host.
   */
  async fetchPostsOrCategory(url: string): Promise<PageContent> {
    if (!isUpstreamUrl(url)) {
      throw new InvalidUrlError(`Invalid url: ${url}`);
    }
    return this.fetchPage(url);
  }

  async fetchCategory(categoryId: string): Promise<Category | null> {
    const url = `${UPSTREAM_URL}/?${new URLSearchParams({ cat: categoryId }).toString()}`;
    const page = await this.fetchPage(url);
    return page.kind === 'category' ? page.category : null;
  }

  async fetchPost(postId: string): Promise<Post | null> {
    const url = `${UPSTREAM_URL}/${encodeURIComponent(postId)}`;
    const page = await this.fetchPage(url);
    return page.kind === 'single' ? page.post : null;
  }

  // ── Resolution ──────────────────────────────────────────────────────────────

  /**
   * Exchange a post's resolution token for a signed backing URL.
   * The API answers `{ s: [{ src, type }] }` with a scheme-relative `src` and
   * sets cookie `e` to the expiry in epoch seconds.
   */
  async resolveVideo(token: string): Promise<ResolvedVideo> {
    return this.withSession(RESOLVE_API_URL, async (session, signal) => {
      const response = await this.send(session, RESOLVE_API_URL, {
        method: 'POST',
        headers: getApiHeaders(),
        body: new URLSearchParams({ d: token }).toString(),
        signal,
      });

      const apiUrl = new URL(RESOLVE_API_URL);
      const setCookies = parseSetCookies(response.headers, apiUrl);
      let payload: unknown;
      try {
        payload = await response.json();
      } catch {
        throw new MalformedPageError('Resolution API returned invalid JSON');
      }
      if (!isResolvePayload(payload)) {
        throw new MalformedPageError('Resolution API response has no playable source');
      }

      const expiry = setCookies.find((c) => c.name === 'e');
      if (!expiry || !/^\d+$/.test(expiry.value)) {
        throw new MalformedPageError('Resolution API response has no expiry cookie');
      }

      const source = payload.s[0];
      const backingUrl = /^https?:\/\//i.test(source.src) ? source.src : `${apiUrl.protocol}${source.src}`;

      return {
        backingUrl,
        mediaType: source.type,
        sessionCookies: setCookies.map((c) => `${c.name}=${c.value}`),
        expiresAt: parseInt(expiry.value, 10) - EXPIRE_OFFSET_SECONDS,
      };
    });
  }

  async resolvePost(post: Post): Promise<ResolvedVideo> {
    return this.resolveVideo(post.resolutionToken);
  }

  async resolveByPostId(postId: string): Promise<ResolvedVideo | null> {
    const post = await this.fetchPost(postId);
    return post ? this.resolvePost(post) : null;
  }

  // ── Video ───────────────────────────────────────────────────────────────────

  /**
   * Open the backing URL. The timeout only covers the wait for headers; the
   * body streams for as long as the caller reads it. The session lease is held
   * until `release()` is called, so a reset never closes the pool under it.
   */
  async openVideo(
    video: ResolvedVideo,
    range?: string,
    ifRange?: string,
    signal?: AbortSignal,
  ): Promise<VideoResponse> {
    const lease = this.acquire();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const combined = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;

    try {
      const response = await this.send(
        lease.session,
        video.backingUrl,
        { headers: getVideoHeaders(range, ifRange), signal: combined },
        video.sessionCookies,
      );
      return { response, release: lease.release };
    } catch (error) {
      lease.release();
      throw this.translateError(error, video.backingUrl, controller.signal.aborted);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Jar cookies win; resolution cookies fill in names the jar no longer has. */
function mergeCookies(jarHeader: string | undefined, extra: readonly string[]): string | undefined {
  const pairs = jarHeader ? jarHeader.split('; ') : [];
  const names = new Set(pairs.map((p) => p.split('=')[0]));
  for (const cookie of extra) {
    const name = cookie.split('=')[0];
    if (!names.has(name)) {
      pairs.push(cookie);
      names.add(name);
    }
  }
  return pairs.length > 0 ? pairs.join('; ') : undefined;
}
