/**
 * Relay service: the boundary the HTTP layer and the CLI talk to.
 *
 * Owns one UpstreamClient and one ResolutionCache. Construct it once at
 * startup and hand it to whatever serves requests; there is no global
 * instance.
 */

import { ResolutionCache, DEFAULT_CACHE_SIZE, type ResolutionCacheStats } from './resolution-cache.js';
import { UpstreamClient, isUpstreamUrl } from './upstream.js';
import { openStream, type VideoStream } from './stream-proxy.js';
import { buildPlaylist, categoryUrl, parsePlaylistType, playlistUrls, trimBaseUri, videoUrl } from './playlist.js';
import type { Category, PlaylistInfo, ResolveResult } from '../types.js';
import {
  InvalidUrlError,
  UnknownCategoryError,
  UnknownUrlTypeError,
  UpstreamError,
} from '../types.js';
import { isDebugEnabled } from './debug.js';

/** Backing statuses that mean the signed URL was revoked before its expiry. */
const STALE_URL_STATUSES = new Set([403, 410]);

export interface RelayOptions {
  /** Upstream request timeout (ms) */
  timeoutMs?: number;
  /** Maximum resolution cache entries */
  cacheSize?: number;
  /** Supply a preconfigured client (tests, custom timeouts) */
  client?: UpstreamClient;
  /** Clock for the resolution cache, epoch seconds */
  now?: () => number;
}

export class Relay {
  readonly client: UpstreamClient;
  readonly cache: ResolutionCache;

  constructor(options: RelayOptions = {}) {
    this.client = options.client ?? new UpstreamClient({ timeoutMs: options.timeoutMs });
    this.cache = new ResolutionCache(this.client, {
      maxEntries: options.cacheSize ?? DEFAULT_CACHE_SIZE,
      now: options.now,
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /** Warm the upstream connection. Optional; failures are the caller's to log. */
  async preheat(): Promise<void> {
    await this.client.preheat();
  }

  /** Fresh upstream session; cached resolutions tied to the old one are dropped. */
  reset(): void {
    this.client.reset();
    this.cache.clear();
  }

  async shutdown(): Promise<void> {
    this.cache.clear();
    await this.client.close();
  }

  stats(): ResolutionCacheStats & { sessionId: number | null } {
    return { ...this.cache.stats(), sessionId: this.client.sessionId };
  }

  // ── Operations ──────────────────────────────────────────────────────────────

  /** Describe any upstream post or category URL in terms of local endpoints. */
  async resolve(baseUri: string, url: string): Promise<ResolveResult> {
    if (!isUpstreamUrl(url)) {
      throw new InvalidUrlError(`Invalid url: ${url}`);
    }

    const base = trimBaseUri(baseUri);
    const page = await this.client.fetchPostsOrCategory(url);

    switch (page.kind) {
      case 'single': {
        const { post } = page;
        return {
          type: 'single',
          id: post.id,
          title: post.title,
          category: post.categoryId,
          url: videoUrl(base, post.id),
        };
      }
      case 'category': {
        const { category } = page;
        return {
          type: 'category',
          id: category.id,
          title: category.title,
          url: categoryUrl(base, category.id),
          playlists: playlistUrls(base, category.id),
          videos: category.posts.map((post) => ({
            id: post.id,
            title: post.title,
            url: videoUrl(base, post.id),
          })),
        };
      }
      default:
        throw new UnknownUrlTypeError(`Unknown url type: ${url}`);
    }
  }

  async getCategory(categoryId: string): Promise<Category> {
    const category = await this.client.fetchCategory(categoryId);
    if (!category) {
      throw new UnknownCategoryError(categoryId);
    }
    return category;
  }

  async getPlaylist(baseUri: string, categoryId: string, format?: string): Promise<PlaylistInfo> {
    // Validate the format before touching the network
    const type = format !== undefined ? parsePlaylistType(format) : 'm3u8';
    const category = await this.getCategory(categoryId);
    return buildPlaylist(type, baseUri, category);
  }

  /**
   * Open the backing stream for a post. A cached resolution the backing
   * server refuses (403/410) is dropped and resolved once more. `signal`
   * aborts the backing request; the shared resolution is left running.
   */
  async openVideo(postId: string, range?: string, ifRange?: string, signal?: AbortSignal): Promise<VideoStream> {
    const wasCached = this.cache.peek(postId) !== undefined;
    const video = await this.cache.getOrResolve(postId);

    try {
      return await openStream(this.client, video, range, ifRange, signal);
    } catch (error) {
      if (!wasCached || !(error instanceof UpstreamError) || !STALE_URL_STATUSES.has(error.status)) {
        throw error;
      }
      if (isDebugEnabled()) console.debug('[relay]', `cached url for ${postId} refused (${error.status}), resolving again`);
      this.cache.invalidate(postId, video);
      const fresh = await this.cache.getOrResolve(postId);
      return openStream(this.client, fresh, range, ifRange, signal);
    }
  }
}
