/**
 * Post id → resolved backing video, in process memory only.
 *
 * - Entries are never served at or past their `expiresAt`.
 * - At most `maxEntries` entries; the least recently used one is evicted.
 * - Concurrent misses for the same post share one upstream resolution.
 */

import { LRUCache } from 'lru-cache';
import type { ResolvedVideo } from '../types.js';
import { UnknownVideoError } from '../types.js';
import { isDebugEnabled } from './debug.js';

export const DEFAULT_CACHE_SIZE = 128;

/** What the cache needs from the upstream side. */
export interface VideoResolver {
  resolveByPostId(postId: string): Promise<ResolvedVideo | null>;
}

export interface ResolutionCacheOptions {
  maxEntries?: number;
  /** Current time in epoch seconds */
  now?: () => number;
}

export interface ResolutionCacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  resolutions: number;
  inflight: number;
}

export class ResolutionCache {
  private readonly entries: LRUCache<string, ResolvedVideo>;
  private readonly inflight = new Map<string, Promise<ResolvedVideo>>();
  private readonly maxEntries: number;
  private readonly now: () => number;
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private resolutions = 0;

  constructor(private readonly resolver: VideoResolver, options: ResolutionCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_SIZE;
    this.now = options.now ?? (() => Date.now() / 1000);
    this.entries = new LRUCache<string, ResolvedVideo>({ max: this.maxEntries });
  }

  /** Cached, unexpired resolution for a post. Expired entries are dropped. */
  peek(postId: string): ResolvedVideo | undefined {
    const video = this.entries.get(postId);
    if (!video) return undefined;
    if (video.expiresAt > this.now()) return video;

    this.entries.delete(postId);
    if (isDebugEnabled()) console.debug('[relay]', `cache: ${postId} expired`);
    return undefined;
  }

  async getOrResolve(postId: string): Promise<ResolvedVideo> {
    const cached = this.peek(postId);
    if (cached) {
      this.hits++;
      if (isDebugEnabled()) console.debug('[relay]', `cache: hit ${postId}`);
      return cached;
    }

    this.misses++;
    const pending = this.inflight.get(postId);
    if (pending) return pending;

    const resolution = this.resolve(postId).finally(() => {
      // clear() may have replaced this entry with one on a newer session
      if (this.inflight.get(postId) === resolution) this.inflight.delete(postId);
    });
    this.inflight.set(postId, resolution);
    return resolution;
  }

  private async resolve(postId: string): Promise<ResolvedVideo> {
    const generation = this.generation;
    this.resolutions++;
    if (isDebugEnabled()) console.debug('[relay]', `cache: resolving ${postId}`);

    const video = await this.resolver.resolveByPostId(postId);
    if (!video) {
      throw new UnknownVideoError(postId);
    }

    // A clear() while resolving means the result belongs to a dropped session.
    if (generation === this.generation) {
      this.store(postId, video);
    }
    return video;
  }

  private store(postId: string, video: ResolvedVideo): void {
    const remainingMs = Math.floor((video.expiresAt - this.now()) * 1000);
    if (remainingMs <= 0) return;
    this.entries.set(postId, video, { ttl: remainingMs });
  }

  /**
   * Drop a post's entry. With `stale` given, only drops it while it is still
   * that exact resolution, so a concurrent refresh is kept.
   */
  invalidate(postId: string, stale?: ResolvedVideo): boolean {
    if (stale && this.entries.peek(postId) !== stale) return false;
    return this.entries.delete(postId);
  }

  /**
   * Drop every entry. Resolutions still in flight are forgotten too: their
   * callers still get the result, but later misses start a new resolution.
   */
  clear(): void {
    this.generation++;
    this.entries.clear();
    this.inflight.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): ResolutionCacheStats {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      resolutions: this.resolutions,
      inflight: this.inflight.size,
    };
  }
}
