/**
 * Core types for anime1-relay
 */

// ── Entities ──────────────────────────────────────────────────────────────────

export interface Post {
  /** Numeric post id as it appears in the upstream URL (`/26521`) */
  readonly id: string;
  readonly title: string;
  /** Episode number taken from a leading `[N]` marker in the title */
  readonly order?: number;
  /** ISO timestamp from the post header's `<time datetime>` */
  readonly timestamp: string;
  readonly categoryId: string;
  readonly videoId: string;
  readonly thumbnailsServer: string;
  /** Opaque, already percent-decoded payload for the resolution API */
  readonly resolutionToken: string;
  readonly nextPostId?: string;
}

export interface Category {
  readonly id: string;
  readonly title: string;
  readonly posts: readonly Post[];
}

export interface ResolvedVideo {
  /** Absolute, signed backing URL */
  readonly backingUrl: string;
  /** Media type reported by the resolution API (e.g. `video/mp4`) */
  readonly mediaType: string;
  /** `name=value` pairs set by the resolution response */
  readonly sessionCookies: readonly string[];
  /** Epoch seconds after which the backing URL must not be used */
  readonly expiresAt: number;
}

export type PageContent =
  | { kind: 'category'; category: Category }
  | { kind: 'single'; post: Post }
  | { kind: 'unknown' };

// ── Playlists ─────────────────────────────────────────────────────────────────

export const PLAYLIST_TYPES = ['m3u8', 'dpl', 'dpl_ext', 'xspf', 'xspf_ext'] as const;

export type PlaylistType = (typeof PLAYLIST_TYPES)[number];

export interface PlaylistInfo {
  type: PlaylistType;
  content: string;
  mediaType: string;
  fileName: string;
}

// ── Relay results ─────────────────────────────────────────────────────────────

export interface VideoLink {
  id: string;
  title: string;
  url: string;
}

export interface SingleResolveResult {
  type: 'single';
  id: string;
  title: string;
  category: string;
  url: string;
}

export interface CategoryResolveResult {
  type: 'category';
  id: string;
  title: string;
  url: string;
  playlists: Record<PlaylistType, string>;
  videos: VideoLink[];
}

export type ResolveResult = SingleResolveResult | CategoryResolveResult;

// ── Errors ────────────────────────────────────────────────────────────────────

export class RelayError extends Error {
  constructor(message: string, public code: string = 'RELAY') {
    super(message);
    this.name = 'RelayError';
  }
}

export class InvalidUrlError extends RelayError {
  constructor(message: string) {
    super(message, 'INVALID_URL');
    this.name = 'InvalidUrlError';
  }
}

export class MalformedPageError extends RelayError {
  constructor(message: string) {
    super(message, 'MALFORMED_PAGE');
    this.name = 'MalformedPageError';
  }
}

export class UnknownUrlTypeError extends RelayError {
  constructor(message: string) {
    super(message, 'UNKNOWN_URL_TYPE');
    this.name = 'UnknownUrlTypeError';
  }
}

export class UnknownCategoryError extends RelayError {
  constructor(public categoryId: string) {
    super(`Unknown category: ${categoryId}`, 'UNKNOWN_CATEGORY');
    this.name = 'UnknownCategoryError';
  }
}

export class UnknownVideoError extends RelayError {
  constructor(public postId: string) {
    super(`Unknown video: ${postId}`, 'UNKNOWN_VIDEO');
    this.name = 'UnknownVideoError';
  }
}

export class UnsupportedPlaylistFormatError extends RelayError {
  constructor(public format: string) {
    super(`Unknown playlist type: ${format}`, 'UNSUPPORTED_PLAYLIST_FORMAT');
    this.name = 'UnsupportedPlaylistFormatError';
  }
}

/** Upstream answered with a non-success HTTP status. */
export class UpstreamError extends RelayError {
  constructor(public status: number, message: string) {
    super(message, 'UPSTREAM');
    this.name = 'UpstreamError';
  }
}

/** Upstream could not be reached at all (DNS, refused, reset, timeout). */
export class UpstreamUnavailableError extends RelayError {
  constructor(message: string, public timedOut: boolean = false) {
    super(message, timedOut ? 'TIMEOUT' : 'UPSTREAM_UNAVAILABLE');
    this.name = 'UpstreamUnavailableError';
  }
}
