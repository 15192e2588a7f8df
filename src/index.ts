/**
 * anime1-relay library entry point
 */

export { Relay, type RelayOptions } from './core/relay.js';
export { UpstreamClient, isUpstreamUrl, EXPIRE_OFFSET_SECONDS } from './core/upstream.js';
export type { UpstreamClientOptions, VideoResponse } from './core/upstream.js';
export { ResolutionCache, DEFAULT_CACHE_SIZE } from './core/resolution-cache.js';
export type { ResolutionCacheOptions, ResolutionCacheStats, VideoResolver } from './core/resolution-cache.js';
export { openStream, pipeTo, RELAYED_HEADERS } from './core/stream-proxy.js';
export type { VideoOpener, VideoStream } from './core/stream-proxy.js';
export { buildPlaylist, parsePlaylistType, isPlaylistType, playlistUrls } from './core/playlist.js';
export { parsePage, parsePostOrder, orderPosts } from './core/extractor.js';
export { CookieJar, parseSetCookies, type StoredCookie } from './core/cookie-jar.js';
export { isDebugEnabled } from './core/debug.js';
export { loadConfig, DEFAULT_CONFIG, type RelayConfig } from './core/config.js';
export { createApp, startServer, type RelayService, type AppOptions, type RunningServer } from './server/app.js';
export * from './types.js';
