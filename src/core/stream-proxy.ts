/**
 * Streaming proxy between a local client and the backing video server.
 *
 * Range / If-Range go upstream verbatim; only a fixed set of response headers
 * comes back. The body is a single-pass Node stream that is never buffered.
 * Whatever ends the stream (completion, upstream error, client disconnect,
 * explicit close) releases the backing connection exactly once.
 */

import { Readable, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { ResolvedVideo } from '../types.js';
import type { VideoResponse } from './upstream.js';
import { isDebugEnabled } from './debug.js';

/** Response headers relayed to the client, in their canonical spelling. */
export const RELAYED_HEADERS = ['Content-Length', 'Content-Range', 'ETag', 'Last-Modified'] as const;

export interface VideoOpener {
  openVideo(video: ResolvedVideo, range?: string, ifRange?: string, signal?: AbortSignal): Promise<VideoResponse>;
}

export interface VideoStream {
  /** 2xx status of the backing response (200, or 206 for a range); other statuses reject as UpstreamError */
  status: number;
  headers: Record<string, string>;
  mediaType: string;
  /** Forward-only; open a new stream to read again. */
  body: Readable;
  /** Abort the backing connection. Safe to call more than once. */
  close(): void;
}

function isDisconnect(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  return code === 'ERR_STREAM_PREMATURE_CLOSE' ||
    code === 'ECONNRESET' ||
    code === 'EPIPE' ||
    error.name === 'AbortError';
}

/**
 * Open the backing response for a resolved video. `signal` is the caller's
 * (typically the client connection): aborting it aborts the backing request,
 * including while its headers are still pending.
 */
export async function openStream(
  opener: VideoOpener,
  video: ResolvedVideo,
  range?: string,
  ifRange?: string,
  signal?: AbortSignal,
): Promise<VideoStream> {
  const controller = new AbortController();
  const onCallerAbort = (): void => controller.abort();
  if (signal?.aborted) controller.abort();
  else signal?.addEventListener('abort', onCallerAbort, { once: true });

  let opened: VideoResponse;
  try {
    opened = await opener.openVideo(video, range, ifRange, controller.signal);
  } catch (error) {
    signal?.removeEventListener('abort', onCallerAbort);
    throw error;
  }
  const { response, release } = opened;

  const headers: Record<string, string> = {};
  for (const name of RELAYED_HEADERS) {
    const value = response.headers.get(name);
    if (value !== null) headers[name] = value;
  }

  const body = response.body ? Readable.fromWeb(response.body) : Readable.from([]);

  let released = false;
  const finish = (): void => {
    if (released) return;
    released = true;
    signal?.removeEventListener('abort', onCallerAbort);
    release();
    if (isDebugEnabled()) console.debug('[relay]', `stream closed: ${new URL(video.backingUrl).pathname}`);
  };

  body.once('close', finish);
  body.on('error', (error: Error) => {
    if (!isDisconnect(error)) {
      console.warn('[relay]', 'backing stream error:', error.message);
    }
  });

  return {
    status: response.status,
    headers,
    mediaType: response.headers.get('content-type') || video.mediaType,
    body,
    close: () => {
      if (!controller.signal.aborted) controller.abort();
      if (!body.destroyed) body.destroy();
      finish();
    },
  };
}

/**
 * Pipe a video stream into a destination (typically an HTTP response).
 * The destination going away mid-stream is a normal ending and resolves;
 * other failures reject. The stream is closed either way.
 */
export async function pipeTo(stream: VideoStream, destination: Writable): Promise<void> {
  try {
    await pipeline(stream.body, destination);
  } catch (error) {
    if (isDisconnect(error)) {
      if (isDebugEnabled()) console.debug('[relay]', 'client disconnected mid-stream');
      return;
    }
    throw error;
  } finally {
    stream.close();
  }
}
