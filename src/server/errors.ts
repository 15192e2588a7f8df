/**
 * Maps relay errors onto HTTP responses.
 */

import type { Request, Response } from 'express';
import {
  InvalidUrlError,
  MalformedPageError,
  RelayError,
  UnknownCategoryError,
  UnknownUrlTypeError,
  UnknownVideoError,
  UnsupportedPlaylistFormatError,
  UpstreamError,
  UpstreamUnavailableError,
} from '../types.js';

export interface HttpErrorInfo {
  status: number;
  type: string;
}

export function toHttpError(error: unknown): HttpErrorInfo {
  if (error instanceof InvalidUrlError) return { status: 400, type: 'invalid_url' };
  if (error instanceof UnsupportedPlaylistFormatError) return { status: 400, type: 'unsupported_playlist_format' };
  if (error instanceof UnknownUrlTypeError) return { status: 404, type: 'unknown_url_type' };
  if (error instanceof UnknownCategoryError) return { status: 404, type: 'unknown_category' };
  if (error instanceof UnknownVideoError) return { status: 404, type: 'unknown_video' };
  if (error instanceof MalformedPageError) return { status: 502, type: 'malformed_page' };
  if (error instanceof UpstreamError) {
    const status = error.status >= 400 && error.status <= 599 ? error.status : 502;
    return { status, type: 'upstream_error' };
  }
  if (error instanceof UpstreamUnavailableError) {
    return error.timedOut
      ? { status: 504, type: 'upstream_timeout' }
      : { status: 503, type: 'upstream_unavailable' };
  }
  if (error instanceof RelayError) return { status: 500, type: error.code.toLowerCase() };
  return { status: 500, type: 'internal_error' };
}

export function sendError(req: Request, res: Response, error: unknown): void {
  const { status, type } = toHttpError(error);
  const message = error instanceof Error ? error.message : 'An unexpected error occurred';

  if (status >= 500) {
    console.error('[relay]', `${req.method} ${req.path} failed:`, error);
  }

  res.status(status).json({
    success: false,
    error: { type, message },
    requestId: req.requestId,
  });
}
