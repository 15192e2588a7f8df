/**
 * GET|HEAD /v/:postId
 *
 * Streams the post's backing video. Range / If-Range are relayed upstream and
 * the backing 2xx status (200 or 206) comes back with the allow-listed
 * headers; a refused backing request is answered through the error handler.
 * A client going away, even before the backing headers arrive, closes the
 * backing connection. HEAD answers with the headers and never reads the body.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { RelayService } from '../app.js';
import { pipeTo, type VideoStream } from '../../core/stream-proxy.js';
import { isDebugEnabled } from '../../core/debug.js';

export function createVideoRouter(relay: RelayService): Router {
  const router = Router();

  router.get('/v/:postId', async (req: Request, res: Response, next: NextFunction) => {
    const { postId } = req.params;

    const clientGone = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) clientGone.abort();
    });

    let stream: VideoStream;
    try {
      stream = await relay.openVideo(postId, req.get('range'), req.get('if-range'), clientGone.signal);
    } catch (error) {
      if (clientGone.signal.aborted) {
        if (isDebugEnabled()) console.debug('[relay]', `client left before ${postId} opened`);
        return;
      }
      next(error);
      return;
    }

    res.status(stream.status);
    for (const [name, value] of Object.entries(stream.headers)) {
      res.setHeader(name, value);
    }
    res.setHeader('Content-Type', stream.mediaType);
    res.setHeader('Accept-Ranges', 'bytes');

    if (req.method === 'HEAD') {
      stream.close();
      res.end();
      return;
    }

    try {
      await pipeTo(stream, res);
    } catch (error) {
      // The response has already started; a second response is not possible.
      console.warn('[relay]', `stream for ${postId} aborted:`, error instanceof Error ? error.message : error);
      if (!res.destroyed) res.destroy();
    }
  });

  return router;
}
