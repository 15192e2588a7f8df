/**
 * GET /c/:categoryId[?playlist=m3u8|dpl|dpl_ext|xspf|xspf_ext]
 *
 * Without `playlist` the m3u8 playlist is served inline; with it the chosen
 * format is served as a download named after the category.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { getBaseUri, type RelayService } from '../app.js';

export function contentDisposition(fileName: string): string {
  const encoded = encodeURIComponent(fileName);
  return `attachment; filename="${encoded}"; filename*=UTF-8''${encoded}`;
}

export function createCategoryRouter(relay: RelayService): Router {
  const router = Router();

  router.get('/c/:categoryId', async (req: Request, res: Response, next: NextFunction) => {
    const { categoryId } = req.params;
    const { playlist } = req.query;

    if (playlist !== undefined && typeof playlist !== 'string') {
      res.status(400).json({
        success: false,
        error: {
          type: 'invalid_request',
          message: `Query 'playlist' must be given once`,
        },
        requestId: req.requestId,
      });
      return;
    }

    try {
      const info = await relay.getPlaylist(getBaseUri(req), categoryId, playlist);
      res.setHeader('Content-Type', `${info.mediaType}; charset=utf-8`);
      if (playlist !== undefined) {
        res.setHeader('Content-Disposition', contentDisposition(info.fileName));
      }
      res.send(info.content);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
