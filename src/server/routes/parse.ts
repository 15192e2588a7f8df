/**
 * GET /p?url=<upstream url>
 * Describe an upstream post or category page in terms of local endpoints.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { getBaseUri, type RelayService } from '../app.js';

export function createParseRouter(relay: RelayService): Router {
  const router = Router();

  router.get('/p', async (req: Request, res: Response, next: NextFunction) => {
    const { url } = req.query;

    if (!url || typeof url !== 'string') {
      res.status(400).json({
        success: false,
        error: {
          type: 'invalid_request',
          message: `Missing query 'url'`,
        },
        requestId: req.requestId,
      });
      return;
    }

    try {
      const result = await relay.resolve(getBaseUri(req), url);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
