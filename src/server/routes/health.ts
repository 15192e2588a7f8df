/**
 * Index, health check and session reset endpoints
 */

import { Router, Request, Response } from 'express';
import { getBaseUri, type RelayService } from '../app.js';

const startTime = Date.now();

export function createHealthRouter(relay: RelayService): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.type('text/plain').send(`Use ${getBaseUri(req)}/p?url=<Url> to parse any valid video posts url`);
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
      cache: relay.stats(),
    });
  });

  /**
   * POST /reset
   * Drop the upstream cookie session and connection pool, and every cached
   * resolution. Streams already playing finish on the old session.
   */
  router.post('/reset', (_req: Request, res: Response) => {
    relay.reset();
    console.log('[relay] upstream session reset');
    res.json({ success: true });
  });

  return router;
}
