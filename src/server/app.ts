/**
 * Relay HTTP server
 * Express app exposing the parse, playlist and video endpoints
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import './types.js'; // Augments Express.Request with requestId
import cors from 'cors';
import { randomUUID } from 'node:crypto';
import type { Server } from 'node:http';
import { Relay } from '../core/relay.js';
import type { RelayConfig } from '../core/config.js';
import { sendError } from './errors.js';
import { createHealthRouter } from './routes/health.js';
import { createParseRouter } from './routes/parse.js';
import { createCategoryRouter } from './routes/category.js';
import { createVideoRouter } from './routes/video.js';

/** The part of Relay the routes depend on. */
export type RelayService = Pick<Relay, 'resolve' | 'getPlaylist' | 'openVideo' | 'reset' | 'stats'>;

export interface AppOptions {
  /** Log every request to the console */
  debug?: boolean;
}

/** Base URI of this relay as the client addressed it. */
export function getBaseUri(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

export function createApp(relay: RelayService, options: AppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');

  // ─── Request ID ─────────────────────────────────────────────────────────────
  app.use((req: Request, res: Response, next: NextFunction) => {
    req.requestId = randomUUID();
    res.setHeader('X-Request-Id', req.requestId);
    next();
  });

  app.use(cors({ exposedHeaders: ['Content-Range', 'Content-Length', 'Accept-Ranges', 'X-Request-Id'] }));

  if (options.debug) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const started = Date.now();
      res.on('finish', () => {
        console.debug('[relay]', `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
      });
      next();
    });
  }

  app.use(createHealthRouter(relay));
  app.use(createParseRouter(relay));
  app.use(createCategoryRouter(relay));
  app.use(createVideoRouter(relay));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        type: 'not_found',
        message: `Route not found: ${req.method} ${req.path}`,
      },
      requestId: req.requestId,
    });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) {
      console.error('[relay]', `${req.method} ${req.path} failed after headers were sent:`, err);
      res.destroy();
      return;
    }
    sendError(req, res, err);
  });

  return app;
}

export interface RunningServer {
  server: Server;
  relay: Relay;
  /** Stop accepting connections and release upstream resources */
  close(): Promise<void>;
}

export function startServer(config: RelayConfig, registerSignals = true): RunningServer {
  const relay = new Relay({ timeoutMs: config.requestTimeoutMs, cacheSize: config.cacheSize });
  const app = createApp(relay, { debug: config.debug });

  // Warm the upstream connection in the background to reduce first-request latency.
  relay.preheat().catch((error: unknown) => {
    console.warn('[relay]', 'upstream preheat failed:', error instanceof Error ? error.message : String(error));
  });

  const server = app.listen(config.port, config.host, () => {
    const base = `http://${config.host}:${config.port}`;
    console.log(`anime1 relay listening on ${base}`);
    console.log(`Parse: ${base}/p?url=<url>`);
  });

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      server.close((error) => {
        relay.shutdown().then(() => {
          if (error) reject(error);
          else resolve();
        }, reject);
      });
      server.closeAllConnections();
    });
    return closing;
  };

  if (registerSignals) {
    // Graceful shutdown
    const shutdown = (): void => {
      console.log('\nShutting down gracefully...');
      close().then(
        () => {
          console.log('Server closed');
          process.exit(0);
        },
        (error: unknown) => {
          console.error('[relay]', 'shutdown failed:', error);
          process.exit(1);
        },
      );

      // Force shutdown after 10 seconds
      setTimeout(() => {
        console.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
  }

  return { server, relay, close };
}
