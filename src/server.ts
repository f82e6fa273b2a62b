/**
 * HTTP Server — Hono app for the directory search service
 *
 * Responsibilities:
 *   1. CORS for browser clients of the directory UI
 *   2. Health and metrics sub-apps
 *   3. The search route and the OpenAPI document
 *   4. JSON 404 and 500 responses for everything else
 *
 * Exports createApp() for use by the entrypoint and the tests.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';

import { createSearchApp, type AppEnv } from './directory/handlers.js';
import type { DirectorySearch } from './directory/search.js';
import { healthApp } from './health.js';
import type { Logger } from './logger.js';
import { metricsApp } from './metrics.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServerConfig {
  search: DirectorySearch;
  logger: Logger;
  openApiDocument?: Record<string, unknown>;
  corsOrigin?: string;
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export function createApp(config: ServerConfig): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const log = config.logger.child({ component: 'server' });

  app.use(
    '*',
    cors({
      origin: config.corsOrigin ?? '*',
      allowMethods: ['GET', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Client-IP'],
      exposeHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'Retry-After'],
      maxAge: 86400,
    }),
  );

  app.route('/', healthApp);
  app.route('/', metricsApp);
  app.route('/', createSearchApp(config.search));

  const openApiDocument = config.openApiDocument;
  if (openApiDocument) {
    app.get('/openapi.json', (c) => c.json(openApiDocument, 200));
  }

  app.notFound((c) => c.json({ error: 'not_found' }, 404));

  app.onError((err, c) => {
    log.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, err);
    return c.json({ error: 'internal_error' }, 500);
  });

  return app;
}
