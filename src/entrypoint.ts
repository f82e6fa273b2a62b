/**
 * Entrypoint — starts the directory search service
 *
 * Orchestrates:
 *   1. Configuration and structured logger initialization
 *   2. Loading the employee dataset and visibility config
 *   3. Building the store, policy, rate limiter and search service
 *   4. HTTP server creation and startup
 *   5. Cron-scheduled eviction of idle rate-limit keys
 *   6. Graceful shutdown on SIGTERM/SIGINT
 */

import { serve } from '@hono/node-server';
import cron, { type ScheduledTask } from 'node-cron';

import { buildServiceConfig } from './config.js';
import { loadDirectory, loadOpenApiDocument } from './directory/loader.js';
import { DirectorySearch } from './directory/search.js';
import { EmployeeStore } from './directory/store.js';
import { VisibilityPolicy } from './directory/visibility.js';
import { configureHealth, markReady } from './health.js';
import { initLogger, logger } from './logger.js';
import { incEvictions, setTrackedClients } from './metrics.js';
import { SlidingWindowRateLimiter } from './ratelimit/limiter.js';
import { createApp } from './server.js';

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  // 1. Configuration + logger
  const config = buildServiceConfig();
  initLogger({ level: config.logLevel, service: 'directory-search' });

  logger.info(`Starting directory search service`);
  logger.info(`Node.js ${process.version}, platform=${process.platform}`);

  // 2. Data
  const data = loadDirectory(config.dataDir, logger.child({ component: 'loader' }));
  const openApiDocument = loadOpenApiDocument(config.dataDir);

  // 3. Core components
  const store = new EmployeeStore(data.employees);
  const policy = new VisibilityPolicy(data.columns);
  const limiter = new SlidingWindowRateLimiter({
    maxRequests: config.rateLimit.maxRequests,
    windowMs: config.rateLimit.windowSeconds * 1000,
  });
  const search = new DirectorySearch({ store, policy, limiter, logger });

  logger.info(
    `Loaded ${store.size()} employees across ${store.organizations().length} organizations; ` +
      `${policy.organizations().length} organizations have visibility config`,
  );
  logger.info(
    `Rate limit: ${limiter.maxRequests} requests per ${config.rateLimit.windowSeconds}s per client`,
  );

  configureHealth({
    employees: () => store.size(),
    organizations: () => policy.organizations().length,
    trackedClients: () => limiter.trackedClients(),
  });

  // 4. HTTP server
  const app = createApp({
    search,
    logger,
    openApiDocument,
    corsOrigin: config.corsOrigin,
  });

  const httpServer = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  logger.info(`HTTP server listening on ${config.host}:${config.port}`);

  // 5. Idle-key eviction
  const evictionTask: ScheduledTask = cron.schedule(config.rateLimit.evictionCron, () => {
    const evicted = limiter.evictStale();
    incEvictions(evicted);
    setTrackedClients(limiter.trackedClients());
    if (evicted > 0) {
      logger.debug(`[cron] Evicted ${evicted} idle rate-limit keys`);
    }
  });
  logger.info(`Cron scheduled: rate-limit eviction (${config.rateLimit.evictionCron})`);

  markReady();
  logger.info('Startup complete — ready to serve requests');

  // 6. Graceful shutdown
  let isShuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Received ${signal} — starting graceful shutdown`);
    evictionTask.stop();

    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
      // Force close after 15s
      setTimeout(() => {
        logger.warn('HTTP server close timed out, forcing shutdown');
        resolve();
      }, 15_000).unref();
    });

    logger.info('Graceful shutdown complete');
    process.exit(0);
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((err: unknown) => {
  logger.error('Fatal startup error:', err);
  process.exit(1);
});
