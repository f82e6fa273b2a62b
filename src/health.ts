/**
 * Health Endpoints — Kubernetes-standard probes
 *
 * Exposes three probe paths as a Hono sub-app:
 *   /health/live    — Liveness: always 200 (process is alive)
 *   /health/ready   — Readiness: dataset and visibility config loaded
 *   /health/startup — Startup: 503 until initialization completes, then 200
 *
 * Usage:
 *   import { healthApp, configureHealth, markReady } from './health.js';
 *   app.route('/', healthApp);
 *   configureHealth({ employees: () => store.size(), ... });
 *   markReady();
 */

import { Hono } from 'hono';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface HealthSources {
  employees: () => number;
  organizations: () => number;
  trackedClients: () => number;
}

let isReady = false;
let sources: HealthSources | undefined;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Call once initialization is complete to flip startup/ready probes. */
export function markReady(): void {
  isReady = true;
}

/** Provide the counters the readiness probe reports. */
export function configureHealth(next: HealthSources): void {
  sources = next;
}

/** Back to the pre-startup state (tests). */
export function resetHealth(): void {
  isReady = false;
  sources = undefined;
}

// ---------------------------------------------------------------------------
// Hono sub-app
// ---------------------------------------------------------------------------

export const healthApp = new Hono();

healthApp.get('/health/live', (c) => {
  return c.json({ status: 'ok', timestamp: new Date().toISOString() }, 200);
});

healthApp.get('/health/ready', (c) => {
  if (!isReady || !sources) {
    return c.json({ status: 'not_ready' }, 503);
  }

  const employees = sources.employees();
  const organizations = sources.organizations();
  const allOk = employees > 0 && organizations > 0;

  return c.json(
    {
      status: allOk ? 'ok' : 'degraded',
      checks: {
        dataset: { ok: employees > 0, employees },
        visibility: { ok: organizations > 0, organizations },
        rateLimiter: { ok: true, trackedClients: sources.trackedClients() },
      },
      timestamp: new Date().toISOString(),
    },
    allOk ? 200 : 503,
  );
});

healthApp.get('/health/startup', (c) => {
  if (!isReady) {
    return c.json({ status: 'starting' }, 503);
  }
  return c.json({ status: 'ok', timestamp: new Date().toISOString() }, 200);
});
