/**
 * Prometheus Metrics — prom-client integration
 *
 * Exposes a /metrics endpoint via a Hono sub-app and provides helper
 * functions for instrumenting searches and the rate limiter.
 *
 * Metrics:
 *   directory_search_requests_total{outcome}      — Counter
 *   directory_search_duration_seconds{outcome}    — Histogram
 *   directory_ratelimit_tracked_clients           — Gauge
 *   directory_ratelimit_evictions_total           — Counter
 *   + default process_* and nodejs_* metrics
 */

import { Hono } from 'hono';
import client from 'prom-client';

import type { SearchOutcome } from './directory/search.js';

// ---------------------------------------------------------------------------
// Registry & default metrics
// ---------------------------------------------------------------------------

export const register = new client.Registry();

client.collectDefaultMetrics({ register });

// ---------------------------------------------------------------------------
// Custom metrics
// ---------------------------------------------------------------------------

/** `invalid` covers requests rejected before the core runs. */
export type SearchMetricOutcome = SearchOutcome | 'invalid';

const searchRequestsTotal = new client.Counter({
  name: 'directory_search_requests_total',
  help: 'Total number of directory search requests by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const searchDuration = new client.Histogram({
  name: 'directory_search_duration_seconds',
  help: 'Duration of directory search requests in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25],
  registers: [register],
});

const trackedClients = new client.Gauge({
  name: 'directory_ratelimit_tracked_clients',
  help: 'Client keys currently held by the rate limiter',
  registers: [register],
});

const evictionsTotal = new client.Counter({
  name: 'directory_ratelimit_evictions_total',
  help: 'Client keys evicted from the rate limiter after going idle',
  registers: [register],
});

// ---------------------------------------------------------------------------
// Helper functions
// ---------------------------------------------------------------------------

/**
 * Start timing a search. Call the returned function with the outcome
 * once it is known; it records both the counter and the histogram.
 */
export function startSearchTimer(): (outcome: SearchMetricOutcome) => void {
  const end = searchDuration.startTimer();
  return (outcome) => {
    end({ outcome });
    searchRequestsTotal.inc({ outcome });
  };
}

export function setTrackedClients(count: number): void {
  trackedClients.set(count);
}

export function incEvictions(count: number): void {
  if (count > 0) evictionsTotal.inc(count);
}

// ---------------------------------------------------------------------------
// Hono sub-app
// ---------------------------------------------------------------------------

export const metricsApp = new Hono();

metricsApp.get('/metrics', async (c) => {
  const metrics = await register.metrics();
  return c.text(metrics, 200, {
    'Content-Type': register.contentType,
  });
});
