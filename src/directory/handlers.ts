/**
 * Directory HTTP handlers.
 * Parses query parameters, resolves the client key, calls the search
 * service, and maps each result variant onto an HTTP response.
 *
 * Routes:
 * - GET /search?organization_id=...&name=&department=&location=&position=&status=...
 */

import type { IncomingMessage } from 'node:http';
import { Hono, type Context } from 'hono';

import { startSearchTimer } from '../metrics.js';
import type { RateLimitDecision } from '../ratelimit/limiter.js';
import type { DirectorySearch, SearchResult } from './search.js';
import type { SearchFilters } from './types.js';

// ============================================
// Types
// ============================================

/** Bindings @hono/node-server passes as `c.env`; absent under app.request(). */
export interface NodeBindings {
  incoming?: IncomingMessage;
}

export type AppEnv = { Bindings: NodeBindings };

export const UNKNOWN_CLIENT = 'unknown_client';

// ============================================
// Request helpers
// ============================================

/**
 * Rate-limit bucket for the caller: X-Client-IP, then the first
 * X-Forwarded-For hop, then X-Real-IP, then the socket address.
 */
export function getClientKey(c: Context<AppEnv>): string {
  const explicit = c.req.header('x-client-ip')?.trim();
  if (explicit) return explicit;

  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  if (forwarded) return forwarded;

  const realIp = c.req.header('x-real-ip')?.trim();
  if (realIp) return realIp;

  return c.env?.incoming?.socket.remoteAddress ?? UNKNOWN_CLIENT;
}

function optionalParam(c: Context<AppEnv>, key: string): string | undefined {
  const value = c.req.query(key);
  return value === undefined || value === '' ? undefined : value;
}

function parseFilters(c: Context<AppEnv>): SearchFilters {
  const statuses = (c.req.queries('status') ?? []).filter((s) => s !== '');
  return {
    name: optionalParam(c, 'name'),
    department: optionalParam(c, 'department'),
    location: optionalParam(c, 'location'),
    position: optionalParam(c, 'position'),
    statuses: statuses.length > 0 ? statuses : undefined,
  };
}

function setRateLimitHeaders(c: Context<AppEnv>, decision: RateLimitDecision): void {
  c.header('X-RateLimit-Limit', String(decision.limit));
  c.header('X-RateLimit-Remaining', String(decision.remaining));
}

// ============================================
// Response mapping
// ============================================

export function rateLimitDetail(limit: number, windowSeconds: number): string {
  return (
    `Too many requests. Please try again after ${windowSeconds} seconds. ` +
    `Limit is ${limit} requests per ${windowSeconds} seconds.`
  );
}

function respond(c: Context<AppEnv>, result: SearchResult): Response {
  setRateLimitHeaders(c, result.rateLimit);

  switch (result.kind) {
    case 'admitted':
      return c.json({ employees: result.employees }, 200);

    case 'rate_limited':
      c.header('Retry-After', String(result.retryAfterSeconds));
      return c.json(
        { error: 'rate_limited', detail: rateLimitDetail(result.limit, result.windowSeconds) },
        429,
      );

    case 'unknown_organization':
      return c.json(
        {
          error: 'organization_not_found',
          detail: `Organization '${result.organizationId}' not found.`,
        },
        404,
      );

    case 'no_visible_columns':
      return c.json(
        {
          error: 'no_visible_columns',
          detail: `Organization '${result.organizationId}' has no display columns configured.`,
        },
        404,
      );

    default: {
      const unreachable: never = result;
      throw new Error(`Unhandled search result: ${JSON.stringify(unreachable)}`);
    }
  }
}

// ============================================
// Routes
// ============================================

export function createSearchApp(service: DirectorySearch): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get('/search', (c) => {
    const done = startSearchTimer();

    // Matched exactly downstream; only a blank value is rejected here.
    const organizationId = c.req.query('organization_id');
    if (organizationId === undefined || organizationId.trim() === '') {
      done('invalid');
      return c.json(
        {
          error: 'validation_error',
          detail: [{ loc: ['query', 'organization_id'], msg: 'Field required', type: 'missing' }],
        },
        422,
      );
    }

    const result = service.search({
      organizationId,
      clientKey: getClientKey(c),
      filters: parseFilters(c),
    });
    done(result.kind);

    return respond(c, result);
  });

  return app;
}
