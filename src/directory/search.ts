/**
 * Directory Search — the core call contract
 *
 * Per request:
 *   1. Rate limiter admits or rejects the client key (quota is consumed
 *      even if the organization later turns out to be unknown)
 *   2. Visibility policy resolves the organization's columns
 *   3. Store filters the organization's records
 *   4. Every record is projected onto the columns before it is returned
 *
 * Every outcome is a tagged result; nothing here throws for a rejected
 * request. Transport mapping lives in handlers.ts.
 */

import type { Logger } from '../logger.js';
import type { RateLimitDecision, SlidingWindowRateLimiter } from '../ratelimit/limiter.js';
import { projectEmployee } from './projector.js';
import type { EmployeeStore } from './store.js';
import type { ProjectedEmployee, SearchFilters } from './types.js';
import type { VisibilityPolicy } from './visibility.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SearchRequest {
  /** Non-empty; the transport rejects missing ids before calling search(). */
  organizationId: string;
  clientKey: string;
  filters?: SearchFilters;
}

export type SearchResult =
  | { kind: 'admitted'; employees: ProjectedEmployee[]; rateLimit: RateLimitDecision }
  | {
      kind: 'rate_limited';
      limit: number;
      windowSeconds: number;
      retryAfterSeconds: number;
      rateLimit: RateLimitDecision;
    }
  | { kind: 'unknown_organization'; organizationId: string; rateLimit: RateLimitDecision }
  | { kind: 'no_visible_columns'; organizationId: string; rateLimit: RateLimitDecision };

export type SearchOutcome = SearchResult['kind'];

export interface DirectorySearchDeps {
  store: EmployeeStore;
  policy: VisibilityPolicy;
  limiter: SlidingWindowRateLimiter;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class DirectorySearch {
  private readonly store: EmployeeStore;
  private readonly policy: VisibilityPolicy;
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly log: Logger;

  constructor(deps: DirectorySearchDeps) {
    this.store = deps.store;
    this.policy = deps.policy;
    this.limiter = deps.limiter;
    this.log = deps.logger.child({ component: 'directory-search' });
  }

  search(request: SearchRequest): SearchResult {
    const { organizationId, clientKey } = request;

    const rateLimit = this.limiter.tryAcquire(clientKey);
    if (!rateLimit.allowed) {
      this.log.info(`Rate limited client ${clientKey}`);
      return {
        kind: 'rate_limited',
        limit: rateLimit.limit,
        windowSeconds: Math.ceil(this.limiter.windowMs / 1000),
        retryAfterSeconds: Math.ceil(rateLimit.retryAfterMs / 1000),
        rateLimit,
      };
    }

    const resolution = this.policy.resolve(organizationId);
    if (resolution.kind === 'unknown') {
      this.log.debug(`Unknown organization ${organizationId}`);
      return { kind: 'unknown_organization', organizationId, rateLimit };
    }
    if (resolution.columns.length === 0) {
      this.log.debug(`Organization ${organizationId} has no visible columns`);
      return { kind: 'no_visible_columns', organizationId, rateLimit };
    }

    const employees = this.store
      .search(organizationId, request.filters)
      .map((employee) => projectEmployee(employee, resolution.columns));

    return { kind: 'admitted', employees, rateLimit };
  }
}
