/**
 * Employee Store — in-memory, organization-scoped record lookups
 *
 * Records are bucketed by organization_id at construction. A search only
 * ever iterates the bucket of the requested organization, so no filter can
 * run against another tenant's records.
 *
 * Filter semantics:
 *   name                           — case-insensitive substring of "first last"
 *   department, location, position — case-insensitive exact match
 *   statuses                       — case-insensitive, any-of
 * Filters are conjunctive; empty strings and empty lists impose nothing.
 */

import type { Employee, SearchFilters } from './types.js';

// ---------------------------------------------------------------------------
// Normalized filters
// ---------------------------------------------------------------------------

interface NormalizedFilters {
  name?: string;
  department?: string;
  location?: string;
  position?: string;
  statuses?: ReadonlySet<string>;
}

function lower(value: string | undefined): string | undefined {
  return value ? value.toLowerCase() : undefined;
}

function normalizeFilters(filters: SearchFilters): NormalizedFilters {
  const statuses = (filters.statuses ?? []).filter((s) => s.length > 0);
  return {
    name: lower(filters.name),
    department: lower(filters.department),
    location: lower(filters.location),
    position: lower(filters.position),
    statuses:
      statuses.length > 0
        ? new Set(statuses.map((s) => s.toLowerCase()))
        : undefined,
  };
}

function matches(employee: Employee, f: NormalizedFilters): boolean {
  if (f.name !== undefined) {
    const fullName = `${employee.first_name} ${employee.last_name}`.toLowerCase();
    if (!fullName.includes(f.name)) return false;
  }
  if (f.department !== undefined && employee.department.toLowerCase() !== f.department) {
    return false;
  }
  if (f.location !== undefined && employee.location.toLowerCase() !== f.location) {
    return false;
  }
  if (f.position !== undefined && employee.position.toLowerCase() !== f.position) {
    return false;
  }
  if (f.statuses !== undefined && !f.statuses.has(employee.status.toLowerCase())) {
    return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class EmployeeStore {
  private readonly byOrganization = new Map<string, readonly Readonly<Employee>[]>();
  private readonly total: number;

  constructor(records: readonly Employee[]) {
    const buckets = new Map<string, Readonly<Employee>[]>();
    for (const record of records) {
      const frozen = Object.freeze({ ...record });
      const bucket = buckets.get(frozen.organization_id);
      if (bucket) {
        bucket.push(frozen);
      } else {
        buckets.set(frozen.organization_id, [frozen]);
      }
    }
    for (const [orgId, bucket] of buckets) {
      this.byOrganization.set(orgId, Object.freeze(bucket));
    }
    this.total = records.length;
  }

  /**
   * Return the organization's records matching every supplied filter,
   * in insertion order. Never throws; an empty array means no match.
   */
  search(organizationId: string, filters: SearchFilters = {}): Readonly<Employee>[] {
    const bucket = this.byOrganization.get(organizationId);
    if (!bucket) return [];

    const normalized = normalizeFilters(filters);
    return bucket.filter((employee) => matches(employee, normalized));
  }

  /** Number of records across all organizations. */
  size(): number {
    return this.total;
  }

  /** Organization ids that own at least one record. */
  organizations(): string[] {
    return [...this.byOrganization.keys()];
  }
}
