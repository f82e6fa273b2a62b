/**
 * Visibility Policy — organization id to ordered visible columns.
 * Loaded once at startup and read-only afterwards.
 */

export type ColumnResolution =
  | { kind: 'configured'; columns: readonly string[] }
  | { kind: 'unknown' };

const NO_COLUMNS: readonly string[] = Object.freeze([]);

export class VisibilityPolicy {
  private readonly entries: ReadonlyMap<string, readonly string[]>;

  constructor(entries: Iterable<readonly [string, readonly string[]]>) {
    const map = new Map<string, readonly string[]>();
    for (const [orgId, columns] of entries) {
      map.set(orgId, Object.freeze([...columns]));
    }
    this.entries = map;
  }

  /** Tagged lookup: distinguishes an unknown organization from an empty list. */
  resolve(organizationId: string): ColumnResolution {
    const columns = this.entries.get(organizationId);
    return columns ? { kind: 'configured', columns } : { kind: 'unknown' };
  }

  /** Configured columns, or an empty list when the organization is unknown. */
  columnsFor(organizationId: string): readonly string[] {
    return this.entries.get(organizationId) ?? NO_COLUMNS;
  }

  organizations(): string[] {
    return [...this.entries.keys()];
  }
}
