/**
 * Directory module types.
 * Defines employee records, search filters, and the projected output shape.
 */

// ============================================
// Employee record
// ============================================

export interface Employee {
  id: string;
  organization_id: string;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  department: string;
  location: string;
  position: string;
  /** Open-ended; observed values are "Active", "Not started" and "Terminated". */
  status: string;
  /** Sensitive. Only exposed to organizations that list it. */
  salary: number;
}

export const EMPLOYEE_FIELDS = [
  'id',
  'organization_id',
  'first_name',
  'last_name',
  'email',
  'phone',
  'department',
  'location',
  'position',
  'status',
  'salary',
] as const satisfies readonly (keyof Employee)[];

export type EmployeeField = (typeof EMPLOYEE_FIELDS)[number];

const FIELD_SET: ReadonlySet<string> = new Set(EMPLOYEE_FIELDS);

export function isEmployeeField(name: string): name is EmployeeField {
  return FIELD_SET.has(name);
}

// ============================================
// Search
// ============================================

export interface SearchFilters {
  /** Case-insensitive substring of "<first_name> <last_name>". */
  name?: string;
  department?: string;
  location?: string;
  position?: string;
  /** Matches when the status equals any entry (case-insensitive). */
  statuses?: readonly string[];
}

export type EmployeeValue = Employee[EmployeeField];

/** A record reduced to an organization's visible columns, in column order. */
export type ProjectedEmployee = Partial<Record<EmployeeField, EmployeeValue>>;
