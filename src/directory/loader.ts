/**
 * Directory Loader — reads the employee dataset and visibility config
 *
 * Files (inside the data directory):
 *   employees.json      — array of employee records
 *   organizations.json  — { "<organization_id>": ["<column>", ...] }
 *   openapi.json        — OpenAPI document served at /openapi.json
 *
 * Shape errors fail fast with a DataLoadError listing every problem.
 * Column names that are not employee fields are kept (the projector drops
 * them) but logged; duplicate column names are collapsed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { Logger } from '../logger.js';
import { isEmployeeField, type Employee } from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class DataLoadError extends Error {
  readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid data in ${source}:\n  ${problems.join('\n  ')}`);
    this.name = 'DataLoadError';
    this.problems = problems;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new DataLoadError(file, [
      `cannot read file: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new DataLoadError(file, [
      `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
}

function readString(item: Record<string, unknown>, field: string, missing: string[]): string {
  const value = item[field];
  if (typeof value === 'string' && value !== '') return value;
  missing.push(field);
  return '';
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export function parseEmployees(raw: unknown, source = 'employees'): Employee[] {
  if (!Array.isArray(raw)) {
    throw new DataLoadError(source, ['expected an array of employee records']);
  }

  const problems: string[] = [];
  const seenIds = new Set<string>();
  const employees: Employee[] = [];

  raw.forEach((item: unknown, index) => {
    const at = `[${index}]`;
    if (!isRecord(item)) {
      problems.push(`${at}: expected an object`);
      return;
    }

    const missing: string[] = [];
    const employee: Employee = {
      id: readString(item, 'id', missing),
      organization_id: readString(item, 'organization_id', missing),
      first_name: readString(item, 'first_name', missing),
      last_name: readString(item, 'last_name', missing),
      email: readString(item, 'email', missing),
      phone: null,
      department: readString(item, 'department', missing),
      location: readString(item, 'location', missing),
      position: readString(item, 'position', missing),
      status: readString(item, 'status', missing),
      salary: 0,
    };
    let valid = missing.length === 0;
    if (!valid) {
      problems.push(`${at}: missing or non-string ${missing.join(', ')}`);
    }

    const phone = item.phone ?? null;
    if (phone === null || typeof phone === 'string') {
      employee.phone = phone;
    } else {
      problems.push(`${at}: phone must be a string or null`);
      valid = false;
    }

    const salary = item.salary;
    if (typeof salary === 'number' && Number.isFinite(salary)) {
      employee.salary = salary;
    } else {
      problems.push(`${at}: salary must be a finite number`);
      valid = false;
    }

    if (!valid) return;

    if (seenIds.has(employee.id)) {
      problems.push(`${at}: duplicate id "${employee.id}"`);
      return;
    }
    seenIds.add(employee.id);
    employees.push(employee);
  });

  if (problems.length > 0) {
    throw new DataLoadError(source, problems);
  }
  return employees;
}

export function parseOrganizationColumns(
  raw: unknown,
  log?: Logger,
  source = 'organizations',
): Map<string, string[]> {
  if (!isRecord(raw)) {
    throw new DataLoadError(source, ['expected an object of organization_id -> columns']);
  }

  const problems: string[] = [];
  const columnsByOrg = new Map<string, string[]>();

  for (const [orgId, value] of Object.entries(raw)) {
    if (orgId === '') {
      problems.push('organization id must not be empty');
      continue;
    }
    if (!Array.isArray(value) || !value.every((c): c is string => typeof c === 'string')) {
      problems.push(`${orgId}: expected an array of column names`);
      continue;
    }

    const columns: string[] = [];
    for (const column of value) {
      if (columns.includes(column)) {
        log?.warn(`Organization ${orgId} lists column "${column}" more than once; keeping the first`);
        continue;
      }
      if (!isEmployeeField(column)) {
        log?.warn(`Organization ${orgId} lists unknown column "${column}"; it will be omitted from results`);
      }
      columns.push(column);
    }
    columnsByOrg.set(orgId, columns);
  }

  if (problems.length > 0) {
    throw new DataLoadError(source, problems);
  }
  return columnsByOrg;
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export interface DirectoryData {
  employees: Employee[];
  columns: Map<string, string[]>;
}

export function loadDirectory(dataDir: string, log?: Logger): DirectoryData {
  const employeesFile = path.join(dataDir, 'employees.json');
  const organizationsFile = path.join(dataDir, 'organizations.json');

  return {
    employees: parseEmployees(readJson(employeesFile), employeesFile),
    columns: parseOrganizationColumns(readJson(organizationsFile), log, organizationsFile),
  };
}

export function loadOpenApiDocument(dataDir: string): Record<string, unknown> {
  const file = path.join(dataDir, 'openapi.json');
  const doc = readJson(file);
  if (!isRecord(doc) || typeof doc.openapi !== 'string') {
    throw new DataLoadError(file, ['expected an OpenAPI document with an "openapi" version']);
  }
  return doc;
}
