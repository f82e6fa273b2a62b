import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createTestLogger } from '../../__tests__/helpers.js';
import { DEFAULT_DATA_DIR } from '../../config.js';
import {
  DataLoadError,
  loadDirectory,
  loadOpenApiDocument,
  parseEmployees,
  parseOrganizationColumns,
} from '../loader.js';

const validRecord = {
  id: 'e1',
  organization_id: 'acme',
  first_name: 'Mara',
  last_name: 'Quill',
  email: 'mara@acme.test',
  phone: '555-0100',
  department: 'Engineering',
  location: 'Oslo',
  position: 'Engineer',
  status: 'Active',
  salary: 81000,
};

// ============================================================================
// parseEmployees
// ============================================================================

describe('parseEmployees', () => {
  it('accepts well-formed records', () => {
    expect(parseEmployees([validRecord])).toEqual([validRecord]);
  });

  it('defaults a missing phone to null', () => {
    const { phone: _phone, ...withoutPhone } = validRecord;
    expect(parseEmployees([withoutPhone])[0].phone).toBeNull();
  });

  it('rejects a non-array payload', () => {
    expect(() => parseEmployees({ employees: [] })).toThrow(DataLoadError);
  });

  it('lists every problem it finds', () => {
    const bad = [
      validRecord,
      'not-an-object',
      { ...validRecord, id: 'e2', email: 42, status: '' },
      { ...validRecord, id: 'e3', salary: '100' },
      { ...validRecord, id: 'e4', phone: 5550100 },
      { ...validRecord },
    ];

    let error: unknown;
    try {
      parseEmployees(bad, 'employees.json');
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(DataLoadError);
    expect(error instanceof DataLoadError && error.problems).toEqual([
      '[1]: expected an object',
      '[2]: missing or non-string email, status',
      '[3]: salary must be a finite number',
      '[4]: phone must be a string or null',
      '[5]: duplicate id "e1"',
    ]);
  });
});

// ============================================================================
// parseOrganizationColumns
// ============================================================================

describe('parseOrganizationColumns', () => {
  it('keeps column order per organization', () => {
    const columns = parseOrganizationColumns({
      acme: ['status', 'first_name'],
      globex: [],
    });
    expect([...columns.entries()]).toEqual([
      ['acme', ['status', 'first_name']],
      ['globex', []],
    ]);
  });

  it('collapses duplicate columns and warns', () => {
    const log = createTestLogger();
    const columns = parseOrganizationColumns({ acme: ['id', 'email', 'id'] }, log);

    expect(columns.get('acme')).toEqual(['id', 'email']);
    expect(log.warn).toHaveBeenCalledWith(
      'Organization acme lists column "id" more than once; keeping the first',
    );
  });

  it('keeps unknown column names but warns about them', () => {
    const log = createTestLogger();
    const columns = parseOrganizationColumns({ acme: ['first_name', 'salry'] }, log);

    expect(columns.get('acme')).toEqual(['first_name', 'salry']);
    expect(log.warn).toHaveBeenCalledWith(
      'Organization acme lists unknown column "salry"; it will be omitted from results',
    );
  });

  it('rejects entries that are not lists of strings', () => {
    expect(() => parseOrganizationColumns({ acme: 'first_name' })).toThrow(
      /acme: expected an array of column names/,
    );
    expect(() => parseOrganizationColumns({ acme: ['id', 7] })).toThrow(DataLoadError);
    expect(() => parseOrganizationColumns(['acme'])).toThrow(DataLoadError);
  });
});

// ============================================================================
// Files
// ============================================================================

describe('loadDirectory', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'directory-loader-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads both files from the data directory', () => {
    fs.writeFileSync(path.join(dir, 'employees.json'), JSON.stringify([validRecord]));
    fs.writeFileSync(path.join(dir, 'organizations.json'), JSON.stringify({ acme: ['id'] }));

    const data = loadDirectory(dir);
    expect(data.employees).toEqual([validRecord]);
    expect(data.columns.get('acme')).toEqual(['id']);
  });

  it('fails with the file path when a file is missing', () => {
    fs.writeFileSync(path.join(dir, 'employees.json'), '[]');
    expect(() => loadDirectory(dir)).toThrow(path.join(dir, 'organizations.json'));
  });

  it('fails on malformed JSON', () => {
    fs.writeFileSync(path.join(dir, 'employees.json'), '[{');
    fs.writeFileSync(path.join(dir, 'organizations.json'), '{}');
    expect(() => loadDirectory(dir)).toThrow(/invalid JSON/);
  });

  it('loads the bundled dataset', () => {
    const data = loadDirectory(DEFAULT_DATA_DIR);
    expect(data.employees).toHaveLength(8);
    expect([...data.columns.keys()]).toEqual(['org_a', 'org_b', 'org_c']);
  });
});

describe('loadOpenApiDocument', () => {
  it('loads the bundled OpenAPI document', () => {
    const doc = loadOpenApiDocument(DEFAULT_DATA_DIR);
    expect(doc.openapi).toBe('3.1.0');
    expect(doc.paths).toHaveProperty(['/search', 'get']);
  });
});
