import { describe, it, expect } from 'vitest';

import { projectEmployee } from '../projector.js';
import type { Employee } from '../types.js';

const employee: Employee = {
  id: 'e-17',
  organization_id: 'acme',
  first_name: 'Mara',
  last_name: 'Quill',
  email: 'mara@acme.test',
  phone: null,
  department: 'Engineering',
  location: 'Oslo',
  position: 'Engineer',
  status: 'Active',
  salary: 81000,
};

describe('projectEmployee', () => {
  it('keeps exactly the listed columns, in column order', () => {
    const projected = projectEmployee(employee, ['status', 'last_name', 'id']);
    expect(Object.keys(projected)).toEqual(['status', 'last_name', 'id']);
    expect(projected).toEqual({ status: 'Active', last_name: 'Quill', id: 'e-17' });
  });

  it('never exposes salary unless it is listed', () => {
    const projected = projectEmployee(employee, ['first_name', 'email']);
    expect(projected).not.toHaveProperty('salary');
    expect(projected).not.toHaveProperty('organization_id');
  });

  it('includes salary when it is listed', () => {
    expect(projectEmployee(employee, ['salary'])).toEqual({ salary: 81000 });
  });

  it('silently skips names that are not employee fields', () => {
    const projected = projectEmployee(employee, ['first_name', 'nickname', '__proto__', 'email']);
    expect(Object.keys(projected)).toEqual(['first_name', 'email']);
  });

  it('includes a null phone when phone is listed', () => {
    const projected = projectEmployee(employee, ['phone']);
    expect(projected).toEqual({ phone: null });
    expect(Object.keys(projected)).toEqual(['phone']);
  });

  it('returns an empty object for no columns', () => {
    expect(projectEmployee(employee, [])).toEqual({});
  });

  it('does not modify the source record', () => {
    const frozen = Object.freeze({ ...employee });
    projectEmployee(frozen, ['id', 'salary']);
    expect(frozen).toEqual(employee);
  });
});
