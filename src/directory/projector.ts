import { isEmployeeField, type Employee, type ProjectedEmployee } from './types.js';

/**
 * Reduce a record to the given columns, in column order.
 * Names that are not employee fields are skipped; nothing outside
 * `columns` is ever copied.
 */
export function projectEmployee(
  employee: Readonly<Employee>,
  columns: readonly string[],
): ProjectedEmployee {
  const projected: ProjectedEmployee = {};
  for (const column of columns) {
    if (isEmployeeField(column)) {
      projected[column] = employee[column];
    }
  }
  return projected;
}
