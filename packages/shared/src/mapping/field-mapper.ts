/**
 * Field Mapper
 *
 * Copies employee record values onto output template fields. Total: a mapped
 * source key the record does not have becomes '', never a missing column.
 */

import type { EmployeeRecord, FieldMapping, MappedRow } from '../types';

/**
 * Map one record. Output keys follow the mapping's order.
 */
export function mapRecord(employee: EmployeeRecord, mapping: FieldMapping): MappedRow {
  const row: MappedRow = {};

  for (const [templateField, sourceField] of Object.entries(mapping)) {
    const value = Object.hasOwn(employee, sourceField) ? employee[sourceField] : undefined;
    row[templateField] = value ?? '';
  }

  return row;
}

export function mapFields(employees: EmployeeRecord[], mapping: FieldMapping): MappedRow[] {
  return employees.map(employee => mapRecord(employee, mapping));
}
