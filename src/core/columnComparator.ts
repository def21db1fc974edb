import { AttributeMismatch, ColumnComparison } from '../types/comparison.js';
import { ColumnAttributes } from '../types/index.js';
import { StructuralError } from './errors.js';
import { normalizeIdentifier } from './snapshot.js';

function sameOptionalNumber(a: number | null, b: number | null): boolean {
  // null is "not applicable": it matches another null and never a value, 0 included
  return a === b;
}

function identityOf(column: ColumnAttributes): { table: string; column: string } {
  const table = normalizeIdentifier(column.tableName ?? '');
  const name = normalizeIdentifier(column.columnName ?? '');
  if (!table) throw new StructuralError('EMPTY_TABLE_NAME', table, name);
  if (!name) throw new StructuralError('EMPTY_COLUMN_NAME', table, name);
  return { table, column: name };
}

/**
 * Compares the type attributes of two records describing the same column.
 * Divergence is returned as data; only a missing or mismatched identity throws.
 */
export function compareColumnAttributes(primary: ColumnAttributes, secondary: ColumnAttributes): ColumnComparison {
  const left = identityOf(primary);
  const right = identityOf(secondary);
  if (left.table !== right.table || left.column !== right.column) {
    throw new StructuralError(
      'IDENTITY_MISMATCH',
      left.table,
      left.column,
      `compared against ${right.table}.${right.column}`
    );
  }

  const mismatches: AttributeMismatch[] = [];

  if (primary.dataType.toUpperCase() !== secondary.dataType.toUpperCase()) {
    mismatches.push({ attribute: 'dataType', primary: primary.dataType, secondary: secondary.dataType });
  }
  if (!sameOptionalNumber(primary.maxLength, secondary.maxLength)) {
    mismatches.push({ attribute: 'maxLength', primary: primary.maxLength, secondary: secondary.maxLength });
  }
  if (!sameOptionalNumber(primary.dataPrecision, secondary.dataPrecision)) {
    mismatches.push({ attribute: 'dataPrecision', primary: primary.dataPrecision, secondary: secondary.dataPrecision });
  }
  if (!sameOptionalNumber(primary.dataScale, secondary.dataScale)) {
    mismatches.push({ attribute: 'dataScale', primary: primary.dataScale, secondary: secondary.dataScale });
  }
  if (primary.nullable !== secondary.nullable) {
    mismatches.push({ attribute: 'nullable', primary: primary.nullable, secondary: secondary.nullable });
  }

  return mismatches.length === 0 ? { equal: true } : { equal: false, mismatches };
}
