import { createSnapshot } from '../core/snapshot.js';
import { ColumnAttributes, MetadataSnapshot } from '../types/index.js';

export function col(
  tableName: string,
  columnName: string,
  overrides: Partial<Omit<ColumnAttributes, 'tableName' | 'columnName'>> = {}
): ColumnAttributes {
  return {
    tableName,
    columnName,
    dataType: 'VARCHAR2',
    dataPrecision: null,
    dataScale: null,
    nullable: true,
    maxLength: 50,
    ordinalPosition: null,
    ...overrides,
  };
}

export const number = (precision: number | null, scale: number | null = 0) => ({
  dataType: 'NUMBER',
  dataPrecision: precision,
  dataScale: scale,
  maxLength: 22,
});

export const varchar = (length: number) => ({ dataType: 'VARCHAR2', maxLength: length });

export function empCommon(salaryPrecision = 10): ColumnAttributes[] {
  return [
    col('EMP_COMMON', 'EMP_ID', { ...number(10), nullable: false, ordinalPosition: 1 }),
    col('EMP_COMMON', 'NAME', { ...varchar(50), ordinalPosition: 2 }),
    col('EMP_COMMON', 'SALARY', { ...number(salaryPrecision, 2), ordinalPosition: 3 }),
  ];
}

export function snapshot(label: string, rows: ColumnAttributes[]): MetadataSnapshot {
  return createSnapshot(label, rows);
}
