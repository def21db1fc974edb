import { describe, expect, it } from 'vitest';
import { col, empCommon, number, snapshot, varchar } from '../test/fixtures.js';
import { ComparisonResult } from '../types/comparison.js';
import { ColumnAttributes, MetadataSnapshot } from '../types/index.js';
import { compareSnapshots, isIdentical, SchemaComparator } from './comparator.js';
import { StructuralError } from './errors.js';

const deptCommon = (): ColumnAttributes[] => [
  col('DEPT_COMMON', 'DEPT_ID', { ...number(5), nullable: false, ordinalPosition: 1 }),
  col('DEPT_COMMON', 'DEPT_NAME', { ...varchar(50), ordinalPosition: 2 }),
];

const db1Rows = (): ColumnAttributes[] => [
  ...empCommon(10),
  ...deptCommon(),
  col('ONLY_IN_DB1', 'ID', { ...number(10), nullable: false, ordinalPosition: 1 }),
  col('ONLY_IN_DB1', 'DESCRIPTION', { ...varchar(100), ordinalPosition: 2 }),
  col('DIFF_TABLE', 'ID', { ...number(10), nullable: false, ordinalPosition: 1 }),
  col('DIFF_TABLE', 'COL1', { ...varchar(20), ordinalPosition: 2 }),
  col('DIFF_TABLE', 'COL2', { ...number(5, 2), ordinalPosition: 3 }),
  col('DIFF_TABLE', 'COL4', { dataType: 'DATE', maxLength: 7, ordinalPosition: 4 }),
];

const db2Rows = (): ColumnAttributes[] => [
  ...empCommon(8),
  ...deptCommon(),
  col('ONLY_IN_DB2', 'ID', { ...number(10), nullable: false, ordinalPosition: 1 }),
  col('ONLY_IN_DB2', 'NAME', { ...varchar(30), ordinalPosition: 2 }),
  col('DIFF_TABLE', 'ID', { ...number(10), nullable: false, ordinalPosition: 1 }),
  col('DIFF_TABLE', 'COL1', { ...varchar(30), ordinalPosition: 2 }),
  col('DIFF_TABLE', 'COL2', { ...number(5, 2), ordinalPosition: 3 }),
  col('DIFF_TABLE', 'COL3', { dataType: 'DATE', maxLength: 7, ordinalPosition: 4 }),
];

const keys = (entries: readonly { table: string; column: string }[]) => entries.map(e => `${e.table}.${e.column}`);

describe('SchemaComparator', () => {
  const db1 = snapshot('db1', db1Rows());
  const db2 = snapshot('db2', db2Rows());

  it('produces no entries for a table that matches on both sides', () => {
    const result = compareSnapshots(snapshot('a', deptCommon()), snapshot('b', deptCommon()));

    expect(isIdentical(result)).toBe(true);
    expect(result.summary).toEqual({
      tablesCompared: 1,
      tablesOnlyInPrimary: 0,
      tablesOnlyInSecondary: 0,
      diffColumns: 0,
      onlyInPrimary: 0,
      onlyInSecondary: 0,
      totalFindings: 0,
    });
  });

  it('reports a precision drift as one DIFF entry', () => {
    const result = compareSnapshots(snapshot('a', empCommon(10)), snapshot('b', empCommon(8)));

    expect(result.diffColumns).toHaveLength(1);
    expect(result.diffColumns[0]).toMatchObject({
      category: 'DIFF',
      table: 'EMP_COMMON',
      column: 'SALARY',
      mismatches: [{ attribute: 'dataPrecision', primary: 10, secondary: 8 }],
    });
    expect(result.diffColumns[0].primary.dataPrecision).toBe(10);
    expect(result.diffColumns[0].secondary.dataPrecision).toBe(8);
    expect(result.onlyInPrimary).toEqual([]);
    expect(result.onlyInSecondary).toEqual([]);
  });

  it('reports every column of a secondary-only table as ONLY_IN_SECONDARY', () => {
    const result = compareSnapshots(db1, db2);

    const onlyInDb2 = result.onlyInSecondary.filter(e => e.table === 'ONLY_IN_DB2');
    expect(keys(onlyInDb2)).toEqual(['ONLY_IN_DB2.ID', 'ONLY_IN_DB2.NAME']);
    expect(onlyInDb2.every(e => e.category === 'ONLY_IN_SECONDARY')).toBe(true);
    expect(result.diffColumns.some(e => e.table === 'ONLY_IN_DB2')).toBe(false);
    expect(onlyInDb2[1].attributes).toEqual(db2.tables.get('ONLY_IN_DB2')?.columns[1]);
  });

  it('splits unshared columns of a shared table and still compares the rest', () => {
    const result = compareSnapshots(db1, db2);

    expect(keys(result.onlyInPrimary.filter(e => e.table === 'DIFF_TABLE'))).toEqual(['DIFF_TABLE.COL4']);
    expect(keys(result.onlyInSecondary.filter(e => e.table === 'DIFF_TABLE'))).toEqual(['DIFF_TABLE.COL3']);
    expect(result.diffColumns.filter(e => e.table === 'DIFF_TABLE')).toEqual([
      expect.objectContaining({
        column: 'COL1',
        mismatches: [{ attribute: 'maxLength', primary: 20, secondary: 30 }],
      }),
    ]);
  });

  it('classifies the full fixture pair', () => {
    const result = compareSnapshots(db1, db2);

    expect(result.primary).toBe('db1');
    expect(result.secondary).toBe('db2');
    expect(keys(result.diffColumns)).toEqual(['DIFF_TABLE.COL1', 'EMP_COMMON.SALARY']);
    expect(keys(result.onlyInPrimary)).toEqual(['DIFF_TABLE.COL4', 'ONLY_IN_DB1.DESCRIPTION', 'ONLY_IN_DB1.ID']);
    expect(keys(result.onlyInSecondary)).toEqual(['DIFF_TABLE.COL3', 'ONLY_IN_DB2.ID', 'ONLY_IN_DB2.NAME']);
    expect(result.summary).toEqual({
      tablesCompared: 3,
      tablesOnlyInPrimary: 1,
      tablesOnlyInSecondary: 1,
      diffColumns: 2,
      onlyInPrimary: 3,
      onlyInSecondary: 3,
      totalFindings: 8,
    });
  });

  it('fails on a snapshot with a duplicated column before comparing', () => {
    const malformed: MetadataSnapshot = {
      label: 'broken',
      capturedAt: null,
      tables: new Map([['EMP', { name: 'EMP', columns: [col('EMP', 'ID'), col('EMP', 'NAME'), col('EMP', 'ID')] }]]),
    };

    expect(() => compareSnapshots(db1, malformed)).toThrow(StructuralError);
    expect(() => compareSnapshots(malformed, db1)).toThrow(/DUPLICATE_COLUMN at EMP\.ID/);
  });

  it('returns a frozen result', () => {
    const result = compareSnapshots(db1, db2);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.diffColumns)).toBe(true);
    expect(Object.isFrozen(result.onlyInPrimary[0])).toBe(true);
  });

  describe('properties', () => {
    it('is idempotent', () => {
      const comparator = new SchemaComparator();
      expect(comparator.compare(db1, db2)).toEqual(comparator.compare(db1, db2));
    });

    it('mirrors categories when the arguments are swapped', () => {
      const forward = compareSnapshots(db1, db2);
      const backward = compareSnapshots(db2, db1);

      const strip = (entries: ComparisonResult['onlyInPrimary']) =>
        entries.map(({ table, column, attributes }) => ({ table, column, attributes }));

      expect(strip(backward.onlyInSecondary)).toEqual(strip(forward.onlyInPrimary));
      expect(strip(backward.onlyInPrimary)).toEqual(strip(forward.onlyInSecondary));
      expect(backward.diffColumns.map(e => e.mismatches)).toEqual(
        forward.diffColumns.map(e =>
          e.mismatches.map(m => ({ attribute: m.attribute, primary: m.secondary, secondary: m.primary }))
        )
      );
    });

    it('accounts for every column exactly once', () => {
      const result = compareSnapshots(db1, db2);
      const reported = [
        ...keys(result.diffColumns),
        ...keys(result.onlyInPrimary),
        ...keys(result.onlyInSecondary),
      ];
      const union = new Set([...db1Rows(), ...db2Rows()].map(c => `${c.tableName}.${c.columnName}`));
      const identical = [...union].filter(k => !reported.includes(k)).sort();

      expect(new Set(reported).size).toBe(reported.length);
      expect(identical).toEqual([
        'DEPT_COMMON.DEPT_ID',
        'DEPT_COMMON.DEPT_NAME',
        'DIFF_TABLE.COL2',
        'DIFF_TABLE.ID',
        'EMP_COMMON.EMP_ID',
        'EMP_COMMON.NAME',
      ]);
    });

    it('orders entries independently of catalog order', () => {
      const shuffled = snapshot('db2', db2Rows().reverse());
      expect(compareSnapshots(db1, shuffled)).toEqual(compareSnapshots(db1, db2));
    });

    it('orders by table then column', () => {
      const result = compareSnapshots(
        snapshot('a', []),
        snapshot('b', [col('B_TABLE', 'Z'), col('B_TABLE', 'A'), col('A_TABLE', 'M')])
      );
      expect(keys(result.onlyInSecondary)).toEqual(['A_TABLE.M', 'B_TABLE.A', 'B_TABLE.Z']);
      expect(result.summary.tablesOnlyInSecondary).toBe(2);
    });
  });
});
