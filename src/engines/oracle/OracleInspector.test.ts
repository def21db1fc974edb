import { describe, expect, it } from 'vitest';
import { StructuralError } from '../../core/errors.js';
import { FakeConnection } from '../../test/fakeConnection.js';
import { OracleInspector, toColumnAttributes } from './OracleInspector.js';

const row = (overrides: Record<string, unknown> = {}) => ({
  OWNER: 'SCHEMA1',
  TABLE_NAME: 'EMP_COMMON',
  COLUMN_NAME: 'SALARY',
  DATA_TYPE: 'NUMBER',
  DATA_LENGTH: 22,
  DATA_PRECISION: 10,
  DATA_SCALE: 2,
  NULLABLE: 'Y',
  COLUMN_ID: 3,
  ...overrides,
});

describe('toColumnAttributes', () => {
  it('maps an ALL_TAB_COLUMNS row', () => {
    expect(toColumnAttributes(row())).toEqual({
      tableName: 'EMP_COMMON',
      columnName: 'SALARY',
      dataType: 'NUMBER',
      dataPrecision: 10,
      dataScale: 2,
      nullable: true,
      maxLength: 22,
      ordinalPosition: 3,
    });
  });

  it('keeps null precision and scale for character columns', () => {
    const attributes = toColumnAttributes(
      row({ COLUMN_NAME: 'NAME', DATA_TYPE: 'VARCHAR2', DATA_LENGTH: 50, DATA_PRECISION: null, DATA_SCALE: null, NULLABLE: 'N' })
    );
    expect(attributes).toMatchObject({ dataPrecision: null, dataScale: null, maxLength: 50, nullable: false });
  });

  it('rejects a row with an unexpected nullable flag', () => {
    expect(() => toColumnAttributes(row({ NULLABLE: 'MAYBE' }))).toThrow();
  });
});

describe('OracleInspector', () => {
  it('queries the configured owners and builds a snapshot', async () => {
    const db = new FakeConnection([
      row({ COLUMN_NAME: 'SALARY', COLUMN_ID: 3 }),
      row({ COLUMN_NAME: 'EMP_ID', COLUMN_ID: 1, DATA_PRECISION: 10, DATA_SCALE: 0, NULLABLE: 'N' }),
      row({ TABLE_NAME: 'DEPT_COMMON', COLUMN_NAME: 'DEPT_ID', COLUMN_ID: 1 }),
    ]);
    const inspector = new OracleInspector(db, { label: 'staging', schemas: ['SCHEMA1', 'SYS'] });

    const snapshot = await inspector.captureSnapshot();

    expect(db.queries).toHaveLength(1);
    expect(db.queries[0].params).toEqual(['SCHEMA1']);
    expect(db.queries[0].text).toContain('FROM all_tab_columns');
    expect(db.queries[0].text).toContain('WHERE owner IN (:1)');
    expect(snapshot.label).toBe('staging');
    expect(snapshot.capturedAt).toBeInstanceOf(Date);
    expect([...snapshot.tables.keys()]).toEqual(['EMP_COMMON', 'DEPT_COMMON']);
    expect(snapshot.tables.get('EMP_COMMON')?.columns.map(c => c.columnName)).toEqual(['EMP_ID', 'SALARY']);
  });

  it('skips the query when only system schemas are configured', async () => {
    const db = new FakeConnection([row()]);
    const snapshot = await new OracleInspector(db, { label: 'x', schemas: ['SYS', 'SYSTEM'] }).captureSnapshot();

    expect(db.queries).toHaveLength(0);
    expect(snapshot.tables.size).toBe(0);
  });

  it('rejects the same table name coming from two owners', async () => {
    const db = new FakeConnection([row({ OWNER: 'A' }), row({ OWNER: 'B' })]);
    const inspector = new OracleInspector(db, { label: 'x', schemas: ['A', 'B'] });

    await expect(inspector.captureSnapshot()).rejects.toBeInstanceOf(StructuralError);
    expect(db.queries[0].text).toContain('WHERE owner IN (:1, :2)');
  });
});
