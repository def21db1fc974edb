import { ComparisonResult, DiffEntry, OnlyInEntry } from '../types/comparison.js';
import { ColumnAttributes, MetadataSnapshot } from '../types/index.js';
import { compareColumnAttributes } from './columnComparator.js';
import { normalizeIdentifier, validateSnapshot } from './snapshot.js';

type ColumnIndex = Map<string, ColumnAttributes>;

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byTableThenColumn(a: { table: string; column: string }, b: { table: string; column: string }): number {
  return byCodeUnit(a.table, b.table) || byCodeUnit(a.column, b.column);
}

function indexTables(snapshot: MetadataSnapshot): Map<string, ColumnIndex> {
  const tables = new Map<string, ColumnIndex>();
  for (const [name, table] of snapshot.tables) {
    const columns: ColumnIndex = new Map();
    for (const column of table.columns) {
      columns.set(normalizeIdentifier(column.columnName), column);
    }
    tables.set(normalizeIdentifier(name), columns);
  }
  return tables;
}

/**
 * Reduces two metadata snapshots into DIFF / ONLY_IN_PRIMARY / ONLY_IN_SECONDARY
 * findings. A DIFF entry covers one column and lists every attribute that differs.
 *
 * Holds no state: one instance can serve any number of comparisons.
 */
export class SchemaComparator {
  compare(primary: MetadataSnapshot, secondary: MetadataSnapshot): ComparisonResult {
    validateSnapshot(primary);
    validateSnapshot(secondary);

    const primaryTables = indexTables(primary);
    const secondaryTables = indexTables(secondary);

    const diffColumns: DiffEntry[] = [];
    const onlyInPrimary: OnlyInEntry[] = [];
    const onlyInSecondary: OnlyInEntry[] = [];
    let tablesCompared = 0;
    let tablesOnlyInPrimary = 0;
    let tablesOnlyInSecondary = 0;

    const tableNames = new Set([...primaryTables.keys(), ...secondaryTables.keys()]);

    for (const table of tableNames) {
      const primaryColumns = primaryTables.get(table);
      const secondaryColumns = secondaryTables.get(table);

      if (primaryColumns && secondaryColumns) {
        tablesCompared++;
      } else if (primaryColumns) {
        tablesOnlyInPrimary++;
      } else {
        tablesOnlyInSecondary++;
      }

      const columnNames = new Set([...(primaryColumns?.keys() ?? []), ...(secondaryColumns?.keys() ?? [])]);

      for (const column of columnNames) {
        const left = primaryColumns?.get(column);
        const right = secondaryColumns?.get(column);

        if (left && right) {
          const comparison = compareColumnAttributes(left, right);
          if (!comparison.equal) {
            diffColumns.push({
              category: 'DIFF',
              table,
              column,
              mismatches: Object.freeze(comparison.mismatches),
              primary: left,
              secondary: right,
            });
          }
        } else if (left) {
          onlyInPrimary.push({ category: 'ONLY_IN_PRIMARY', table, column, attributes: left });
        } else if (right) {
          onlyInSecondary.push({ category: 'ONLY_IN_SECONDARY', table, column, attributes: right });
        }
      }
    }

    diffColumns.sort(byTableThenColumn);
    onlyInPrimary.sort(byTableThenColumn);
    onlyInSecondary.sort(byTableThenColumn);

    return Object.freeze({
      primary: primary.label,
      secondary: secondary.label,
      diffColumns: Object.freeze(diffColumns.map(entry => Object.freeze(entry))),
      onlyInPrimary: Object.freeze(onlyInPrimary.map(entry => Object.freeze(entry))),
      onlyInSecondary: Object.freeze(onlyInSecondary.map(entry => Object.freeze(entry))),
      summary: Object.freeze({
        tablesCompared,
        tablesOnlyInPrimary,
        tablesOnlyInSecondary,
        diffColumns: diffColumns.length,
        onlyInPrimary: onlyInPrimary.length,
        onlyInSecondary: onlyInSecondary.length,
        totalFindings: diffColumns.length + onlyInPrimary.length + onlyInSecondary.length,
      }),
    });
  }
}

const sharedComparator = new SchemaComparator();

export function compareSnapshots(primary: MetadataSnapshot, secondary: MetadataSnapshot): ComparisonResult {
  return sharedComparator.compare(primary, secondary);
}

export function isIdentical(result: ComparisonResult): boolean {
  return result.summary.totalFindings === 0;
}
