import { z } from 'zod';
import { ColumnAttributes, MetadataSnapshot, TableSnapshot } from '../types/index.js';
import { StructuralError } from './errors.js';

/** Catalog identifiers are case-insensitive and stored upper-case. */
export function normalizeIdentifier(name: string): string {
  return name.trim().toUpperCase();
}

function byOrdinal(a: ColumnAttributes, b: ColumnAttributes): number {
  if (a.ordinalPosition === null) return b.ordinalPosition === null ? 0 : 1;
  if (b.ordinalPosition === null) return -1;
  return a.ordinalPosition - b.ordinalPosition;
}

/**
 * Read-only view over the tables of a snapshot. The backing map is private, so
 * a snapshot cannot gain or lose tables after construction.
 */
export class SnapshotTables implements ReadonlyMap<string, TableSnapshot> {
  readonly #entries: Map<string, TableSnapshot>;

  constructor(entries: Iterable<readonly [string, TableSnapshot]>) {
    this.#entries = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: string): TableSnapshot | undefined {
    return this.#entries.get(key);
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  forEach(callback: (value: TableSnapshot, key: string, map: ReadonlyMap<string, TableSnapshot>) => void, thisArg?: unknown): void {
    for (const [key, value] of this.#entries) callback.call(thisArg, value, key, this);
  }

  entries() {
    return this.#entries.entries();
  }

  keys() {
    return this.#entries.keys();
  }

  values() {
    return this.#entries.values();
  }

  [Symbol.iterator]() {
    return this.#entries.entries();
  }
}

/**
 * Groups flat catalog rows into a frozen snapshot. Columns keep catalog ordinal
 * order; rows without an ordinal follow the others in arrival order.
 */
export function createSnapshot(
  label: string,
  rows: Iterable<ColumnAttributes>,
  capturedAt: Date | null = null
): MetadataSnapshot {
  const grouped = new Map<string, ColumnAttributes[]>();

  for (const row of rows) {
    const tableName = normalizeIdentifier(row.tableName);
    if (!tableName) {
      throw new StructuralError('EMPTY_TABLE_NAME', row.tableName, row.columnName);
    }
    const column: ColumnAttributes = Object.freeze({
      ...row,
      tableName,
      columnName: normalizeIdentifier(row.columnName),
    });
    const columns = grouped.get(tableName);
    if (columns) columns.push(column);
    else grouped.set(tableName, [column]);
  }

  const tables = new SnapshotTables(
    [...grouped].map(([name, columns]) => [name, Object.freeze({ name, columns: Object.freeze([...columns].sort(byOrdinal)) })] as const)
  );

  const snapshot: MetadataSnapshot = Object.freeze({ label, capturedAt, tables });
  validateSnapshot(snapshot);
  return snapshot;
}

/**
 * Checks the invariants every snapshot must hold before it can be compared.
 * @throws StructuralError naming the first offending table/column
 */
export function validateSnapshot(snapshot: MetadataSnapshot): void {
  const seenTables = new Set<string>();

  for (const [key, table] of snapshot.tables) {
    const tableName = normalizeIdentifier(key);
    if (!tableName) {
      throw new StructuralError('EMPTY_TABLE_NAME', key);
    }
    if (normalizeIdentifier(table.name) !== tableName) {
      throw new StructuralError('TABLE_NAME_MISMATCH', key, undefined, `entry is named "${table.name}"`);
    }
    if (seenTables.has(tableName)) {
      throw new StructuralError('DUPLICATE_TABLE', tableName);
    }
    seenTables.add(tableName);

    const seenColumns = new Set<string>();
    for (const column of table.columns) {
      const columnName = normalizeIdentifier(column.columnName);
      if (!columnName) {
        throw new StructuralError('EMPTY_COLUMN_NAME', tableName, column.columnName);
      }
      if (normalizeIdentifier(column.tableName) !== tableName) {
        throw new StructuralError(
          'COLUMN_TABLE_MISMATCH',
          tableName,
          columnName,
          `column belongs to "${column.tableName}"`
        );
      }
      if (seenColumns.has(columnName)) {
        throw new StructuralError('DUPLICATE_COLUMN', tableName, columnName);
      }
      seenColumns.add(columnName);
    }
  }
}

const columnSchema = z.object({
  tableName: z.string(),
  columnName: z.string(),
  dataType: z.string(),
  dataPrecision: z.number().int().nullable(),
  dataScale: z.number().int().nullable(),
  nullable: z.boolean(),
  maxLength: z.number().int().nullable(),
  ordinalPosition: z.number().int().nullable().default(null),
});

const tableColumnsSchema = z.array(columnSchema);

// Tables are checked one by one below: zod rebuilds records by assignment,
// which would drop a table keyed "__proto__".
const serializedSnapshotSchema = z.object({
  label: z.string(),
  capturedAt: z.string().datetime({ offset: true }).nullable().default(null),
  tables: z.custom<Record<string, unknown>>(
    value => typeof value === 'object' && value !== null && !Array.isArray(value),
    'Expected an object of tables'
  ),
});

export interface SerializedSnapshot {
  label: string;
  capturedAt?: string | null;
  tables: Record<string, z.input<typeof columnSchema>[]>;
}

export function serializeSnapshot(snapshot: MetadataSnapshot): SerializedSnapshot {
  const tables: Record<string, ColumnAttributes[]> = Object.fromEntries(
    [...snapshot.tables].map(([name, table]) => [name, table.columns.map(column => ({ ...column }))])
  );
  return {
    label: snapshot.label,
    capturedAt: snapshot.capturedAt ? snapshot.capturedAt.toISOString() : null,
    tables,
  };
}

/**
 * Rebuilds a snapshot from its JSON form. Table keys and column records are
 * taken as written and must already satisfy the snapshot invariants.
 */
export function parseSnapshot(input: unknown): MetadataSnapshot {
  const parsed = serializedSnapshotSchema.parse(input);

  const tables = new SnapshotTables(
    Object.entries(parsed.tables).map(([name, raw]) => {
      const columns = tableColumnsSchema.parse(raw, { path: ['tables', name] });
      return [name, Object.freeze({ name, columns: Object.freeze(columns.map(c => Object.freeze(c))) })] as const;
    })
  );

  const snapshot: MetadataSnapshot = Object.freeze({
    label: parsed.label,
    capturedAt: parsed.capturedAt ? new Date(parsed.capturedAt) : null,
    tables,
  });
  validateSnapshot(snapshot);
  return snapshot;
}
