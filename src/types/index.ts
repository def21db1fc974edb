export type DbType = 'oracle' | 'postgres';

export interface ConnectionConfig {
  type: DbType;
  host: string;
  port: number;
  serviceName: string;
  user: string;
  password?: string;
  schemas: string[];
  label: string;
  retryCount: number;
  retryDelay: number;
}

/**
 * One column as read from a catalog. `null` on a numeric attribute means the
 * attribute does not apply to the column's type, which is not the same as `0`.
 */
export interface ColumnAttributes {
  tableName: string;
  columnName: string;
  dataType: string;
  dataPrecision: number | null;
  dataScale: number | null;
  nullable: boolean;
  maxLength: number | null;
  ordinalPosition: number | null;
}

export interface TableSnapshot {
  name: string;
  columns: readonly ColumnAttributes[];
}

export interface MetadataSnapshot {
  label: string;
  capturedAt: Date | null;
  tables: ReadonlyMap<string, TableSnapshot>;
}
