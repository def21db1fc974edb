import dayjs from 'dayjs';
import { z } from 'zod';
import { createSnapshot } from '../../core/snapshot.js';
import { ColumnAttributes, ConnectionConfig, MetadataSnapshot } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { IDbConnection, IMetadataInspector } from '../interfaces.js';

const columnRowSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string(),
  character_maximum_length: z.number().int().nullable(),
  numeric_precision: z.number().int().nullable(),
  numeric_scale: z.number().int().nullable(),
  is_nullable: z.enum(['YES', 'NO']),
  ordinal_position: z.number().int().nullable(),
});

export class PostgresInspector implements IMetadataInspector {
  constructor(
    private db: IDbConnection,
    private config: Pick<ConnectionConfig, 'label' | 'schemas'>
  ) {}

  async captureSnapshot(): Promise<MetadataSnapshot> {
    logger.info(`Fetching column metadata from ${this.config.label} for schemas: ${this.config.schemas.join(', ')}...`);

    const placeholders = this.config.schemas.map((_, i) => `$${i + 1}`).join(', ');
    const rows = await this.db.query(`
      SELECT
        c.table_name,
        c.column_name,
        c.data_type,
        c.character_maximum_length::int AS character_maximum_length,
        c.numeric_precision::int AS numeric_precision,
        c.numeric_scale::int AS numeric_scale,
        c.is_nullable,
        c.ordinal_position::int AS ordinal_position
      FROM information_schema.columns c
      JOIN information_schema.tables t
        ON t.table_schema = c.table_schema AND t.table_name = c.table_name
      WHERE upper(c.table_schema) IN (${placeholders})
      AND t.table_type = 'BASE TABLE'
      ORDER BY c.table_name, c.ordinal_position
    `, this.config.schemas);

    logger.info(`Fetched ${rows.length} rows of column metadata from ${this.config.label}.`);

    return createSnapshot(this.config.label, rows.map(toColumnAttributes), dayjs().toDate());
  }
}

export function toColumnAttributes(raw: Record<string, unknown>): ColumnAttributes {
  const row = columnRowSchema.parse(raw);
  return {
    tableName: row.table_name,
    columnName: row.column_name,
    dataType: row.data_type,
    dataPrecision: row.numeric_precision,
    dataScale: row.numeric_scale,
    nullable: row.is_nullable === 'YES',
    maxLength: row.character_maximum_length,
    ordinalPosition: row.ordinal_position,
  };
}
