import dayjs from 'dayjs';
import { z } from 'zod';
import { createSnapshot } from '../../core/snapshot.js';
import { ColumnAttributes, ConnectionConfig, MetadataSnapshot } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { IDbConnection, IMetadataInspector } from '../interfaces.js';

// Oracle-maintained accounts; never compared even when configured by mistake.
export const ORACLE_SYSTEM_SCHEMAS: ReadonlySet<string> = new Set([
  'SYS', 'SYSTEM', 'OUTLN', 'XDB', 'DBSNMP', 'APPQOSSYS', 'AUDSYS', 'CTXSYS', 'DVSYS', 'DVF',
  'GGSYS', 'GSMADMIN_INTERNAL', 'GSMCATUSER', 'GSMUSER', 'GSMROOTUSER', 'GSMREGUSER', 'LBACSYS',
  'MDSYS', 'OJVMSYS', 'OLAPSYS', 'ORDPLUGINS', 'ORDSYS', 'SI_INFORMTN_SCHEMA', 'WMSYS', 'DIP',
  'FLOWS_FILES', 'ANONYMOUS', 'XS$NULL', 'SPATIAL_CSW_ADMIN_USR', 'SPATIAL_WFS_ADMIN_USR', 'PUBLIC',
  'PERFSTAT', 'AUDIT_ADMIN', 'AUDIT_VIEWER', 'ORACLE_OCM', 'REMOTE_SCHEDULER_AGENT', 'DBSFWUSER',
  'SYSDG', 'SYSKM', 'SYSRAC', 'SYSBACKUP', 'MGMT_VIEW', 'SQLTXPLAIN',
]);

const columnRowSchema = z.object({
  OWNER: z.string(),
  TABLE_NAME: z.string(),
  COLUMN_NAME: z.string(),
  DATA_TYPE: z.string(),
  DATA_LENGTH: z.number().int().nullable(),
  DATA_PRECISION: z.number().int().nullable(),
  DATA_SCALE: z.number().int().nullable(),
  NULLABLE: z.enum(['Y', 'N']),
  COLUMN_ID: z.number().int().nullable(),
});

export class OracleInspector implements IMetadataInspector {
  constructor(
    private db: IDbConnection,
    private config: Pick<ConnectionConfig, 'label' | 'schemas'>
  ) {}

  async captureSnapshot(): Promise<MetadataSnapshot> {
    const owners = this.config.schemas.filter(s => !ORACLE_SYSTEM_SCHEMAS.has(s));
    if (owners.length === 0) {
      logger.warn({ label: this.config.label, schemas: this.config.schemas }, 'No non-system schemas configured');
      return createSnapshot(this.config.label, [], dayjs().toDate());
    }

    logger.info(`Fetching column metadata from ${this.config.label} for schemas: ${owners.join(', ')}...`);
    const placeholders = owners.map((_, i) => `:${i + 1}`).join(', ');
    const rows = await this.db.query(`
      SELECT owner, table_name, column_name, data_type, data_length,
             data_precision, data_scale, nullable, column_id
      FROM all_tab_columns
      WHERE owner IN (${placeholders})
      ORDER BY table_name, column_id
    `, owners);

    logger.info(`Fetched ${rows.length} rows of column metadata from ${this.config.label}.`);
    logger.debug({ label: this.config.label, sample: rows.slice(0, 5) }, 'Sample column metadata');

    return createSnapshot(this.config.label, rows.map(toColumnAttributes), dayjs().toDate());
  }
}

export function toColumnAttributes(raw: Record<string, unknown>): ColumnAttributes {
  const row = columnRowSchema.parse(raw);
  return {
    tableName: row.TABLE_NAME,
    columnName: row.COLUMN_NAME,
    dataType: row.DATA_TYPE,
    dataPrecision: row.DATA_PRECISION,
    dataScale: row.DATA_SCALE,
    nullable: row.NULLABLE === 'Y',
    maxLength: row.DATA_LENGTH,
    ordinalPosition: row.COLUMN_ID,
  };
}
