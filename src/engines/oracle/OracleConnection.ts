import oracledb from 'oracledb';
import { ConnectionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { IDbConnection, QueryRow } from '../interfaces.js';

export class OracleConnection implements IDbConnection {
  private connection: oracledb.Connection | null = null;
  private config: ConnectionConfig;

  constructor(config: ConnectionConfig) {
    this.config = config;
  }

  private async connect(): Promise<oracledb.Connection> {
    if (this.connection) return this.connection;

    const connectString = `${this.config.host}:${this.config.port}/${this.config.serviceName}`;

    this.connection = await withRetry(
      () =>
        oracledb.getConnection({
          user: this.config.user,
          password: this.config.password,
          connectString,
        }),
      { label: this.config.label, attempts: this.config.retryCount, delayMs: this.config.retryDelay * 1000 }
    );
    logger.info(`Oracle DB connection established for ${this.config.label} (${this.config.user}@${connectString})`);
    return this.connection;
  }

  async query(text: string, params: Array<string | number> = []): Promise<QueryRow[]> {
    const conn = await this.connect();
    const start = Date.now();
    try {
      const result = await conn.execute<QueryRow>(text, params, {
        outFormat: oracledb.OUT_FORMAT_OBJECT,
      });

      const duration = Date.now() - start;
      logger.debug({ label: this.config.label, duration, rows: result.rows?.length }, 'Executed Oracle query');

      return result.rows ?? [];
    } catch (error) {
      logger.error({ label: this.config.label, query: text, err: error }, 'Oracle query execution failed');
      throw error;
    }
  }

  async close() {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
      logger.info(`Oracle connection closed for ${this.config.label}`);
    }
  }
}
