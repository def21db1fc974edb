import pg from 'pg';
import { ConnectionConfig } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { IDbConnection, QueryRow } from '../interfaces.js';

export class PostgresConnection implements IDbConnection {
  private pool: pg.Pool;
  private connected = false;

  constructor(private config: ConnectionConfig) {
    this.pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.serviceName,
      user: config.user,
      password: config.password,
      max: 2,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      logger.error({ label: config.label, err }, 'Unexpected error on idle client');
    });
  }

  // Checking out one client proves the server is reachable, retrying per config.
  private async connect(): Promise<void> {
    if (this.connected) return;

    await withRetry(
      async () => {
        const client = await this.pool.connect();
        client.release();
      },
      { label: this.config.label, attempts: this.config.retryCount, delayMs: this.config.retryDelay * 1000 }
    );
    this.connected = true;
    logger.info(`PostgreSQL connection established for ${this.config.label}`);
  }

  async query(text: string, params: Array<string | number> = []): Promise<QueryRow[]> {
    await this.connect();
    const start = Date.now();
    try {
      const res = await this.pool.query<QueryRow>(text, params);
      const duration = Date.now() - start;
      logger.debug({ label: this.config.label, duration, rows: res.rowCount }, 'Executed query');
      return res.rows;
    } catch (error) {
      logger.error({ label: this.config.label, query: text, err: error }, 'Query execution failed');
      throw error;
    }
  }

  async close() {
    await this.pool.end();
    logger.info(`Database connection pool closed for ${this.config.label}`);
  }
}
