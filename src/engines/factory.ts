import { ConnectionConfig, DbType } from '../types/index.js';
import { IDbConnection, IMetadataInspector } from './interfaces.js';
import { OracleConnection } from './oracle/OracleConnection.js';
import { OracleInspector } from './oracle/OracleInspector.js';
import { PostgresConnection } from './postgres/PostgresConnection.js';
import { PostgresInspector } from './postgres/PostgresInspector.js';

export interface EngineProvider {
  createConnection(config: ConnectionConfig): IDbConnection;
  createInspector(connection: IDbConnection, config: ConnectionConfig): IMetadataInspector;
}

export class EngineFactory {
  static createConnection(config: ConnectionConfig): IDbConnection {
    const type: DbType = config.type;
    switch (type) {
      case 'oracle':
        return new OracleConnection(config);
      case 'postgres':
        return new PostgresConnection(config);
      default:
        throw new Error(`Unsupported database type: ${String(type satisfies never)}`);
    }
  }

  static createInspector(connection: IDbConnection, config: ConnectionConfig): IMetadataInspector {
    const type: DbType = config.type;
    switch (type) {
      case 'oracle':
        return new OracleInspector(connection, config);
      case 'postgres':
        return new PostgresInspector(connection, config);
      default:
        throw new Error(`Unsupported database type: ${String(type satisfies never)}`);
    }
  }
}

export const defaultEngines: EngineProvider = {
  createConnection: config => EngineFactory.createConnection(config),
  createInspector: (connection, config) => EngineFactory.createInspector(connection, config),
};
