import { DbType, MetadataSnapshot } from '../types/index.js';

export type { DbType };

export type QueryRow = Record<string, unknown>;

export interface IDbConnection {
  query(text: string, params?: Array<string | number>): Promise<QueryRow[]>;
  close(): Promise<void>;
}

export interface IMetadataInspector {
  captureSnapshot(): Promise<MetadataSnapshot>;
}
