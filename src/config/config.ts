import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { ConnectionConfig } from '../types/index.js';
import { logger } from '../utils/logger.js';

export type DbKey = 'db1' | 'db2';

export const DEFAULT_RESULT_FILE = 'ddl_compare_result.xlsx';
const REPORT_EXTENSIONS = ['.xlsx', '.csv', '.json'];

const dbConfigSchema = z
  .object({
    type: z.enum(['oracle', 'postgres']).default('oracle'),
    host: z.string().default('localhost'),
    port: z.coerce.number().int().positive().optional(),
    serviceName: z.string().min(1),
    user: z.string().min(1),
    password: z.string().optional(),
    schemas: z.union([z.string(), z.array(z.string())]).optional(),
    label: z.string().optional(),
    retryCount: z.coerce.number().int().min(1).default(3),
    retryDelay: z.coerce.number().min(0).default(5),
  })
  .transform((db): ConnectionConfig => {
    const schemas = typeof db.schemas === 'string' ? [db.schemas] : db.schemas ?? [];
    const fallbackSchema = db.type === 'oracle' ? 'TEST_SCHEMA' : 'PUBLIC';
    return {
      type: db.type,
      host: db.host,
      port: db.port ?? (db.type === 'oracle' ? 1521 : 5432),
      serviceName: db.serviceName,
      user: db.user,
      password: db.password,
      schemas: (schemas.length > 0 ? schemas : [fallbackSchema]).map(s => s.toUpperCase()),
      label: db.label || db.user,
      retryCount: db.retryCount,
      retryDelay: db.retryDelay,
    };
  });

const compareConfigSchema = z.object({
  primaryDb: z.string().default('db1'),
  resultPath: z.string().optional(),
  db1: dbConfigSchema,
  db2: dbConfigSchema,
});

export interface CompareConfig {
  primaryDb: DbKey;
  resultPath: string;
  db1: ConnectionConfig;
  db2: ConnectionConfig;
}

export function resolveResultPath(resultPath: string | undefined, cwd: string = process.cwd()): string {
  if (!resultPath || resultPath === 'DEFAULT') {
    return path.join(cwd, DEFAULT_RESULT_FILE);
  }
  if (!REPORT_EXTENSIONS.includes(path.extname(resultPath).toLowerCase())) {
    return `${resultPath}.xlsx`;
  }
  return resultPath;
}

function resolvePrimaryKey(value: string): DbKey {
  if (value === 'db1' || value === 'db2') return value;
  logger.warn(`Invalid primaryDb '${value}' in config. Defaulting to 'db1'.`);
  return 'db1';
}

/**
 * Validates a raw configuration object. Passwords missing from the file are
 * taken from DDL_COMPARE_DB1_PASSWORD / DDL_COMPARE_DB2_PASSWORD.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): CompareConfig {
  const result = compareConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', result.error.issues);
  }
  const config = result.data;

  return {
    primaryDb: resolvePrimaryKey(config.primaryDb),
    resultPath: resolveResultPath(config.resultPath),
    db1: { ...config.db1, password: config.db1.password ?? env.DDL_COMPARE_DB1_PASSWORD },
    db2: { ...config.db2, password: config.db2.password ?? env.DDL_COMPARE_DB2_PASSWORD },
  };
}

export async function loadConfig(configPath: string): Promise<CompareConfig> {
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid JSON: ${configPath} (${String(error)})`);
  }

  logger.info(`Loaded configuration from ${configPath}`);
  return parseConfig(raw);
}

/** The primary database is always reported as DB1, the secondary as DB2. */
export function resolveTargets(config: CompareConfig): { primary: ConnectionConfig; secondary: ConnectionConfig } {
  return config.primaryDb === 'db1'
    ? { primary: config.db1, secondary: config.db2 }
    : { primary: config.db2, secondary: config.db1 };
}
