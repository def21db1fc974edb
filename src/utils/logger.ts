import { pino } from 'pino';

export const logger = pino({
  name: 'ddl-compare',
  level: process.env.LOG_LEVEL ?? (process.env.VITEST ? 'silent' : 'info'),
});
