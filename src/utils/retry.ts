import { setTimeout as sleep } from 'node:timers/promises';
import { ConnectionError } from '../core/errors.js';
import { logger } from './logger.js';

export interface RetryOptions {
  label: string;
  attempts: number;
  delayMs: number;
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      logger.info({ label: options.label, attempt, attempts }, 'Attempting database connection');
      return await operation();
    } catch (error) {
      lastError = error;
      logger.error({ label: options.label, attempt, err: error }, 'Database connection failed');
      if (attempt < attempts) {
        logger.info(`Retrying in ${options.delayMs / 1000} seconds...`);
        await sleep(options.delayMs);
      }
    }
  }

  logger.fatal({ label: options.label }, 'Max retries reached');
  throw new ConnectionError(options.label, attempts, { cause: lastError });
}
