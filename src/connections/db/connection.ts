import { Pool, types } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';
import { toError } from '../../utils/errors';

// NUMERIC (totals, prices, refund amounts) arrives as a string by default
types.setTypeParser(types.builtins.NUMERIC, (value: string) => parseFloat(value));

export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  let lastError: Error = new Error('Database connection was never attempted');

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      lastError = toError(err);
      if (attempt < maxRetries) {
        logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: lastError.message });
        await sleep(retryDelay);
      } else {
        logger.error(`Database connection error after ${maxRetries} attempts:`, { error: lastError.message, stack: lastError.stack });
      }
    }
  }

  throw lastError;
};

export const closeDatabase = async (): Promise<void> => {
  await pool.end();
  logger.info('Database pool closed');
};
