import { Pool } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

/**
 * Build the process-wide connection pool. Called once at startup; the pool is
 * then handed to every component that needs it.
 */
export const createPool = (): Pool => {
  const pool = new Pool(dbConfig);

  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  });

  return pool;
};

/**
 * Connect to database and verify connection with retry logic
 * @returns Promise that resolves when database is connected
 */
export const connectDatabase = async (
  pool: Pool,
  maxRetries: number = 10,
  retryDelay: number = 2000
): Promise<void> => {
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries) {
        logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, {
          error: errorMessage(err),
        });
        await new Promise(resolve => setTimeout(resolve, retryDelay));
      } else {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: errorMessage(err) });
      }
    }
  }

  throw lastError;
};
