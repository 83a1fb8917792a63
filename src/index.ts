import { Pool } from 'pg';
import { createApp } from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase, createPool } from './connections';
import { AppDependencies } from './types/app.types';
import { PgProductRepository } from './modules/products/products.repository';
import { PgCategoryRepository } from './modules/categories/categories.repository';
import { PgCartRepository, PgCartUnitOfWork } from './modules/cart/cart.repository';
import { PgCartAggregator } from './modules/cart/cart.aggregator';
import { CartService } from './modules/cart/cart.service';
import { logger } from './utils/logging';
import { errorMessage } from './utils/errors';

const buildDependencies = (pool: Pool): AppDependencies => {
  const products = new PgProductRepository(pool);

  return {
    db: pool,
    products,
    categories: new PgCategoryRepository(pool),
    cartService: new CartService({
      unitOfWork: new PgCartUnitOfWork(pool),
      carts: new PgCartRepository(pool),
      aggregator: new PgCartAggregator(pool),
      products,
    }),
  };
};

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  const pool = createPool();

  try {
    logger.info('Connecting to database...');
    await connectDatabase(pool);

    const app = createApp(buildDependencies(pool));

    const server = app.listen(appConfig.port, () => {
      logger.info(`Server is running on port ${appConfig.port}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down...`);
      server.close(() => {
        pool
          .end()
          .then(() => logger.info('Database pool closed'))
          .catch((error: unknown) => logger.error('Error closing database pool', { error: errorMessage(error) }));
      });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    await pool.end();
    process.exitCode = 1;
  }
};

void startServer();
