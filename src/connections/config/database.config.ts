import { PoolConfig } from 'pg';
import './app.config';

const intFromEnv = (name: string, fallback: number): number => {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const statementTimeout = intFromEnv('DB_STATEMENT_TIMEOUT_MS', 10000);

// Every store call is bounded: statement_timeout on the server side,
// query_timeout on the client side.
export const dbConfig: PoolConfig = {
  ...(process.env.DATABASE_URL
    ? { connectionString: process.env.DATABASE_URL }
    : {
        host: process.env.DB_HOST || 'localhost',
        port: intFromEnv('DB_PORT', 5432),
        database: process.env.DB_NAME || 'storefront',
        user: process.env.DB_USER || 'postgres',
        password: process.env.DB_PASSWORD || 'postgres',
      }),
  max: intFromEnv('DB_POOL_MAX', 10),
  idleTimeoutMillis: intFromEnv('DB_IDLE_TIMEOUT_MS', 30000),
  connectionTimeoutMillis: intFromEnv('DB_CONNECTION_TIMEOUT_MS', 5000),
  statement_timeout: statementTimeout,
  query_timeout: statementTimeout,
};
