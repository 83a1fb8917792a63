// Database
export { createPool, connectDatabase, withTransaction } from './db';
export type { Queryable, ConnectionSource, TransactionClient } from './db';

// Config
export { appConfig, dbConfig } from './config';
