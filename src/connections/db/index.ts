export { createPool, connectDatabase } from './connection';
export { withTransaction } from './transaction';
export type { Queryable, ConnectionSource, TransactionClient } from './transaction';
