import { QueryResult, QueryResultRow } from 'pg';

/**
 * Anything that runs parameterised SQL: a pg Pool or a checked-out PoolClient.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionSource {
  connect(): Promise<TransactionClient>;
}

/**
 * Run `work` on a single pooled client between BEGIN and COMMIT.
 * Any error rolls the transaction back and is rethrown as-is.
 */
export const withTransaction = async <T>(
  source: ConnectionSource,
  work: (client: Queryable) => Promise<T>
): Promise<T> => {
  const client = await source.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};
