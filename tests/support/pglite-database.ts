import { PGlite } from '@electric-sql/pglite';
import { QueryResult, QueryResultRow } from 'pg';
import { ConnectionSource, TransactionClient } from '../../src/connections/db/transaction';
import { Product } from '../../src/connections/db/models/product.model';

/**
 * In-process PostgreSQL behind the same `Queryable`/`ConnectionSource`
 * seams a pg Pool fills. PGlite has a single connection, so `connect()`
 * hands out the database itself and `release()` does nothing.
 */
export class PGliteDatabase implements TransactionClient, ConnectionSource {
  private readonly pg = new PGlite();

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<R>> {
    const result = await this.pg.query<R>(text, values);
    return {
      command: '',
      oid: 0,
      fields: [],
      rows: result.rows,
      // SELECTs report no affected rows
      rowCount: result.affectedRows || result.rows.length,
    };
  }

  async connect(): Promise<TransactionClient> {
    return this;
  }

  release(): void {
    // single connection, nothing to hand back
  }

  close(): Promise<void> {
    return this.pg.close();
  }
}

export const insertProducts = async (db: PGliteDatabase, products: Product[]): Promise<void> => {
  for (const product of products) {
    await db.query(
      `INSERT INTO products (id, product_name, description, price, category, img_url, is_available, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        product.id,
        product.product_name,
        product.description,
        product.price,
        product.category,
        product.img_url,
        product.is_available,
        product.created_at,
        product.updated_at,
      ]
    );
  }
};
