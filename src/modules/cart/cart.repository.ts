import { v4 as uuidv4 } from 'uuid';
import { ConnectionSource, Queryable, withTransaction } from '../../connections/db/transaction';
import { CartLine } from '../../connections/db/models/cart-line.model';
import { NotFoundError } from '../../utils/errors';

export interface FindLineOptions {
  /** Lock the row until the surrounding transaction ends. */
  forUpdate?: boolean;
}

export interface InsertLineResult {
  line: CartLine;
  /** false when the insert merged into an existing row for the pair */
  inserted: boolean;
}

/**
 * Persistence of individual cart lines. Errors from the store propagate
 * unmodified; callers decide how to report them.
 */
export interface CartRepository {
  findByUserAndProduct(userId: string, productId: string, options?: FindLineOptions): Promise<CartLine | null>;
  insert(userId: string, productId: string, qty: number, now: Date): Promise<InsertLineResult>;
  updateQuantity(line: CartLine, newQty: number, now: Date): Promise<CartLine>;
  findAllForUser(userId: string): Promise<CartLine[]>;
  existsForUser(userId: string): Promise<boolean>;
  delete(line: CartLine): Promise<boolean>;
  deleteAllForUser(userId: string): Promise<number>;
}

/**
 * Runs a unit of work against a repository bound to one transaction.
 */
export interface CartUnitOfWork {
  run<T>(work: (carts: CartRepository) => Promise<T>): Promise<T>;
}

const CART_LINE_COLUMNS = 'id, user_id, product_id, total_qty, created_at, updated_at';

export class PgCartRepository implements CartRepository {
  constructor(private readonly db: Queryable) {}

  async findByUserAndProduct(
    userId: string,
    productId: string,
    options: FindLineOptions = {}
  ): Promise<CartLine | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const result = await this.db.query<CartLine>(
      `SELECT ${CART_LINE_COLUMNS} FROM cart_lines
       WHERE user_id = $1 AND product_id = $2
       ORDER BY created_at
       LIMIT 1${lock}`,
      [userId, productId]
    );
    return result.rows[0] ?? null;
  }

  // A concurrent insert for the same pair lands on the unique index and is
  // merged additively instead of producing a second row. xmax is 0 only for
  // a freshly inserted tuple.
  async insert(userId: string, productId: string, qty: number, now: Date): Promise<InsertLineResult> {
    const result = await this.db.query<CartLine & { inserted: boolean }>(
      `INSERT INTO cart_lines (id, user_id, product_id, total_qty, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $5)
       ON CONFLICT (user_id, product_id) DO UPDATE
         SET total_qty = cart_lines.total_qty + EXCLUDED.total_qty,
             updated_at = EXCLUDED.updated_at
       RETURNING ${CART_LINE_COLUMNS}, (xmax = 0) AS inserted`,
      [uuidv4(), userId, productId, qty, now]
    );
    const { inserted, ...line } = result.rows[0];
    return { line, inserted };
  }

  async updateQuantity(line: CartLine, newQty: number, now: Date): Promise<CartLine> {
    const result = await this.db.query<CartLine>(
      `UPDATE cart_lines SET total_qty = $2, updated_at = $3
       WHERE id = $1
       RETURNING ${CART_LINE_COLUMNS}`,
      [line.id, newQty, now]
    );

    if (result.rows.length === 0) {
      throw new NotFoundError(`Cart line ${line.id} no longer exists`);
    }

    return result.rows[0];
  }

  async findAllForUser(userId: string): Promise<CartLine[]> {
    const result = await this.db.query<CartLine>(
      `SELECT ${CART_LINE_COLUMNS} FROM cart_lines WHERE user_id = $1 ORDER BY created_at`,
      [userId]
    );
    return result.rows;
  }

  async existsForUser(userId: string): Promise<boolean> {
    const result = await this.db.query('SELECT 1 FROM cart_lines WHERE user_id = $1 LIMIT 1', [userId]);
    return result.rows.length > 0;
  }

  async delete(line: CartLine): Promise<boolean> {
    const result = await this.db.query('DELETE FROM cart_lines WHERE id = $1', [line.id]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteAllForUser(userId: string): Promise<number> {
    const result = await this.db.query('DELETE FROM cart_lines WHERE user_id = $1', [userId]);
    return result.rowCount ?? 0;
  }
}

export class PgCartUnitOfWork implements CartUnitOfWork {
  constructor(private readonly source: ConnectionSource) {}

  run<T>(work: (carts: CartRepository) => Promise<T>): Promise<T> {
    return withTransaction(this.source, (client) => work(new PgCartRepository(client)));
  }
}
