import { Queryable } from '../../connections/db/transaction';
import { AggregatedCartView } from '../../connections/db/models/cart-line.model';

export interface CartAggregator {
  aggregateForUser(userId: string): Promise<AggregatedCartView[]>;
}

// One row per product: the earliest line's id, summed quantity, the
// created/updated bounds, product columns and an exact NUMERIC subtotal.
export const AGGREGATE_CART_SQL = `
  SELECT
    (array_agg(c.id ORDER BY c.created_at, c.id))[1] AS id,
    c.product_id,
    SUM(c.total_qty)::INTEGER AS total_qty,
    MIN(c.created_at) AS created_at,
    MAX(c.updated_at) AS updated_at,
    p.product_name,
    p.description,
    p.price,
    (SUM(c.total_qty) * p.price)::NUMERIC(14, 2) AS sub_total_price,
    p.img_url
  FROM cart_lines c
  INNER JOIN products p ON c.product_id = p.id
  WHERE c.user_id = $1
  GROUP BY c.product_id, p.product_name, p.description, p.price, p.img_url
  ORDER BY c.product_id
`;

export class PgCartAggregator implements CartAggregator {
  constructor(private readonly db: Queryable) {}

  async aggregateForUser(userId: string): Promise<AggregatedCartView[]> {
    const result = await this.db.query<AggregatedCartView>(AGGREGATE_CART_SQL, [userId]);
    return result.rows;
  }
}
