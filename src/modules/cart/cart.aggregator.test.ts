import { AGGREGATE_CART_SQL, PgCartAggregator } from './cart.aggregator';
import { AggregatedCartView } from '../../connections/db/models/cart-line.model';

describe('PgCartAggregator', () => {
  const view: AggregatedCartView = {
    id: 'line-1',
    product_id: '3f2b8c1e-5d4a-4c6b-9e7f-1a2b3c4d5e6f',
    total_qty: 5,
    created_at: new Date('2025-08-19T10:00:00Z'),
    updated_at: new Date('2025-08-19T10:05:00Z'),
    product_name: 'lip balm',
    description: 'Unscented lip balm',
    price: '9.99',
    sub_total_price: '49.95',
    img_url: null,
  };

  it('returns the grouped rows for the user', async () => {
    const query = jest.fn().mockResolvedValue({ rows: [view], rowCount: 1 });
    const aggregator = new PgCartAggregator({ query });

    await expect(aggregator.aggregateForUser('u1')).resolves.toEqual([view]);
    expect(query).toHaveBeenCalledWith(AGGREGATE_CART_SQL, ['u1']);
  });

  it('returns an empty list when the user has no lines', async () => {
    const query = jest.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    const aggregator = new PgCartAggregator({ query });

    await expect(aggregator.aggregateForUser('u1')).resolves.toEqual([]);
  });

  describe('query', () => {
    it('groups by product and orders by product id', () => {
      expect(AGGREGATE_CART_SQL).toContain('GROUP BY c.product_id');
      expect(AGGREGATE_CART_SQL).toContain('ORDER BY c.product_id');
    });

    it('computes the subtotal in exact decimal arithmetic', () => {
      expect(AGGREGATE_CART_SQL).toContain('(SUM(c.total_qty) * p.price)::NUMERIC(14, 2) AS sub_total_price');
    });

    it('only includes lines whose product still exists', () => {
      expect(AGGREGATE_CART_SQL).toContain('INNER JOIN products p ON c.product_id = p.id');
    });
  });
});
