import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    // Fold rows written before the constraint existed into the earliest row
    // of each (user_id, product_id) pair.
    await db.query(`
      WITH grouped AS (
        SELECT
          (array_agg(id ORDER BY created_at, id))[1] AS keep_id,
          SUM(total_qty)::INTEGER AS total_qty,
          MAX(updated_at) AS updated_at
        FROM cart_lines
        GROUP BY user_id, product_id
        HAVING COUNT(*) > 1
      )
      UPDATE cart_lines c
      SET total_qty = g.total_qty, updated_at = g.updated_at
      FROM grouped g
      WHERE c.id = g.keep_id
    `);

    await db.query(`
      DELETE FROM cart_lines c
      USING cart_lines older
      WHERE c.user_id = older.user_id
        AND c.product_id = older.product_id
        AND (older.created_at, older.id) < (c.created_at, c.id)
    `);

    await db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_cart_lines_user_product
      ON cart_lines(user_id, product_id)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS uq_cart_lines_user_product');
  },
};
