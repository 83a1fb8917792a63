import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    // user_id is an opaque string: there is no users table to reference.
    // product_id is checked by the cart service, not by a foreign key.
    await db.query(`
      CREATE TABLE IF NOT EXISTS cart_lines (
        id UUID PRIMARY KEY,
        user_id VARCHAR(255) NOT NULL,
        product_id UUID NOT NULL,
        total_qty INTEGER NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_cart_lines_user ON cart_lines(user_id)
    `);
  },

  async down(db) {
    await db.query('DROP INDEX IF EXISTS idx_cart_lines_user');
    await db.query('DROP TABLE IF EXISTS cart_lines CASCADE');
  },
};
