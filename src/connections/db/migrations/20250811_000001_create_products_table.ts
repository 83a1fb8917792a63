import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS products (
        id UUID PRIMARY KEY,
        product_name VARCHAR(255) NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT '',
        -- NUMERIC comes back from pg as a string, which keeps money exact
        price NUMERIC(10, 2) NOT NULL DEFAULT 0,
        category VARCHAR(255) NOT NULL DEFAULT '',
        is_available BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  },

  async down(db) {
    await db.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
