import { Migration } from './types';

export const migration: Migration = {
  async up(db) {
    await db.query('ALTER TABLE products ADD COLUMN IF NOT EXISTS img_url VARCHAR(500)');
  },

  async down(db) {
    await db.query('ALTER TABLE products DROP COLUMN IF EXISTS img_url');
  },
};
