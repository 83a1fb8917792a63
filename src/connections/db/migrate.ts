import { createPool } from './connection';
import { ConnectionSource, Queryable, withTransaction } from './transaction';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

// A pg Pool, or anything else that both queries and hands out clients
type MigrationTarget = Queryable & ConnectionSource;

const createMigrationsTable = async (db: Queryable) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
};

const isMigrationExecuted = async (db: Queryable, name: string): Promise<boolean> => {
  const result = await db.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

// Each migration and its bookkeeping row commit together
const runMigration = async (db: MigrationTarget, name: string, migration: Migration) => {
  await withTransaction(db, async (client) => {
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
  });
  logger.info(`Migration ${name} executed successfully`);
};

const rollbackMigration = async (db: MigrationTarget, name: string, migration: Migration) => {
  await withTransaction(db, async (client) => {
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
  });
  logger.info(`Migration ${name} rolled back successfully`);
};

/**
 * Run all pending migrations in declaration order
 */
export const migrate = async (db: MigrationTarget): Promise<void> => {
  logger.info('Starting database migrations...');

  await createMigrationsTable(db);

  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(db, name)) {
      logger.info(`Migration ${name} already executed, skipping`);
      continue;
    }

    await runMigration(db, name, migration);
  }

  logger.info('All migrations completed successfully');
};

/**
 * Roll back the most recently executed migration
 */
export const rollback = async (db: MigrationTarget): Promise<void> => {
  logger.info('Rolling back last migration...');

  await createMigrationsTable(db);

  const result = await db.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to roll back');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(db, lastMigrationName, migrationInfo.migration);
};

if (require.main === module) {
  const pool = createPool();
  const command = process.argv[2] === 'rollback' ? rollback : migrate;

  void command(pool)
    .then(() => pool.end())
    .catch(async (error: unknown) => {
      logger.error('Migration error', { error: errorMessage(error) });
      await pool.end();
      process.exitCode = 1;
    });
}
