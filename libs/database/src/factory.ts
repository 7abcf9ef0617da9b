/**
 * Database factory - opens SQLite and brings its schema up to date
 */
import type { Database, DatabaseFactoryConfig } from './types';
import { MigrationRunner } from './migrations';
import { SQLiteAdapter } from './sqlite-adapter';

/**
 * Create a database instance based on configuration
 *
 * @example
 * ```typescript
 * const db = await createDatabase({
 *   path: './data/queue.db',
 *   synchronous: 'FULL',
 *   migrations: [createMigration('001', 'create entries', async (db) => {
 *     await db.execRaw('CREATE TABLE entries (...)');
 *   })],
 * });
 * ```
 */
export async function createDatabase(config: DatabaseFactoryConfig): Promise<Database> {
  const db = new SQLiteAdapter(config);

  try {
    if (config.migrations && config.migrations.length > 0) {
      const applied = await new MigrationRunner(db, config.logger).runMigrations(config.migrations);
      config.logger?.info({ applied }, 'Migrations completed successfully');
    }
  } catch (error) {
    config.logger?.error({ err: error }, 'Failed to prepare database');
    await db.close();
    throw error;
  }

  return db;
}
