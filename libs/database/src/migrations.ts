/**
 * Database migration utilities
 */
import type { Database, DatabaseLogger, Migration } from './types';

/**
 * Migration history entry
 */
export interface MigrationHistory {
  id: string;
  name: string;
  appliedAt: string;
}

/**
 * Migration runner
 */
export class MigrationRunner {
  constructor(
    private db: Database,
    private logger?: DatabaseLogger
  ) {}

  private async ensureMigrationsTable(): Promise<void> {
    await this.db.execRaw(`
      CREATE TABLE IF NOT EXISTS __migrations (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      );
    `);
  }

  async getAppliedMigrations(): Promise<MigrationHistory[]> {
    await this.ensureMigrationsTable();
    const result = await this.db.query<MigrationHistory>(
      'SELECT id, name, applied_at as "appliedAt" FROM __migrations ORDER BY applied_at, id'
    );
    return result.rows;
  }

  async isMigrationApplied(id: string): Promise<boolean> {
    await this.ensureMigrationsTable();
    const result = await this.db.query<{ count: number }>(
      'SELECT COUNT(*) as count FROM __migrations WHERE id = ?',
      [id]
    );
    const row = result.rows[0];
    return row ? row.count > 0 : false;
  }

  /**
   * Run migrations that haven't been applied yet, returning their ids
   */
  async runMigrations(migrations: Migration[]): Promise<string[]> {
    const applied: string[] = [];

    for (const migration of migrations) {
      const isApplied = await this.isMigrationApplied(migration.id);
      if (!isApplied) {
        this.logger?.info({ migration: migration.id }, `Running migration: ${migration.name}`);
        await migration.up(this.db);
        await this.db.exec(
          'INSERT INTO __migrations (id, name, applied_at) VALUES (?, ?, ?)',
          [migration.id, migration.name, new Date().toISOString()]
        );
        applied.push(migration.id);
      }
    }

    return applied;
  }
}

/**
 * Helper to create a simple migration
 */
export function createMigration(
  id: string,
  name: string,
  up: (db: Database) => Promise<void>
): Migration {
  return { id, name, up };
}
