/**
 * @sensorlog/database - embedded SQLite behind an async interface
 *
 * @example
 * ```typescript
 * import { createDatabase } from '@sensorlog/database';
 *
 * const db = await createDatabase({ path: './data/queue.db', synchronous: 'FULL' });
 * await db.withTransaction(async (tx) => {
 *   await tx.exec('DELETE FROM entries WHERE seq = ?', [1]);
 * });
 * await db.close();
 * ```
 */

export type {
  Database,
  DatabaseConfig,
  DatabaseFactoryConfig,
  DatabaseLogger,
  ExecResult,
  LogFn,
  Migration,
  QueryResult,
  SynchronousMode,
  Transaction,
} from './types';
export type { MigrationHistory } from './migrations';

export { SQLiteAdapter } from './sqlite-adapter';
export { createDatabase } from './factory';
export { MigrationRunner, createMigration } from './migrations';
