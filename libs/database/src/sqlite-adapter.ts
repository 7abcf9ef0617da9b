/**
 * SQLite adapter using better-sqlite3
 */
import SQLite from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type {
  Database,
  DatabaseConfig,
  DatabaseLogger,
  ExecResult,
  QueryResult,
  Transaction,
} from './types';

const IN_MEMORY = ':memory:';

export class SQLiteAdapter implements Database {
  readonly path: string;
  private db: SQLite.Database;
  private logger?: DatabaseLogger;

  constructor(config: DatabaseConfig) {
    if (!config.path) {
      throw new Error('SQLite adapter requires a path');
    }

    const inMemory = config.path === IN_MEMORY;
    const resolvedPath = inMemory ? IN_MEMORY : path.resolve(config.path);
    this.path = resolvedPath;
    this.logger = config.logger;

    // Ensure directory exists
    if (!inMemory) {
      const dir = path.dirname(resolvedPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        this.logger?.info({ dir }, 'Created database directory');
      }
    }

    this.logger?.info({ path: resolvedPath }, 'Opening SQLite database');

    try {
      this.db = new SQLite(resolvedPath);

      if (!inMemory) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma(`synchronous = ${config.synchronous ?? 'NORMAL'}`);
      if (config.walAutocheckpoint !== undefined) {
        this.db.pragma(`wal_autocheckpoint = ${Math.trunc(config.walAutocheckpoint)}`);
      }

      this.logger?.info('SQLite database opened successfully');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to open SQLite database at ${resolvedPath}: ${message}`);
    }
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  async query<T = unknown>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
    try {
      const stmt = this.db.prepare(sql);
      const rows = params ? stmt.all(...params) : stmt.all();
      return {
        rows: rows as T[],
        rowCount: rows.length,
      };
    } catch (error) {
      this.logger?.error({ sql, err: error }, 'SQLite query error');
      throw error;
    }
  }

  async exec(sql: string, params?: unknown[]): Promise<ExecResult> {
    try {
      const stmt = this.db.prepare(sql);
      const info = params ? stmt.run(...params) : stmt.run();
      return {
        changes: info.changes,
        lastInsertId: Number(info.lastInsertRowid),
      };
    } catch (error) {
      this.logger?.error({ sql, err: error }, 'SQLite exec error');
      throw error;
    }
  }

  async execRaw(sql: string): Promise<void> {
    try {
      this.db.exec(sql);
    } catch (error) {
      this.logger?.error({ sql, err: error }, 'SQLite execRaw error');
      throw error;
    }
  }

  async withTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    this.db.prepare('BEGIN IMMEDIATE').run();

    let finished = false;
    const guard = (): void => {
      if (finished) {
        throw new Error('Transaction already finished');
      }
    };
    const tx: Transaction = {
      query: async <R = unknown>(sql: string, params?: unknown[]) => {
        guard();
        return this.query<R>(sql, params);
      },
      exec: async (sql: string, params?: unknown[]) => {
        guard();
        return this.exec(sql, params);
      },
    };

    try {
      const result = await fn(tx);
      this.db.prepare('COMMIT').run();
      return result;
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.prepare('ROLLBACK').run();
      }
      throw error;
    } finally {
      finished = true;
    }
  }

  async healthCheck(): Promise<{ healthy: boolean; latency?: number; error?: string }> {
    const start = Date.now();
    try {
      // Simple query to check if database is accessible
      this.db.prepare('SELECT 1').get();
      const latency = Date.now() - start;
      return { healthy: true, latency };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { healthy: false, error: message };
    }
  }

  async close(): Promise<void> {
    if (!this.db.open) return;
    try {
      this.db.close();
      this.logger?.info('SQLite database closed');
    } catch (error) {
      this.logger?.error({ err: error }, 'Error closing SQLite database');
      throw error;
    }
  }
}
