/**
 * Database abstraction types
 * A small async facade over an embedded SQLite database
 */

/**
 * SQLite `synchronous` pragma. `FULL` fsyncs on every commit in WAL mode.
 */
export type SynchronousMode = 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';

/**
 * Logging function accepting either a message or structured fields plus a message
 */
export interface LogFn {
  (msg: string): void;
  (meta: Record<string, unknown>, msg: string): void;
}

/**
 * Logger interface for database operations (a pino logger satisfies it)
 */
export interface DatabaseLogger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug?: LogFn;
}

/**
 * Configuration for database connection
 */
export interface DatabaseConfig {
  /** File path, or `:memory:` for a private in-memory database */
  path: string;

  synchronous?: SynchronousMode;

  /** Pages after which the WAL is checkpointed into the main file */
  walAutocheckpoint?: number;

  logger?: DatabaseLogger;
}

/**
 * Result of a query operation
 */
export interface QueryResult<T = unknown> {
  rows: T[];
  rowCount: number;
}

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecResult {
  changes: number;
  lastInsertId?: number;
}

/**
 * Statements available inside a transaction
 */
export interface Transaction {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  exec(sql: string, params?: unknown[]): Promise<ExecResult>;
}

/**
 * Core database interface
 */
export interface Database {
  readonly path: string;

  /**
   * False once the connection has been closed
   */
  readonly isOpen: boolean;

  /**
   * Execute a query and return rows
   */
  query<T = unknown>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

  /**
   * Execute a statement (INSERT, UPDATE, DELETE) and return affected rows
   */
  exec(sql: string, params?: unknown[]): Promise<ExecResult>;

  /**
   * Execute raw SQL (for schema creation, migrations)
   */
  execRaw(sql: string): Promise<void>;

  /**
   * Run a function within a transaction; rolled back if it throws
   */
  withTransaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T>;

  healthCheck(): Promise<{ healthy: boolean; latency?: number; error?: string }>;

  close(): Promise<void>;
}

/**
 * Database factory configuration
 */
export interface DatabaseFactoryConfig extends DatabaseConfig {
  // Migrations applied in order on open (optional)
  migrations?: Migration[];
}

/**
 * Migration definition
 */
export interface Migration {
  id: string;
  name: string;
  up: (db: Database) => Promise<void>;
}
