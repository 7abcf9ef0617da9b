import { createDatabase, createMigration, type Database, type DatabaseLogger } from '@sensorlog/database';
import { QueueError, isQueueError } from './errors';
import { SerialExecutor } from './serial-executor';
import type { DurableQueue, QueueEntry } from './types';

export interface SqliteQueueOptions {
  /** Queue file, or `:memory:` for a non-durable queue */
  path: string;
  /** WAL pages between automatic checkpoints */
  walAutocheckpoint?: number;
  logger?: DatabaseLogger;
}

const queueMigrations = [
  createMigration('001', 'create queue_entries', async (db) => {
    await db.execRaw(`
      CREATE TABLE IF NOT EXISTS queue_entries (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        line TEXT NOT NULL,
        enqueued_at TEXT NOT NULL
      );
    `);
  }),
];

type Waiter = (available: boolean) => void;

/**
 * FIFO queue stored in a single SQLite table. Every operation goes through one
 * executor lane so transactions never overlap on the shared connection.
 */
export class SqliteDurableQueue implements DurableQueue {
  private readonly executor = new SerialExecutor();
  private readonly waiters = new Set<Waiter>();
  private closed = false;

  constructor(
    readonly database: Database,
    private readonly logger?: DatabaseLogger
  ) {}

  enqueue(line: string): Promise<number> {
    return this.execute('enqueue', async () => {
      const result = await this.database.exec(
        'INSERT INTO queue_entries (line, enqueued_at) VALUES (?, ?)',
        [line, new Date().toISOString()]
      );
      if (result.lastInsertId === undefined) {
        throw new Error('insert returned no sequence number');
      }
      this.notify(true);
      return result.lastInsertId;
    });
  }

  peekBatch(maxCount: number): Promise<QueueEntry[]> {
    const limit = Math.floor(maxCount);
    return this.execute('peek', async () => {
      if (limit < 1) {
        return [];
      }
      const result = await this.database.query<QueueEntry>(
        'SELECT seq AS handle, line, enqueued_at AS enqueuedAt FROM queue_entries ORDER BY seq LIMIT ?',
        [limit]
      );
      return result.rows;
    });
  }

  acknowledge(handle: number): Promise<void> {
    return this.execute('acknowledge', () =>
      this.database.withTransaction(async (tx) => {
        const head = await tx.query<{ seq: number }>(
          'SELECT seq FROM queue_entries ORDER BY seq LIMIT 1'
        );
        const oldest = head.rows[0];
        if (!oldest || handle < oldest.seq) {
          return;
        }
        if (handle > oldest.seq) {
          const pending = await tx.query<{ seq: number }>(
            'SELECT seq FROM queue_entries WHERE seq = ?',
            [handle]
          );
          if (pending.rowCount === 0) {
            return;
          }
          throw new QueueError(
            'out_of_order',
            `entry ${handle} acknowledged while entry ${oldest.seq} is still pending`
          );
        }
        await tx.exec('DELETE FROM queue_entries WHERE seq = ?', [handle]);
      })
    );
  }

  size(): Promise<number> {
    return this.execute('size', async () => {
      const result = await this.database.query<{ count: number }>(
        'SELECT COUNT(*) AS count FROM queue_entries'
      );
      return result.rows[0]?.count ?? 0;
    });
  }

  waitForEntries(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.closed) {
      return Promise.reject(new QueueError('closed', 'queue is closed'));
    }
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve, reject) => {
      let settled = false;
      const cleanup = () => {
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiters.delete(waiter);
      };
      const waiter: Waiter = (available) => {
        if (settled) return;
        cleanup();
        resolve(available);
      };
      const onAbort = () => waiter(false);

      // registered before the size check so an enqueue in between is not missed
      this.waiters.add(waiter);
      const timer = setTimeout(() => waiter(false), Math.max(0, timeoutMs));
      signal?.addEventListener('abort', onAbort, { once: true });

      this.size().then(
        (count) => {
          if (count > 0) waiter(true);
        },
        (error: unknown) => {
          if (settled) return;
          cleanup();
          reject(error);
        }
      );
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.notify(false);
    await this.executor.run(() => this.database.close());
    this.logger?.info({ path: this.database.path }, 'Durable queue closed');
  }

  private notify(available: boolean): void {
    for (const waiter of [...this.waiters]) {
      waiter(available);
    }
  }

  private execute<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return this.executor.run(async () => {
      if (this.closed) {
        throw new QueueError('closed', `cannot ${operation}: queue is closed`);
      }
      try {
        return await task();
      } catch (error) {
        if (isQueueError(error)) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger?.error({ operation, err: error }, 'Durable queue operation failed');
        throw new QueueError('unavailable', `${operation} failed: ${message}`, { cause: error });
      }
    });
  }
}

/**
 * Open (or create) the queue file and bring its schema up to date.
 */
export async function openSqliteQueue(options: SqliteQueueOptions): Promise<SqliteDurableQueue> {
  let db: Database;
  try {
    db = await createDatabase({
      path: options.path,
      synchronous: 'FULL',
      walAutocheckpoint: options.walAutocheckpoint,
      logger: options.logger,
      migrations: queueMigrations,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new QueueError('unavailable', `cannot open queue at ${options.path}: ${message}`, {
      cause: error,
    });
  }
  return new SqliteDurableQueue(db, options.logger);
}
