/**
 * @sensorlog/durable-queue - crash-safe FIFO of enriched lines
 */

export type { DurableQueue, QueueEntry } from './types';
export type { QueueErrorKind } from './errors';
export type { SqliteQueueOptions } from './sqlite-queue';

export { QueueError, isQueueError } from './errors';
export { SerialExecutor } from './serial-executor';
export { SqliteDurableQueue, openSqliteQueue } from './sqlite-queue';
