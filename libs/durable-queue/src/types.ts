/**
 * A persisted, not yet acknowledged line
 */
export interface QueueEntry {
  /** Monotonic sequence position; never reused */
  handle: number;
  line: string;
  /** ISO-8601 time the entry was committed */
  enqueuedAt: string;
}

/**
 * Append-only FIFO of enriched lines that survives process crashes.
 */
export interface DurableQueue {
  /**
   * Resolves with the entry handle once the line is committed to disk.
   */
  enqueue(line: string): Promise<number>;

  /**
   * Oldest pending entries in insertion order, without removing them.
   */
  peekBatch(maxCount: number): Promise<QueueEntry[]>;

  /**
   * Removes a delivered entry. A handle that is no longer pending is ignored.
   */
  acknowledge(handle: number): Promise<void>;

  size(): Promise<number>;

  /**
   * Resolves true as soon as an entry is pending, false on timeout or abort.
   */
  waitForEntries(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;

  close(): Promise<void>;
}
