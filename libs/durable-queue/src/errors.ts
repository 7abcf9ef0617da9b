export type QueueErrorKind = 'unavailable' | 'out_of_order' | 'closed';

export class QueueError extends Error {
  readonly kind: QueueErrorKind;

  constructor(kind: QueueErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueueError';
    this.kind = kind;
  }
}

export function isQueueError(error: unknown): error is QueueError {
  return error instanceof QueueError;
}
