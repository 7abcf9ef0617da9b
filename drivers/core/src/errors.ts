export type SourceErrorKind = "open_failed" | "timeout" | "disconnected" | "overflow";

export class SourceError extends Error {
  readonly kind: SourceErrorKind;

  constructor(kind: SourceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceError";
    this.kind = kind;
  }
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}
