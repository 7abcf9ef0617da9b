export type ParseErrorKind = "malformed";

export class ParseError extends Error {
  readonly kind: ParseErrorKind = "malformed";

  constructor(
    readonly reason: string,
    readonly line?: string
  ) {
    super(line === undefined ? reason : `${reason}: ${JSON.stringify(line)}`);
    this.name = "ParseError";
  }
}
