/**
 * Delay that doubles on every call to `next()`, from `minMs` up to `maxMs`.
 */
export class Backoff {
  private current: number;

  constructor(private readonly minMs: number, private readonly maxMs: number) {
    if (minMs <= 0 || maxMs < minMs) {
      throw new RangeError(`Invalid backoff bounds ${minMs}..${maxMs}`);
    }
    this.current = minMs;
  }

  next(): number {
    const value = this.current;
    this.current = Math.min(this.maxMs, this.current * 2);
    return value;
  }

  reset(): void {
    this.current = this.minMs;
  }
}
