import { Transform, type TransformCallback, type TransformOptions } from "node:stream";

export interface BoundedDelimiterParserOptions extends TransformOptions {
  delimiter: string | Buffer;
  /** Bytes a line may hold before its delimiter */
  maxLength: number;
  /** Called once per line that outgrew `maxLength`; the rest of that line is dropped */
  onOverflow: (bytes: number) => void;
}

/**
 * Splits a byte stream on a delimiter, as serialport's `DelimiterParser`
 * does, but never holds more than `maxLength` bytes of an unterminated line.
 */
export class BoundedDelimiterParser extends Transform {
  private readonly delimiter: Buffer;
  private readonly maxLength: number;
  private readonly onOverflow: (bytes: number) => void;
  private buffer = Buffer.alloc(0);
  private discarding = false;

  constructor({ delimiter, maxLength, onOverflow, ...options }: BoundedDelimiterParserOptions) {
    super(options);
    this.delimiter = Buffer.from(delimiter);
    if (this.delimiter.length === 0) {
      throw new TypeError("delimiter must not be empty");
    }
    this.maxLength = maxLength;
    this.onOverflow = onOverflow;
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    let data = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;
    let position: number;
    while ((position = data.indexOf(this.delimiter)) !== -1) {
      const line = data.subarray(0, position);
      data = data.subarray(position + this.delimiter.length);
      if (this.discarding) {
        this.discarding = false;
      } else if (line.length > this.maxLength) {
        this.onOverflow(line.length);
      } else {
        this.push(line);
      }
    }

    if (!this.discarding && data.length > this.maxLength) {
      this.discarding = true;
      this.onOverflow(data.length);
    }
    // while discarding, keep just enough to catch a delimiter split across chunks
    const kept = this.discarding ? data.subarray(Math.max(0, data.length - (this.delimiter.length - 1))) : data;
    this.buffer = Buffer.from(kept);
    callback();
  }

  _flush(callback: TransformCallback): void {
    if (!this.discarding && this.buffer.length > 0) {
      this.push(this.buffer);
    }
    this.buffer = Buffer.alloc(0);
    callback();
  }
}
