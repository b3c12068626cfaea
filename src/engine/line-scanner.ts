// Splits a byte stream into newline-terminated records

export const DEFAULT_MAX_RECORD_BYTES = 64 * 1024;

const LF = 0x0a;
const CR = 0x0d;

export class RecordTooLongError extends Error {
  constructor(public readonly limit: number) {
    super(`record exceeds ${limit} bytes`);
    this.name = 'RecordTooLongError';
  }
}

/**
 * Incremental scanner. Feed chunks with `push`, collect complete records; call `end`
 * once the source is exhausted to flush a final unterminated line.
 *
 * Every emitted record ends with a single `\n`. A trailing `\r` before the newline is dropped.
 */
export class LineScanner {
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  constructor(private readonly maxRecordBytes = DEFAULT_MAX_RECORD_BYTES) {}

  push(chunk: Uint8Array): Uint8Array[] {
    const out: Uint8Array[] = [];
    let start = 0;
    for (;;) {
      const nl = chunk.indexOf(LF, start);
      if (nl === -1) break;
      this.append(chunk.subarray(start, nl));
      out.push(this.take());
      start = nl + 1;
    }
    if (start < chunk.length) this.append(chunk.subarray(start));
    return out;
  }

  end(): Uint8Array | null {
    if (this.pendingBytes === 0) {
      this.pending = [];
      return null;
    }
    return this.take();
  }

  private append(part: Uint8Array) {
    if (part.length === 0) return;
    this.pendingBytes += part.length;
    // the terminating \r is not part of the record, allow for it
    if (this.pendingBytes > this.maxRecordBytes + 1) {
      throw new RecordTooLongError(this.maxRecordBytes);
    }
    this.pending.push(Buffer.from(part));
  }

  private take(): Uint8Array {
    let line = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    if (line.length > 0 && line[line.length - 1] === CR) line = line.subarray(0, line.length - 1);
    if (line.length > this.maxRecordBytes) throw new RecordTooLongError(this.maxRecordBytes);
    return Buffer.concat([line, Buffer.from([LF])]);
  }
}
