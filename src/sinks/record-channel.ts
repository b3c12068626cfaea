import type { PeerRecord, RecordSink } from '../types/stream.ts';

export class ChannelClosedError extends Error {
  constructor() {
    super('record channel is closed');
    this.name = 'ChannelClosedError';
  }
}

type BlockedWriter = {
  record: PeerRecord;
  resolve: () => void;
  reject: (err: unknown) => void;
  detach: () => void;
};

type WaitingReader = (result: IteratorResult<PeerRecord>) => void;

/**
 * Bounded many-writer, single-reader conduit of records.
 *
 * `capacity` 0 is a synchronous hand-off: a write settles only once the reader has taken
 * the record. With capacity n up to n records are buffered before writers block.
 * Blocked writers are released in FIFO order. A blocked write whose signal aborts is
 * withdrawn and rejects with the signal's reason; its record is never delivered.
 */
export class RecordChannel implements RecordSink, AsyncIterable<PeerRecord> {
  private buffer: PeerRecord[] = [];
  private writers: BlockedWriter[] = [];
  private reader: WaitingReader | null = null;
  private closed = false;

  constructor(readonly capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /** Records buffered and not yet taken by the reader. */
  get length(): number {
    return this.buffer.length;
  }

  /** Writes blocked waiting for room. */
  get pendingWrites(): number {
    return this.writers.length;
  }

  write(record: PeerRecord, signal?: AbortSignal): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());
    if (signal?.aborted) return Promise.reject(signal.reason);

    if (this.reader) {
      const reader = this.reader;
      this.reader = null;
      reader({ value: record, done: false });
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(record);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.writers.indexOf(writer);
        if (idx !== -1) this.writers.splice(idx, 1);
        reject(signal?.reason);
      };
      const writer: BlockedWriter = {
        record,
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.writers.push(writer);
    });
  }

  /** Take the next record, waiting if none is available. Resolves `done` once closed and drained. */
  async next(): Promise<IteratorResult<PeerRecord>> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      // a slot freed up, admit the oldest blocked writer
      const writer = this.writers.shift();
      if (writer) {
        writer.detach();
        this.buffer.push(writer.record);
        writer.resolve();
      }
      return { value: buffered, done: false };
    }

    const writer = this.writers.shift();
    if (writer) {
      writer.detach();
      writer.resolve();
      return { value: writer.record, done: false };
    }

    if (this.closed) return { value: undefined, done: true };
    if (this.reader) throw new Error('RecordChannel supports a single reader');

    return new Promise<IteratorResult<PeerRecord>>((resolve) => {
      this.reader = resolve;
    });
  }

  /**
   * Stop accepting records. Buffered records are still delivered; blocked and later
   * writes reject with ChannelClosedError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const writer of this.writers.splice(0)) {
      writer.detach();
      writer.reject(new ChannelClosedError());
    }
    if (this.reader) {
      const reader = this.reader;
      this.reader = null;
      reader({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<PeerRecord> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
