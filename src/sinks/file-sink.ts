import fs from 'fs';
import { once } from 'node:events';
import path from 'node:path';
import type { OutputSink } from './sink-factory.ts';

/**
 * Appends raw records to a file, creating its directory if needed.
 * Once the underlying stream fails, every later call rejects with that error.
 */
export class FileSink implements OutputSink {
  private out?: fs.WriteStream;
  private failure: Error | null = null;

  constructor(private readonly filePath: string) {}

  async init(): Promise<void> {
    const out = this.ensureOpen();
    if (out.pending) await once(out, 'ready');
  }

  async write(record: Uint8Array): Promise<void> {
    const out = this.ensureOpen();
    this.throwIfFailed();
    // once() rejects if the stream errors while we wait
    if (!out.write(record)) await once(out, 'drain');
  }

  /** Resolves once everything written so far has reached the file. */
  async flush(): Promise<void> {
    const out = this.out;
    if (!out) return;
    this.throwIfFailed();
    await new Promise<void>((resolve, reject) => {
      out.write('', (err) => (err ? reject(this.failure ?? err) : resolve()));
    });
  }

  async close(): Promise<void> {
    const out = this.out;
    if (!out) return;
    this.out = undefined;
    // a failed stream is already destroyed and its error was reported
    if (this.failure || out.destroyed) return;
    await new Promise<void>((resolve, reject) => {
      out.once('error', reject);
      out.once('finish', () => resolve());
      out.end();
    });
  }

  private ensureOpen(): fs.WriteStream {
    if (this.out) return this.out;
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    const out = fs.createWriteStream(this.filePath, { flags: 'a' });
    out.on('error', (err: Error) => {
      this.failure ??= err;
    });
    this.out = out;
    return out;
  }

  private throwIfFailed(): void {
    const failure = this.failure ?? this.out?.errored ?? null;
    if (failure) throw failure;
  }
}
