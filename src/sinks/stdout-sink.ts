import type { OutputSink } from './sink-factory.ts';

export class StdoutSink implements OutputSink {
  async write(record: Uint8Array): Promise<void> {
    // records already carry their newline
    if (!process.stdout.write(record)) {
      await new Promise<void>((resolve) => process.stdout.once('drain', resolve));
    }
  }

  async flush(): Promise<void> {
    // stdout flushes automatically
    return Promise.resolve();
  }

  async close(): Promise<void> {
    // Nothing to close for stdout
    return Promise.resolve();
  }
}
