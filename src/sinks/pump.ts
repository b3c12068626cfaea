import type { PeerRecord } from '../types/stream.ts';
import type { OutputSink } from './sink-factory.ts';

/**
 * Single consumer: move every record from `source` into `out` until the source ends.
 * Returns the number of records written.
 */
export async function pump(source: AsyncIterable<PeerRecord>, out: OutputSink): Promise<number> {
  let written = 0;
  for await (const record of source) {
    await out.write(record);
    written++;
  }
  await out.flush?.();
  return written;
}
