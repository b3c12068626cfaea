import type {
  ByteSource,
  Lifetime,
  PeerAddress,
  ReadOutcome,
  RecordSink,
  StreamOpener,
} from '../types/stream.ts';
import { LineScanner, DEFAULT_MAX_RECORD_BYTES } from './line-scanner.ts';
import { raceAbort } from './lifetime.ts';

export interface ReadSessionOptions {
  maxRecordBytes?: number;
}

const CANCELED: ReadOutcome = { kind: 'canceled' };

/**
 * One attempt: open the peer's stream, scan it into records and forward each one to the sink.
 * Sink deliveries and stream reads are both raced against the lifetime; once it aborts nothing
 * further is read or delivered.
 */
export async function readOnce(
  lifetime: Lifetime,
  opener: StreamOpener,
  address: PeerAddress,
  sink: RecordSink,
  opts: ReadSessionOptions = {},
): Promise<ReadOutcome> {
  const { signal } = lifetime;
  if (signal.aborted) return CANCELED;

  let source: ByteSource;
  try {
    source = await opener.open(address, signal);
  } catch (error) {
    return signal.aborted ? CANCELED : { kind: 'failed', error };
  }

  const scanner = new LineScanner(opts.maxRecordBytes ?? DEFAULT_MAX_RECORD_BYTES);
  const it = source[Symbol.asyncIterator]();
  try {
    for (;;) {
      const read = await raceAbort(it.next(), signal);
      if (read.aborted) {
        release(it);
        return CANCELED;
      }
      if (read.value.done) break;

      for (const record of scanner.push(read.value.value)) {
        const sent = await raceAbort(sink.write(record, signal), signal);
        if (sent.aborted) {
          release(it);
          return CANCELED;
        }
      }
    }

    const last = scanner.end();
    if (last) {
      const sent = await raceAbort(sink.write(last, signal), signal);
      if (sent.aborted) return CANCELED;
    }
    return { kind: 'ended' };
  } catch (error) {
    release(it);
    return signal.aborted ? CANCELED : { kind: 'failed', error };
  }
}

// Let the source clean up without waiting on a read that may never settle.
function release(it: AsyncIterator<Uint8Array>) {
  it.return?.().catch(() => undefined);
}
