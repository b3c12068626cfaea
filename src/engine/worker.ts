import type {
  Delay,
  Lifetime,
  PeerAddress,
  ReadOutcome,
  RecordSink,
  StreamOpener,
} from '../types/stream.ts';
import { createLogger } from '../utils/logger.ts';
import { readOnce } from './read-session.ts';
import { realDelay } from './timers.ts';
import type { ReadSessionOptions } from './read-session.ts';

export interface WorkerOptions extends ReadSessionOptions {
  retryDelayMs: number;
}

/**
 * Connect, scan and forward until `lifetime` aborts.
 * Every outcome other than cancellation (a clean end of stream included) waits
 * `retryDelayMs` once and reconnects with a fresh stream. Never rejects.
 */
export async function runWorker(
  lifetime: Lifetime,
  opener: StreamOpener,
  address: PeerAddress,
  sink: RecordSink,
  delay: Delay,
  opts: WorkerOptions,
): Promise<void> {
  const log = createLogger(`peer ${address}`);
  const { signal } = lifetime;
  let attempt = 0;

  log.debug('worker started');
  for (;;) {
    attempt++;
    const outcome: ReadOutcome = await readOnce(lifetime, opener, address, sink, opts);
    if (outcome.kind === 'canceled') break;

    if (outcome.kind === 'failed') {
      log.warn(`attempt ${attempt} failed, retrying in ${opts.retryDelayMs}ms:`, describe(outcome.error));
    } else {
      log.debug(`attempt ${attempt} reached end of stream, reconnecting in ${opts.retryDelayMs}ms`);
    }

    try {
      await delay(opts.retryDelayMs, signal);
    } catch (err) {
      if (signal.aborted) break;
      log.error('retry delay failed, falling back to wall-clock delay:', describe(err));
      try {
        await realDelay(opts.retryDelayMs, signal);
      } catch (fallbackErr) {
        if (!signal.aborted) throw fallbackErr;
      }
    }
    if (signal.aborted) break;
  }
  log.debug(`worker stopped after ${attempt} attempt(s)`);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
