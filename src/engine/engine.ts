// Main Engine class: keeps one worker per resolved peer until the root signal aborts

import { setMaxListeners } from 'node:events';
import type {
  Delay,
  Lifetime,
  PeerAddress,
  PeerResolver,
  RecordSink,
  StreamOpener,
  Ticker,
  WorkerHandle,
} from '../types/stream.ts';
import { log } from '../utils/logger.ts';
import { raceAbort } from './lifetime.ts';
import { reconcile } from './reconciler.ts';
import { ActiveSet } from './state.ts';
import { realDelay, realTicker } from './timers.ts';
import { runWorker } from './worker.ts';

export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_RESOLVE_INTERVAL_MS = 1000;

export interface EngineDeps {
  resolver: PeerResolver;
  opener: StreamOpener;
  sink: RecordSink;
  delay?: Delay;
  ticker?: Ticker;
  retryDelayMs?: number;
  resolveIntervalMs?: number;
  maxRecordBytes?: number;
}

export class Engine {
  private active = ActiveSet.empty();
  private running = false;

  // every worker this engine spawned that has not exited yet, stopped peers included
  private workers = new Set<WorkerHandle>();

  private readonly resolver: PeerResolver;
  private readonly opener: StreamOpener;
  private readonly sink: RecordSink;
  private readonly delay: Delay;
  private readonly ticker: Ticker;
  private readonly retryDelayMs: number;
  private readonly resolveIntervalMs: number;
  private readonly maxRecordBytes?: number;

  constructor(deps: EngineDeps) {
    this.resolver = deps.resolver;
    this.opener = deps.opener;
    this.sink = deps.sink;
    this.delay = deps.delay ?? realDelay;
    this.ticker = deps.ticker ?? realTicker;
    this.retryDelayMs = deps.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.resolveIntervalMs = deps.resolveIntervalMs ?? DEFAULT_RESOLVE_INTERVAL_MS;
    this.maxRecordBytes = deps.maxRecordBytes;
  }

  /**
   * Resolve peers now and on every tick, starting and stopping workers to match.
   * Returns once `signal` aborts. Workers are not awaited here; use `join()` for that.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    if (this.running) throw new Error('Engine is already running');
    this.running = true;
    // one abort listener per worker lifetime, so the default limit of 10 is a false alarm
    setMaxListeners(0, signal);

    try {
      await this.refresh(signal);

      const ticks = this.ticker(this.resolveIntervalMs, signal)[Symbol.asyncIterator]();
      try {
        for (;;) {
          const next = await raceAbort(ticks.next(), signal);
          if (next.aborted) break;
          if (next.value.done) {
            log.warn('resolve ticker finished early, holding current peers until canceled');
            await untilAborted(signal);
            break;
          }
          await this.refresh(signal);
        }
      } catch (err) {
        if (!signal.aborted) throw err;
      } finally {
        ticks.return?.().catch(() => undefined);
      }
    } finally {
      // root abort already reached every worker, this just releases the table
      for (const handle of this.active.drain()) handle.cancel();
      this.running = false;
    }
    log.info('engine stopped');
  }

  /** Addresses with a running worker. */
  peers(): PeerAddress[] {
    return this.active.addresses();
  }

  /** Resolves once every worker spawned so far has exited. */
  async join(): Promise<void> {
    while (this.workers.size > 0) {
      await Promise.all(Array.from(this.workers, (handle) => handle.done));
    }
  }

  private async refresh(signal: AbortSignal): Promise<void> {
    let desired: PeerAddress[];
    try {
      const resolved = await raceAbort(Promise.resolve(this.resolver.resolve()), signal);
      if (resolved.aborted) return;
      desired = resolved.value;
    } catch (err) {
      log.warn(
        `peer resolution failed, keeping ${this.active.size} current peer(s):`,
        err instanceof Error ? err.message : err,
      );
      return;
    }
    if (signal.aborted) return;

    const { active, started, stopped } = reconcile(signal, this.active, desired, this.spawn);
    this.active = active;

    if (started.length) log.info(`started ${started.length} peer(s): ${started.join(', ')}`);
    if (stopped.length) log.info(`stopped ${stopped.length} peer(s): ${stopped.join(', ')}`);
  }

  private spawn = (lifetime: Lifetime, address: PeerAddress): WorkerHandle => {
    const handle: WorkerHandle = {
      address,
      signal: lifetime.signal,
      cancel: lifetime.cancel,
      done: this.runTracked(lifetime, address, () => this.workers.delete(handle)),
    };
    this.workers.add(handle);
    return handle;
  };

  private async runTracked(lifetime: Lifetime, address: PeerAddress, exited: () => void): Promise<void> {
    try {
      await runWorker(lifetime, this.opener, address, this.sink, this.delay, {
        retryDelayMs: this.retryDelayMs,
        maxRecordBytes: this.maxRecordBytes,
      });
    } catch (err) {
      log.error(`worker for ${address} crashed:`, err);
    } finally {
      exited();
    }
  }
}

function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}
