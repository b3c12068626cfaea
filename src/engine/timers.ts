// Wall-clock implementations of the injectable Delay and Ticker
import { setTimeout as sleep } from 'node:timers/promises';
import type { Delay, Ticker } from '../types/stream.ts';

export const realDelay: Delay = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

/**
 * Ticks every `periodMs` on a fixed schedule. Ticks missed while the consumer was busy
 * are dropped, not replayed. Ends when `signal` aborts.
 */
export const realTicker: Ticker = (periodMs, signal) => ticks(periodMs, signal);

async function* ticks(periodMs: number, signal: AbortSignal): AsyncGenerator<number> {
  let deadline = Date.now() + periodMs;
  while (!signal.aborted) {
    try {
      await sleep(Math.max(0, deadline - Date.now()), undefined, { signal });
    } catch (err) {
      if (signal.aborted) return;
      throw err;
    }
    yield Date.now();
    deadline += periodMs * Math.max(1, Math.ceil((Date.now() - deadline) / periodMs));
  }
}
