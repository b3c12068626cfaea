import type { PeerAddress, SpawnWorker } from '../types/stream.ts';
import { log } from '../utils/logger.ts';
import { deriveLifetime } from './lifetime.ts';
import { ActiveSet } from './state.ts';

export type ReconcileResult = {
  active: ActiveSet;
  started: PeerAddress[];
  stopped: PeerAddress[];
};

/**
 * Diff `previous` against the desired addresses.
 * - kept peers move their handle over untouched
 * - new peers get a worker bound to a child of `parent`
 * - peers no longer desired are canceled exactly once
 *
 * `previous` is emptied. Duplicate addresses in `desired` are ignored after the first.
 */
export function reconcile(
  parent: AbortSignal,
  previous: ActiveSet,
  desired: readonly PeerAddress[],
  spawn: SpawnWorker,
): ReconcileResult {
  const active = ActiveSet.empty();
  const started: PeerAddress[] = [];

  for (const address of desired) {
    if (active.has(address)) {
      log.debug(`duplicate peer address ignored: ${address}`);
      continue;
    }
    const kept = previous.take(address);
    if (kept) {
      active.insert(kept);
      continue;
    }
    active.insert(spawn(deriveLifetime(parent), address));
    started.push(address);
  }

  const stopped: PeerAddress[] = [];
  for (const gone of previous.drain()) {
    gone.cancel();
    stopped.push(gone.address);
  }

  return { active, started, stopped };
}
