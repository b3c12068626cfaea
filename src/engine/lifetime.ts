import type { Lifetime } from '../types/stream.ts';

/**
 * Derive a child lifetime from `parent`.
 * Aborting the parent aborts the child; canceling the child leaves the parent untouched
 * and unlinks the child's listener from it.
 */
export function deriveLifetime(parent: AbortSignal): Lifetime {
  const controller = new AbortController();

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { signal: controller.signal, cancel: () => undefined };
  }

  const onParentAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onParentAbort, { once: true });

  return {
    signal: controller.signal,
    cancel: () => {
      parent.removeEventListener('abort', onParentAbort);
      controller.abort();
    },
  };
}

type Raced<T> = { aborted: true } | { aborted: false; value: T };

/**
 * Race `work` against `signal`. Whichever settles first wins; a rejection of `work`
 * after the abort is swallowed by the race, a rejection before it propagates.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<Raced<T>> {
  if (signal.aborted) {
    work.catch(() => undefined);
    return Promise.resolve({ aborted: true });
  }

  return new Promise<Raced<T>>((resolve, reject) => {
    const onAbort = () => resolve({ aborted: true });
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ aborted: false, value });
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
