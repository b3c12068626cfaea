// Engine module exports

export { Engine, DEFAULT_RESOLVE_INTERVAL_MS, DEFAULT_RETRY_DELAY_MS } from './engine.ts';
export type { EngineDeps } from './engine.ts';
export { reconcile } from './reconciler.ts';
export type { ReconcileResult } from './reconciler.ts';
export { runWorker } from './worker.ts';
export type { WorkerOptions } from './worker.ts';
export { readOnce } from './read-session.ts';
export type { ReadSessionOptions } from './read-session.ts';
export { ActiveSet } from './state.ts';
export { deriveLifetime, raceAbort } from './lifetime.ts';
export { LineScanner, RecordTooLongError, DEFAULT_MAX_RECORD_BYTES } from './line-scanner.ts';
export { realDelay, realTicker } from './timers.ts';
