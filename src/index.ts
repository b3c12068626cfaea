// Main project index - organized exports

// Core engine
export {
  Engine,
  reconcile,
  runWorker,
  readOnce,
  ActiveSet,
  deriveLifetime,
  LineScanner,
  RecordTooLongError,
  realDelay,
  realTicker,
} from './engine/index.ts';
export type { EngineDeps, ReconcileResult, WorkerOptions, ReadSessionOptions } from './engine/index.ts';

// Types
export type {
  PeerAddress,
  PeerRecord,
  ByteSource,
  PeerResolver,
  StreamOpener,
  RecordSink,
  Delay,
  Ticker,
  ReadOutcome,
  WorkerHandle,
  Lifetime,
} from './types/stream.ts';

// Collaborators
export { StaticPeerResolver, RedisPeerResolver, createResolver } from './resolvers/index.ts';
export { HttpStreamOpener, StreamOpenError, urlFromTemplate } from './transports/index.ts';
export { RecordChannel, ChannelClosedError, SinkFactory, StdoutSink, FileSink, pump } from './sinks/index.ts';
export type { OutputSink } from './sinks/index.ts';

// Configuration
export { loadConfig } from './config/load.ts';
export { AppConfig } from './config/schema.ts';
