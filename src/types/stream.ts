// Core types shared by the engine, resolvers, transports and sinks

/** Opaque peer identifier. Exact string equality is identity. */
export type PeerAddress = string;

/** One newline-terminated line read from a peer. */
export type PeerRecord = Uint8Array;

/** Byte stream produced by a StreamOpener. */
export type ByteSource = AsyncIterable<Uint8Array>;

export interface PeerResolver {
  resolve(): PeerAddress[] | Promise<PeerAddress[]>;
}

/**
 * Turns a peer address into a byte stream.
 * Once `signal` aborts, pending and later reads on the returned stream must fail promptly.
 */
export interface StreamOpener {
  open(address: PeerAddress, signal: AbortSignal): Promise<ByteSource>;
}

/**
 * Send side of the output conduit. The returned promise settles once the record is accepted.
 * Implementations that block should withdraw the write when `signal` aborts.
 */
export interface RecordSink {
  write(record: PeerRecord, signal: AbortSignal): Promise<void>;
}

/** Waits `ms`, or rejects early once `signal` aborts. */
export type Delay = (ms: number, signal: AbortSignal) => Promise<void>;

/** Yields once per period until `signal` aborts. */
export type Ticker = (periodMs: number, signal: AbortSignal) => AsyncIterable<unknown>;

export type ReadOutcome =
  | { kind: 'canceled' }
  | { kind: 'ended' }
  | { kind: 'failed'; error: unknown };

export interface WorkerHandle {
  readonly address: PeerAddress;
  readonly signal: AbortSignal;
  /** Stops the current and every future read attempt. Safe to call more than once. */
  cancel(): void;
  /** Settles when the worker loop has exited. */
  readonly done: Promise<void>;
}

/** Starts a worker for `address` bound to `lifetime` and returns its handle. */
export type SpawnWorker = (lifetime: Lifetime, address: PeerAddress) => WorkerHandle;

export interface Lifetime {
  readonly signal: AbortSignal;
  cancel(): void;
}
