import type { ByteSource, PeerAddress, StreamOpener } from '../../types/stream.ts';

type Script = (
  address: PeerAddress,
  attempt: number,
  signal: AbortSignal,
) => ByteSource | Promise<ByteSource>;

/** StreamOpener driven by a script; records every open call. */
export class FakeOpener implements StreamOpener {
  public calls: Array<{ address: PeerAddress; signal: AbortSignal }> = [];

  constructor(private readonly script: Script) {}

  async open(address: PeerAddress, signal: AbortSignal): Promise<ByteSource> {
    const attempt = this.opens(address);
    this.calls.push({ address, signal });
    return this.script(address, attempt, signal);
  }

  opens(address: PeerAddress): number {
    return this.calls.filter((c) => c.address === address).length;
  }
}

/** Yields each part as one chunk, then ends. */
export async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield Buffer.from(part);
}

/** Yields the parts, then fails with `error`. */
export async function* chunksThenFail(error: Error, ...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield Buffer.from(part);
  throw error;
}

/** Never yields; fails with an AbortError once `signal` aborts. */
export function hanging(signal: AbortSignal): ByteSource {
  return {
    [Symbol.asyncIterator]: () => ({
      next: () =>
        new Promise<IteratorResult<Uint8Array>>((_resolve, reject) => {
          const fail = () => {
            const err = new Error('The operation was aborted');
            err.name = 'AbortError';
            reject(err);
          };
          if (signal.aborted) fail();
          else signal.addEventListener('abort', fail, { once: true });
        }),
    }),
  };
}

/** Endless stream of `line` records, one chunk per record. */
export async function* endless(line: string): AsyncGenerator<Uint8Array> {
  for (;;) yield Buffer.from(line);
}
