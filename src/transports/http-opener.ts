import { log } from '../utils/logger.ts';
import type { ByteSource, PeerAddress, StreamOpener } from '../types/stream.ts';

/** Which step of opening the stream failed. */
export type StreamOpenOp = 'request' | 'execute' | 'status';

export class StreamOpenError extends Error {
  constructor(
    public readonly op: StreamOpenOp,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${op}: ${message}`, options);
    this.name = 'StreamOpenError';
  }
}

export type FetchFn = (request: Request) => Promise<Response>;

/** Builds the URL for an address from a template such as `http://{addr}/stream`. */
export const urlFromTemplate =
  (template: string) =>
  (address: PeerAddress): string =>
    template.replaceAll('{addr}', address);

/**
 * GETs the peer's URL with the lifetime's signal attached and hands back the response body.
 * Anything but 200 fails.
 */
export class HttpStreamOpener implements StreamOpener {
  constructor(
    private readonly addrToUrl: (address: PeerAddress) => string,
    private readonly fetchFn: FetchFn = (request) => fetch(request),
  ) {}

  async open(address: PeerAddress, signal: AbortSignal): Promise<ByteSource> {
    let request: Request;
    try {
      request = new Request(this.addrToUrl(address), { method: 'GET', signal });
    } catch (err) {
      throw new StreamOpenError('request', messageOf(err), { cause: err });
    }

    let response: Response;
    try {
      response = await this.fetchFn(request);
    } catch (err) {
      throw new StreamOpenError('execute', messageOf(err), { cause: err });
    }

    if (response.status !== 200) {
      await discard(response);
      throw new StreamOpenError('status', `GET ${request.url}: ${response.status} ${response.statusText}`.trim());
    }
    if (!response.body) {
      throw new StreamOpenError('status', `GET ${request.url}: response has no body`);
    }
    return response.body;
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Free the connection of a rejected response.
async function discard(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    log.debug('discarding rejected response body failed:', messageOf(err));
  }
}
