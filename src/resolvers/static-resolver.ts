import type { PeerAddress, PeerResolver } from '../types/stream.ts';

/** Always resolves to the same addresses. */
export class StaticPeerResolver implements PeerResolver {
  private readonly addresses: readonly PeerAddress[];

  constructor(addresses: readonly PeerAddress[]) {
    this.addresses = [...addresses];
  }

  resolve(): PeerAddress[] {
    return [...this.addresses];
  }
}
