// Peer registry kept in a Redis set: peers SADD themselves, SREM on the way out
import type { PeerAddress, PeerResolver } from '../types/stream.ts';

/** The slice of the ioredis client the resolver needs. */
export interface PeerRegistry {
  smembers(key: string): Promise<string[]>;
}

export class RedisPeerResolver implements PeerResolver {
  constructor(
    private readonly redis: PeerRegistry,
    private readonly key: string,
  ) {}

  // sorted so the start order of new workers is stable between runs
  async resolve(): Promise<PeerAddress[]> {
    const members = await this.redis.smembers(this.key);
    return members.filter((m) => m.length > 0).sort();
  }
}
