import { Redis } from 'ioredis';
import type { PeersConfig } from '../config/schema.ts';
import type { PeerResolver } from '../types/stream.ts';
import { log } from '../utils/logger.ts';
import { RedisPeerResolver, type PeerRegistry } from './redis-resolver.ts';
import { StaticPeerResolver } from './static-resolver.ts';

export type ResolverHandle = {
  resolver: PeerResolver;
  /** Release whatever the resolver holds open. */
  close(): Promise<void>;
};

export interface RegistryConnection extends PeerRegistry {
  quit(): Promise<unknown>;
}

const connectRedis = (url: string): RegistryConnection => {
  // fail a lookup fast instead of stalling the resolve cadence; the next tick retries
  const redis = new Redis(url, { maxRetriesPerRequest: 1 });
  redis.on('error', (err: Error) => {
    log.error('Redis connection error:', err.message);
  });
  return redis;
};

export function createResolver(
  cfg: PeersConfig,
  connect: (url: string) => RegistryConnection = connectRedis,
): ResolverHandle {
  switch (cfg.kind) {
    case 'static':
      return { resolver: new StaticPeerResolver(cfg.addresses), close: async () => undefined };
    case 'redis': {
      const redis = connect(cfg.redisUrl);
      return {
        resolver: new RedisPeerResolver(redis, cfg.key),
        close: async () => {
          await redis.quit();
        },
      };
    }
  }
}
