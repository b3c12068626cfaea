export { StaticPeerResolver } from './static-resolver.ts';
export { RedisPeerResolver } from './redis-resolver.ts';
export type { PeerRegistry } from './redis-resolver.ts';
export { createResolver } from './resolver-factory.ts';
export type { ResolverHandle, RegistryConnection } from './resolver-factory.ts';
