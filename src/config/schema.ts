// config/schema.ts
import { z } from 'zod';
import { DEFAULT_RESOLVE_INTERVAL_MS, DEFAULT_RETRY_DELAY_MS } from '../engine/engine.ts';
import { DEFAULT_MAX_RECORD_BYTES } from '../engine/line-scanner.ts';
import { durationHumanToMs } from './duration.ts';

export const DEFAULT_CHANNEL_CAPACITY = 1024;
export const DEFAULT_REDIS_PEERS_KEY = 'peerstream:peers';

export const PeersConfig = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('static'),
    addresses: z.array(z.string().min(1)),
  }),
  z.object({
    kind: z.literal('redis'),
    redisUrl: z.string().min(1, 'redisUrl is required'),
    key: z.string().min(1).default(DEFAULT_REDIS_PEERS_KEY),
  }),
]);
export type PeersConfig = z.infer<typeof PeersConfig>;

export const TransportConfig = z.object({
  urlTemplate: z.string().includes('{addr}', { message: 'urlTemplate must contain {addr}' }),
});
export type TransportConfig = z.infer<typeof TransportConfig>;

export const SinkConfig = z.discriminatedUnion('sinkType', [
  z.object({ sinkType: z.literal('stdout') }),
  z.object({ sinkType: z.literal('file'), path: z.string().min(1) }),
]);
export type SinkConfig = z.infer<typeof SinkConfig>;

export const AppConfig = z.object({
  peers: PeersConfig,
  transport: TransportConfig,
  retryDelay: durationHumanToMs().default(DEFAULT_RETRY_DELAY_MS),
  resolveInterval: durationHumanToMs().default(DEFAULT_RESOLVE_INTERVAL_MS),
  channelCapacity: z.number().int().min(0).default(DEFAULT_CHANNEL_CAPACITY),
  maxRecordBytes: z.number().int().positive().default(DEFAULT_MAX_RECORD_BYTES),
  sinkConfig: SinkConfig.default({ sinkType: 'stdout' }),
});
export type AppConfig = z.infer<typeof AppConfig>;
