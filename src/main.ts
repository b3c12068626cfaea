// imports
import dotenv from 'dotenv';
dotenv.config();

import os from 'os';
import { loadConfig } from './config/load.ts';
import { Engine } from './engine/engine.ts';
import { createResolver } from './resolvers/index.ts';
import { getRuntime, setRuntime } from './runtime/context.ts';
import { RecordChannel, SinkFactory, pump } from './sinks/index.ts';
import { HttpStreamOpener, urlFromTemplate } from './transports/index.ts';
import { log } from './utils/logger.ts';
import { md5HashCanonical } from './utils/stable-hash.ts';
import { PEERSTREAM_VERSION } from './version.ts';

async function main() {
  // load config
  const appCfg = await loadConfig(process.argv[2]);

  // initialize runtime context with config hash and other metadata
  const configHash = md5HashCanonical(appCfg, 8);
  const longCommitSha = process.env.COMMIT_SHA;
  setRuntime({
    version: PEERSTREAM_VERSION,
    commitSha: longCommitSha ? longCommitSha.slice(0, 8) : null,
    configHash,
    machineHostname: os.hostname(),
    startedAt: Date.now(),
  });
  log.info(`peerstream ${PEERSTREAM_VERSION} starting (config ${configHash}, host ${os.hostname()})`);

  const { resolver, close: closeResolver } = createResolver(appCfg.peers);
  const opener = new HttpStreamOpener(urlFromTemplate(appCfg.transport.urlTemplate));
  const channel = new RecordChannel(appCfg.channelCapacity);
  const out = SinkFactory.create(appCfg.sinkConfig);
  await out.init?.();

  const root = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`received ${signal}, shutting down`);
    root.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // the consumer: one reader draining the channel into the output sink
  let sinkError: unknown = null;
  const consumer = pump(channel, out).catch((err: unknown) => {
    sinkError = err;
    log.error('output sink failed, stopping:', err);
    root.abort();
    return 0;
  });

  const engine = new Engine({
    resolver,
    opener,
    sink: channel,
    retryDelayMs: appCfg.retryDelay,
    resolveIntervalMs: appCfg.resolveInterval,
    maxRecordBytes: appCfg.maxRecordBytes,
  });
  await engine.run(root.signal);

  // wait for every worker to observe the abort before ending the channel
  await engine.join();
  channel.close();
  const written = await consumer;
  await out.close?.();
  await closeResolver();

  if (sinkError) throw sinkError;
  log.info(`done, ${written} record(s) written in ${Date.now() - getRuntime().startedAt}ms`);
}

main().catch((err: unknown) => {
  log.fatal('peerstream failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
