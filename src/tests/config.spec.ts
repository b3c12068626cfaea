import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'node:path';
import { parseHumanDurationToMs } from '../config/duration.ts';
import { AppConfig } from '../config/schema.ts';
import { loadConfig } from '../config/load.ts';
import { interpolate } from '../config/secret-interpolate.ts';
import { EnvSecretSource } from '../config/secret-source.ts';

const minimal = {
  peers: { kind: 'static', addresses: ['a:1', 'b:1'] },
  transport: { urlTemplate: 'http://{addr}/stream' },
};

describe('parseHumanDurationToMs', () => {
  it('parses single-unit durations', () => {
    expect(parseHumanDurationToMs('1s')).toBe(1000);
    expect(parseHumanDurationToMs('500ms')).toBe(500);
    expect(parseHumanDurationToMs(' 2m ')).toBe(120_000);
    expect(parseHumanDurationToMs('1.5h')).toBe(5_400_000);
  });

  it('returns null for anything else', () => {
    expect(parseHumanDurationToMs('abc')).toBeNull();
    expect(parseHumanDurationToMs('1s500ms')).toBeNull();
    expect(parseHumanDurationToMs('-1s')).toBeNull();
  });
});

describe('AppConfig', () => {
  it('fills in defaults', () => {
    const cfg = AppConfig.parse(minimal);
    expect(cfg.retryDelay).toBe(1000);
    expect(cfg.resolveInterval).toBe(1000);
    expect(cfg.channelCapacity).toBe(1024);
    expect(cfg.maxRecordBytes).toBe(65536);
    expect(cfg.sinkConfig).toEqual({ sinkType: 'stdout' });
  });

  it('converts human durations', () => {
    const cfg = AppConfig.parse({ ...minimal, retryDelay: '250ms', resolveInterval: '5s' });
    expect(cfg.retryDelay).toBe(250);
    expect(cfg.resolveInterval).toBe(5000);
  });

  it('rejects bad durations and templates', () => {
    expect(AppConfig.safeParse({ ...minimal, retryDelay: '0ms' }).success).toBe(false);
    expect(AppConfig.safeParse({ ...minimal, retryDelay: 'soon' }).success).toBe(false);
    expect(
      AppConfig.safeParse({ ...minimal, transport: { urlTemplate: 'http://fixed/stream' } }).success,
    ).toBe(false);
  });

  it('defaults the redis key', () => {
    const cfg = AppConfig.parse({ ...minimal, peers: { kind: 'redis', redisUrl: 'redis://localhost:6379' } });
    expect(cfg.peers).toEqual({ kind: 'redis', redisUrl: 'redis://localhost:6379', key: 'peerstream:peers' });
  });
});

describe('interpolate', () => {
  it('replaces env tokens inside nested strings and reports missing ones', async () => {
    const { value, missing } = await interpolate(
      { a: 'x-${env:ONE}-y', b: ['${env:TWO}'], n: 3 },
      { env: new EnvSecretSource({ ONE: '1' }) },
    );
    expect(value).toEqual({ a: 'x-1-y', b: [''], n: 3 });
    expect(missing).toEqual([{ source: 'env', key: 'TWO', placeholder: '${env:TWO}' }]);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'peerstream-cfg-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, body: unknown) =>
    fs.writeFileSync(path.join(dir, name), JSON.stringify(body));

  it('loads an explicit file and interpolates env tokens', async () => {
    write('cfg.json', {
      peers: { kind: 'redis', redisUrl: '${env:TEST_REDIS_URL}' },
      transport: { urlTemplate: 'http://{addr}/stream' },
    });
    const cfg = await loadConfig('cfg.json', {
      cwd: dir,
      env: { TEST_REDIS_URL: 'redis://cache:6379' },
    });
    expect(cfg.peers).toEqual({ kind: 'redis', redisUrl: 'redis://cache:6379', key: 'peerstream:peers' });
  });

  it('names missing env vars', async () => {
    write('cfg.json', {
      peers: { kind: 'redis', redisUrl: '${env:TEST_REDIS_URL}' },
      transport: { urlTemplate: 'http://{addr}/stream' },
    });
    await expect(loadConfig('cfg.json', { cwd: dir, env: {} })).rejects.toThrow(
      'Failed to load cfg.json: Missing required values for config interpolation:\n- env: TEST_REDIS_URL',
    );
  });

  it('falls back to config.peerstream.json, then PEERSTREAM_CONFIG', async () => {
    const inline = await loadConfig(undefined, {
      cwd: dir,
      env: { PEERSTREAM_CONFIG: JSON.stringify({ ...minimal, channelCapacity: 0 }) },
    });
    expect(inline.channelCapacity).toBe(0);

    write('config.peerstream.json', { ...minimal, channelCapacity: 8 });
    const fromFile = await loadConfig('missing.json', {
      cwd: dir,
      env: { PEERSTREAM_CONFIG: JSON.stringify({ ...minimal, channelCapacity: 0 }) },
    });
    expect(fromFile.channelCapacity).toBe(8);
  });

  it('reports validation problems by path', async () => {
    write('cfg.json', { ...minimal, channelCapacity: -1 });
    await expect(loadConfig('cfg.json', { cwd: dir, env: {} })).rejects.toThrow(
      'Failed to load cfg.json: Invalid configuration:\n- channelCapacity:',
    );
  });

  it('fails when nothing is configured', async () => {
    await expect(loadConfig(undefined, { cwd: dir, env: {} })).rejects.toThrow(
      'No configuration found. Please provide config.peerstream.json',
    );
  });
});
