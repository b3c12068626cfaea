import { describe, it, expect, afterEach } from 'vitest';
import { getRuntime, resetRuntime, setRuntime } from '../runtime/context.ts';
import { md5HashCanonical } from '../utils/stable-hash.ts';

describe('runtime context', () => {
  afterEach(() => resetRuntime());

  it('throws until every required field is set', () => {
    expect(() => getRuntime()).toThrow('Runtime not initialized');
    setRuntime({ version: '0.1.0', configHash: 'abcd1234' });
    expect(() => getRuntime()).toThrow('Runtime not initialized');

    setRuntime({ machineHostname: 'host-1', startedAt: 1000 });
    expect(getRuntime()).toEqual({
      version: '0.1.0',
      configHash: 'abcd1234',
      machineHostname: 'host-1',
      startedAt: 1000,
      commitSha: undefined,
    });
  });
});

describe('md5HashCanonical', () => {
  it('ignores key order and truncates', () => {
    const a = md5HashCanonical({ b: 1, a: { y: [1, 2], x: 'z' } });
    const b = md5HashCanonical({ a: { x: 'z', y: [1, 2] }, b: 1 });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{32}$/);
    expect(md5HashCanonical({ b: 1 }, 8)).toBe(md5HashCanonical({ b: 1 }).slice(0, 8));
    expect(md5HashCanonical([1, 2])).not.toBe(md5HashCanonical([2, 1]));
  });
});
