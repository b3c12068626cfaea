import { describe, it, expect } from 'vitest';
import { deriveLifetime, raceAbort } from '../engine/lifetime.ts';

describe('deriveLifetime', () => {
  it('aborts the child when the parent aborts', () => {
    const parent = new AbortController();
    const child = deriveLifetime(parent.signal);
    expect(child.signal.aborted).toBe(false);
    parent.abort();
    expect(child.signal.aborted).toBe(true);
  });

  it('cancels the child without touching the parent', () => {
    const parent = new AbortController();
    const child = deriveLifetime(parent.signal);
    const sibling = deriveLifetime(parent.signal);
    child.cancel();
    child.cancel();
    expect(child.signal.aborted).toBe(true);
    expect(parent.signal.aborted).toBe(false);
    expect(sibling.signal.aborted).toBe(false);
  });

  it('starts aborted under an aborted parent', () => {
    const parent = new AbortController();
    parent.abort();
    expect(deriveLifetime(parent.signal).signal.aborted).toBe(true);
  });
});

describe('raceAbort', () => {
  it('returns the value when the work settles first', async () => {
    const ctrl = new AbortController();
    await expect(raceAbort(Promise.resolve(7), ctrl.signal)).resolves.toEqual({
      aborted: false,
      value: 7,
    });
  });

  it('reports the abort when the signal fires first', async () => {
    const ctrl = new AbortController();
    const never = new Promise<number>(() => undefined);
    const raced = raceAbort(never, ctrl.signal);
    ctrl.abort();
    await expect(raced).resolves.toEqual({ aborted: true });
  });

  it('reports an abort that already happened', async () => {
    const ctrl = new AbortController();
    ctrl.abort();
    await expect(raceAbort(Promise.resolve(1), ctrl.signal)).resolves.toEqual({ aborted: true });
  });

  it('propagates a rejection that wins the race', async () => {
    const ctrl = new AbortController();
    await expect(raceAbort(Promise.reject(new Error('boom')), ctrl.signal)).rejects.toThrow('boom');
  });
});
