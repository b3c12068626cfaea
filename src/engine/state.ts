// Active Set: the table of running peer workers, keyed by address
import type { PeerAddress, WorkerHandle } from '../types/stream.ts';

/**
 * Owned exclusively by the engine's reconcile loop. `reconcile` consumes the previous
 * set (entries are taken out of it) and returns a fresh one, so there is never more than
 * one live table per engine and nothing else mutates it.
 */
export class ActiveSet {
  private readonly handles = new Map<PeerAddress, WorkerHandle>();

  static empty(): ActiveSet {
    return new ActiveSet();
  }

  get size(): number {
    return this.handles.size;
  }

  has(address: PeerAddress): boolean {
    return this.handles.has(address);
  }

  get(address: PeerAddress): WorkerHandle | undefined {
    return this.handles.get(address);
  }

  addresses(): PeerAddress[] {
    return Array.from(this.handles.keys());
  }

  /** Insert a handle. Throws if the address already has one. */
  insert(handle: WorkerHandle): void {
    if (this.handles.has(handle.address)) {
      throw new Error(`worker for ${handle.address} already present in active set`);
    }
    this.handles.set(handle.address, handle);
  }

  /** Remove and return the handle for `address`, if any. */
  take(address: PeerAddress): WorkerHandle | undefined {
    const handle = this.handles.get(address);
    if (handle) this.handles.delete(address);
    return handle;
  }

  /** Remove and return every remaining handle. */
  drain(): WorkerHandle[] {
    const rest = Array.from(this.handles.values());
    this.handles.clear();
    return rest;
  }
}
