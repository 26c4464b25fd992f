/**
 * ScriptedStorage: an in-process StoragePort with injectable faults and
 * gates, backed by InMemoryStorage.
 */

import { InMemoryStorage } from '../../src/storage/memory-store.js';
import type { EdgeType, Entity, HealthStatus, Relationship, StoragePort } from '../../src/storage/types.js';

export type StorageOp = keyof StoragePort;

interface Fault {
  op: StorageOp | '*';
  error: () => Error;
  remaining: number;
}

export class ScriptedStorage implements StoragePort {
  readonly inner = new InMemoryStorage();
  readonly calls: StorageOp[] = [];
  private faults: Fault[] = [];
  private holds = new Map<StorageOp, Promise<void>>();
  private lateHolds = new Map<StorageOp, Promise<void>>();

  /** Make the next `times` calls to `op` (or any op, with '*') throw. */
  fail(op: StorageOp | '*', error: Error | (() => Error), times = Infinity): this {
    this.faults.push({ op, error: typeof error === 'function' ? error : () => error, remaining: times });
    return this;
  }

  heal(): void {
    this.faults = [];
  }

  /**
   * Park every call to `op` until the returned release function runs. With
   * `after`, the call reads its result first and is parked before returning it.
   */
  hold(op: StorageOp, phase: 'before' | 'after' = 'before'): () => void {
    const gates = phase === 'before' ? this.holds : this.lateHolds;
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    gates.set(op, gate);
    return () => {
      gates.delete(op);
      release();
    };
  }

  count(op: StorageOp): number {
    return this.calls.filter(call => call === op).length;
  }

  async getEntity(id: string): Promise<Entity | undefined> {
    await this.before('getEntity');
    return this.inner.getEntity(id);
  }

  async getRelationshipsByHead(id: string, edgeType?: EdgeType): Promise<Relationship[]> {
    await this.before('getRelationshipsByHead');
    const relationships = await this.inner.getRelationshipsByHead(id, edgeType);
    await this.lateHolds.get('getRelationshipsByHead');
    return relationships;
  }

  async storeEntities(batch: readonly Entity[]): Promise<void> {
    await this.before('storeEntities');
    return this.inner.storeEntities(batch);
  }

  async storeRelationships(batch: readonly Relationship[]): Promise<void> {
    await this.before('storeRelationships');
    return this.inner.storeRelationships(batch);
  }

  async healthCheck(): Promise<HealthStatus> {
    await this.before('healthCheck');
    return this.inner.healthCheck();
  }

  private async before(op: StorageOp): Promise<void> {
    this.calls.push(op);
    const gate = this.holds.get(op);
    if (gate) await gate;

    const fault = this.faults.find(f => (f.op === op || f.op === '*') && f.remaining > 0);
    if (fault) {
      fault.remaining--;
      throw fault.error();
    }
  }
}
