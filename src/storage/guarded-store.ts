/**
 * GuardedStorage: wraps a StoragePort with error classification, the circuit
 * breaker and call metrics. Implements the same StoragePort interface so it
 * is a drop-in wrapper for every reader and writer.
 */

import { getLogger } from '../core/logger.js';
import {
  BreakerOpenError,
  PermanentStorageError,
  StorageError,
  TransientStorageError,
  toError,
} from '../core/errors.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { MetricsSink } from '../observability/metrics.js';
import type { EdgeType, Entity, HealthStatus, Relationship, StoragePort } from './types.js';

const logger = getLogger().child({ component: 'guarded-store' });

type StorageOp = 'getEntity' | 'getRelationshipsByHead' | 'storeEntities' | 'storeRelationships' | 'healthCheck';

/** Only permanent failures are exempt from the breaker threshold. */
export function isBreakerFailure(error: unknown): boolean {
  return !(error instanceof PermanentStorageError);
}

export class GuardedStorage implements StoragePort {
  constructor(
    private readonly inner: StoragePort,
    private readonly breaker: CircuitBreaker,
    private readonly metrics: MetricsSink,
  ) {}

  getEntity(id: string): Promise<Entity | undefined> {
    return this.call('getEntity', () => this.inner.getEntity(id));
  }

  getRelationshipsByHead(id: string, edgeType?: EdgeType): Promise<Relationship[]> {
    return this.call('getRelationshipsByHead', () => this.inner.getRelationshipsByHead(id, edgeType));
  }

  storeEntities(batch: readonly Entity[]): Promise<void> {
    return this.call('storeEntities', () => this.inner.storeEntities(batch));
  }

  storeRelationships(batch: readonly Relationship[]): Promise<void> {
    return this.call('storeRelationships', () => this.inner.storeRelationships(batch));
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      return await this.call('healthCheck', () => this.inner.healthCheck());
    } catch (error) {
      logger.warn({ err: error }, 'Storage health check failed');
      return 'down';
    }
  }

  private async call<T>(op: StorageOp, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await this.breaker.execute(async () => {
        try {
          return await fn();
        } catch (error) {
          throw classify(error, op);
        }
      });
      this.record(op, 'ok', start);
      return result;
    } catch (error) {
      const outcome = error instanceof BreakerOpenError
        ? 'rejected'
        : error instanceof PermanentStorageError ? 'permanent' : 'transient';
      this.record(op, outcome, start);
      throw error;
    }
  }

  private record(op: StorageOp, outcome: string, start: number): void {
    this.metrics.increment('storage_calls_total', { op, outcome });
    if (outcome !== 'rejected') {
      this.metrics.observe('storage_call_duration_ms', Date.now() - start, { op });
    }
  }
}

function classify(error: unknown, op: StorageOp): StorageError {
  if (error instanceof StorageError) return error;
  const err = toError(error);
  return new TransientStorageError(`Storage ${op} failed: ${err.message}`, op, err);
}
