/**
 * Wires a reasoner around a storage backend. Construction order matters:
 * the breaker guards the storage, the engine reads through the guarded port,
 * and ingestion writes through the same port and clears the same cache.
 */

import { EventBus } from '../core/events.js';
import { ReasonerConfigSchema, type ReasonerConfig, type ReasonerConfigInput } from '../core/types.js';
import { ResultCache } from '../cache/result-cache.js';
import { IngestionPipeline, type BatchErrorHandler } from '../ingestion/pipeline.js';
import { NoopMetrics, safeMetrics, type MetricsSink } from '../observability/metrics.js';
import { QueryEngine } from '../query/engine.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import { GuardedStorage, isBreakerFailure } from '../storage/guarded-store.js';
import type { StoragePort } from '../storage/types.js';
import { Orchestrator } from './orchestrator.js';

export interface CreateReasonerOptions {
  /** Raw backend; every call to it goes through the circuit breaker */
  storage: StoragePort;
  config?: ReasonerConfigInput;
  metrics?: MetricsSink;
  events?: EventBus;
  onBatchError?: BatchErrorHandler;
}

export interface Reasoner {
  orchestrator: Orchestrator;
  ingestion: IngestionPipeline;
  cache: ResultCache;
  breaker: CircuitBreaker;
  /** The guarded port */
  storage: StoragePort;
  events: EventBus;
  metrics: MetricsSink;
  config: ReasonerConfig;
}

export function createReasoner(options: CreateReasonerOptions): Reasoner {
  const config = ReasonerConfigSchema.parse(options.config ?? {});
  const metrics = safeMetrics(options.metrics ?? new NoopMetrics());
  const events = options.events ?? new EventBus();

  const breaker = new CircuitBreaker('storage', {
    failureThreshold: config.breaker.failureThreshold,
    resetTimeoutMs: config.breaker.resetTimeoutMs,
    windowMs: config.breaker.windowMs,
    isFailure: isBreakerFailure,
    metrics,
    events,
  });
  const storage = new GuardedStorage(options.storage, breaker, metrics);

  const cache = new ResultCache({
    capacity: config.cache.capacity,
    defaultTtlMs: config.cache.ttlMs,
    metrics,
    events,
  });

  const engine = new QueryEngine(storage, {
    maxDepth: config.query.maxDepth,
    timeoutMs: config.query.timeoutMs,
  });
  const orchestrator = new Orchestrator(engine, cache, storage, breaker, {
    cacheTtlMs: config.cache.ttlMs,
    metrics,
    events,
  });

  const ingestion = new IngestionPipeline(storage, {
    ...config.ingestion,
    onBatchError: options.onBatchError,
    cache,
    metrics,
    events,
  });

  return { orchestrator, ingestion, cache, breaker, storage, events, metrics, config };
}
