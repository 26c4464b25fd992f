/**
 * Orchestrator: the query front door. Validates and normalizes questions,
 * serves repeats from the result cache, and runs the engine on a miss.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import { QueryCancelledError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { AsyncSemaphore } from '../core/semaphore.js';
import { cacheKeyFor, type CacheStats, type ResultCache } from '../cache/result-cache.js';
import type { MetricsSink } from '../observability/metrics.js';
import { NoopMetrics } from '../observability/metrics.js';
import type { QueryEngine } from '../query/engine.js';
import { describeQuestion, normalizeQuestion } from '../query/question.js';
import { Outcome, type AnswerOptions, type QueryResult } from '../query/types.js';
import type { BreakerState, CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { Entity, HealthStatus, StoragePort } from '../storage/types.js';
import { normalizeId } from '../storage/types.js';

const logger = getLogger().child({ component: 'orchestrator' });

export interface OrchestratorOptions {
  /** TTL for cached answers; the cache default applies when absent */
  cacheTtlMs?: number;
  metrics?: MetricsSink;
  events?: EventBus;
}

export interface AskManyOptions extends AnswerOptions {
  /** Questions in flight at once (default: 8) */
  concurrency?: number;
}

export interface ReasonerHealth {
  storage: HealthStatus;
  breaker: BreakerState & { name: string };
  cache: CacheStats;
}

export class Orchestrator {
  private readonly cacheTtlMs?: number;
  private readonly metrics: MetricsSink;
  private readonly events?: EventBus;

  constructor(
    private readonly engine: QueryEngine,
    private readonly cache: ResultCache,
    private readonly storage: StoragePort,
    private readonly breaker: CircuitBreaker,
    options: OrchestratorOptions = {},
  ) {
    this.cacheTtlMs = options.cacheTtlMs;
    this.metrics = options.metrics ?? new NoopMetrics();
    this.events = options.events;
  }

  /**
   * Answer one question. Throws ValidationError for malformed input and
   * QueryCancelledError when `signal` aborts; every other outcome, backend
   * failures included, comes back as a result.
   */
  async ask(input: unknown, options: AnswerOptions = {}): Promise<QueryResult> {
    const question = normalizeQuestion(input);
    const key = cacheKeyFor(question);
    const requestId = nanoid(12);
    const start = Date.now();

    if (options.signal?.aborted) {
      this.metrics.increment('queries_cancelled_total');
      throw new QueryCancelledError();
    }

    const cached = this.cache.get(key);
    if (cached) {
      const result: QueryResult = { ...cached, cacheHit: true, elapsedMs: Date.now() - start };
      this.record(requestId, question.type, result);
      return result;
    }

    // An ingestion commit during the run makes the answer stale before it is stored
    const generation = this.cache.generation;
    let result: QueryResult;
    try {
      result = await this.engine.answer(question, options);
    } catch (error) {
      if (error instanceof QueryCancelledError) {
        this.metrics.increment('queries_cancelled_total');
        logger.debug({ requestId, question: describeQuestion(question) }, 'Query cancelled');
      }
      throw error;
    }

    // A result that raced a late abort is still discarded
    if (options.signal?.aborted) {
      this.metrics.increment('queries_cancelled_total');
      throw new QueryCancelledError();
    }

    if (isCacheable(result)) {
      if (this.cache.generation === generation) {
        this.cache.put(key, result, this.cacheTtlMs);
      } else {
        logger.debug({ requestId }, 'Graph changed while answering; result not cached');
      }
    }
    this.record(requestId, question.type, result);
    return result;
  }

  /**
   * Answer several questions, at most `concurrency` at a time; results keep
   * input order. Questions still queued when `signal` aborts never start.
   */
  async askMany(inputs: readonly unknown[], options: AskManyOptions = {}): Promise<QueryResult[]> {
    const { concurrency = 8, ...answerOptions } = options;
    const limiter = new AsyncSemaphore(concurrency);
    return Promise.all(inputs.map(input => limiter.run(() => this.ask(input, answerOptions), {
      signal: answerOptions.signal,
      onAbort: () => new QueryCancelledError(),
    })));
  }

  /** Direct entity lookup through the guarded port; absent ids resolve undefined. */
  getEntity(id: string): Promise<Entity | undefined> {
    return this.storage.getEntity(normalizeId(id));
  }

  async health(): Promise<ReasonerHealth> {
    return {
      storage: await this.storage.healthCheck(),
      breaker: { name: this.breaker.name, ...this.breaker.getStats() },
      cache: this.cache.stats(),
    };
  }

  private record(requestId: string, type: string, result: QueryResult): void {
    this.metrics.increment('queries_total', { type, outcome: result.outcome });
    if (!result.cacheHit) {
      this.metrics.observe('query_duration_ms', result.elapsedMs, { type });
      this.metrics.observe('query_entities_visited', result.entitiesVisited, { type });
    }
    this.events?.emit('query:answered', {
      requestId,
      type,
      outcome: result.outcome,
      cacheHit: result.cacheHit,
      elapsedMs: result.elapsedMs,
    });
    logger.debug(
      { requestId, type, outcome: result.outcome, reason: result.reason, cacheHit: result.cacheHit },
      'Query answered',
    );
  }
}

/** Only answers that another run over the same graph would repeat. */
function isCacheable(result: QueryResult): boolean {
  if (result.outcome !== Outcome.UNKNOWN) return true;
  return result.reason === 'depth_exceeded';
}
