/**
 * Ingestion Pipeline: validates, deduplicates and batches raw records and
 * writes them through the storage port.
 *
 * A single feeder pulls source batches, validates each record and routes it
 * to one of `workers` bounded channels by a hash of its dedup key. Each worker
 * accumulates its own batch and flushes on size or on the flush interval.
 * Every occurrence of a key lands on the same worker in source order, so the
 * last one seen is the one stored. A worker waiting on a slow write stops
 * receiving, its channel fills, and the feeder stops pulling from the source.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import { raceWithSignal } from '../core/abort.js';
import { ChannelClosedError, IngestionError, toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import type { CacheInvalidator } from '../cache/result-cache.js';
import type { MetricsSink } from '../observability/metrics.js';
import { NoopMetrics } from '../observability/metrics.js';
import type { StoragePort } from '../storage/types.js';
import { BatchAccumulator, dedupKey, type Batch } from './batch.js';
import { BoundedChannel } from './channel.js';
import { parseRecord, type ParsedRecord, type RawRecord } from './records.js';
import type { RecordSource } from './sources.js';

const logger = getLogger().child({ component: 'ingestion' });

export type BatchErrorDecision = 'retry' | 'skip' | 'abort';

export type BatchErrorHandler = (
  error: Error,
  batch: Batch,
  attempt: number,
) => BatchErrorDecision | Promise<BatchErrorDecision>;

export interface IngestionPipelineOptions {
  /** Concurrent consumers (default: 4) */
  workers?: number;
  /** Records buffered between the feeder and the workers, split evenly across workers (default: 256) */
  queueDepth?: number;
  /** Distinct records per storage write (default: 500) */
  batchSize?: number;
  /** Longest a non-empty batch waits for more records (default: 1000) */
  flushIntervalMs?: number;
  /** Rejected records kept in the report (default: 20) */
  maxRejectionSamples?: number;
  /** Decides what a failed batch write does next (default: abort the run) */
  onBatchError?: BatchErrorHandler;
  /** Cleared after every committed batch */
  cache?: CacheInvalidator;
  metrics?: MetricsSink;
  events?: EventBus;
}

export interface RejectedRecord {
  reason: string;
  record: RawRecord;
}

export interface IngestionReport {
  recordsReceived: number;
  recordsAccepted: number;
  recordsRejected: number;
  duplicatesMerged: number;
  batchesCommitted: number;
  batchesFailed: number;
  entitiesWritten: number;
  relationshipsWritten: number;
  rejections: RejectedRecord[];
  cancelled: boolean;
  durationMs: number;
}

export interface RunOptions {
  /** Stops pulling input; records already accumulated are still flushed */
  signal?: AbortSignal;
}

/** Per-run shared state; workers mutate it only between awaits. */
interface RunContext {
  report: IngestionReport;
  /** One inbox per worker */
  channels: BoundedChannel<ParsedRecord>[];
  stop: AbortController;
  fatal: Error | null;
}

class FeedStopped extends Error {
  constructor() {
    super('Feed stopped');
    this.name = 'FeedStopped';
  }
}

export class IngestionPipeline {
  private readonly workers: number;
  private readonly queueDepth: number;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly maxRejectionSamples: number;
  private readonly onBatchError: BatchErrorHandler;
  private readonly cache?: CacheInvalidator;
  private readonly metrics: MetricsSink;
  private readonly events?: EventBus;

  constructor(
    private readonly storage: StoragePort,
    options: IngestionPipelineOptions = {},
  ) {
    this.workers = options.workers ?? 4;
    this.queueDepth = options.queueDepth ?? 256;
    this.batchSize = options.batchSize ?? 500;
    this.flushIntervalMs = options.flushIntervalMs ?? 1000;
    this.maxRejectionSamples = options.maxRejectionSamples ?? 20;
    this.onBatchError = options.onBatchError ?? (() => 'abort');
    this.cache = options.cache;
    this.metrics = options.metrics ?? new NoopMetrics();
    this.events = options.events;
    if (this.workers < 1) throw new Error('Ingestion needs at least one worker');
    if (this.batchSize < 1) throw new Error('Batch size must be at least 1');
  }

  /**
   * Consume `source` to the end (or until cancelled) and commit every valid
   * record. Rejects with IngestionError when a batch failure is answered
   * with `abort`, or when the source itself throws.
   */
  async run(source: RecordSource, options: RunOptions = {}): Promise<IngestionReport> {
    const started = Date.now();
    const ctx: RunContext = {
      report: emptyReport(),
      channels: Array.from(
        { length: this.workers },
        () => new BoundedChannel<ParsedRecord>(Math.max(1, Math.ceil(this.queueDepth / this.workers))),
      ),
      stop: new AbortController(),
      fatal: null,
    };

    const { signal } = options;
    const onCancel = (): void => {
      ctx.report.cancelled = true;
      this.halt(ctx);
    };
    if (signal?.aborted) onCancel();
    signal?.addEventListener('abort', onCancel, { once: true });

    logger.info({ workers: this.workers, batchSize: this.batchSize, queueDepth: this.queueDepth }, 'Ingestion started');

    try {
      await Promise.all([
        this.feed(source, ctx),
        ...Array.from({ length: this.workers }, (_, workerId) => this.work(workerId, ctx)),
      ]);
    } finally {
      signal?.removeEventListener('abort', onCancel);
    }

    ctx.report.durationMs = Date.now() - started;
    const { report } = ctx;

    if (ctx.fatal) {
      logger.error({ err: ctx.fatal.message, ...summary(report) }, 'Ingestion aborted');
      throw new IngestionError(`Ingestion aborted: ${ctx.fatal.message}`, report, ctx.fatal);
    }

    logger.info(summary(report), report.cancelled ? 'Ingestion cancelled' : 'Ingestion finished');
    return report;
  }

  private async feed(source: RecordSource, ctx: RunContext): Promise<void> {
    const iterator = iteratorOf(source);
    let exhausted = false;

    try {
      while (!ctx.stop.signal.aborted) {
        const next = await raceWithSignal(iterator.next(), ctx.stop.signal, () => new FeedStopped());
        if (next.done) {
          exhausted = true;
          break;
        }
        for (const raw of next.value) {
          ctx.report.recordsReceived++;
          const parsed = parseRecord(raw);
          if (!parsed.ok) {
            this.reject(ctx, raw, parsed.reason);
            continue;
          }

          ctx.report.recordsAccepted++;
          this.metrics.increment('ingest_records_total', { status: 'accepted' });
          await ctx.channels[workerFor(dedupKey(parsed.record), this.workers)].send(parsed.record);
          this.metrics.gauge('ingest_queue_depth', queued(ctx));
        }
      }
    } catch (error) {
      if (!(error instanceof FeedStopped) && !(error instanceof ChannelClosedError)) {
        this.fail(ctx, toError(error));
      }
    } finally {
      closeAll(ctx);
      if (!exhausted) {
        // The source may be suspended mid-read; release it without waiting.
        iterator.return(undefined).catch((err: unknown) => {
          logger.debug({ err }, 'Source did not close cleanly');
        });
      }
    }
  }

  private async work(workerId: number, ctx: RunContext): Promise<void> {
    const batch = new BatchAccumulator();
    const inbox = ctx.channels[workerId];

    while (!ctx.fatal) {
      const openedAt = batch.openedAt;
      const waitMs = openedAt === null ? undefined : openedAt + this.flushIntervalMs - Date.now();
      const received = await inbox.receive(waitMs);

      if (received.status === 'closed') break;
      if (received.status === 'timeout') {
        await this.flush(workerId, batch, ctx);
        continue;
      }

      this.metrics.gauge('ingest_queue_depth', queued(ctx));
      batch.add(received.value);

      if (batch.size >= this.batchSize) {
        await this.flush(workerId, batch, ctx);
      }
    }

    if (!batch.isEmpty && !ctx.fatal) {
      await this.flush(workerId, batch, ctx);
    }
  }

  private async flush(workerId: number, accumulator: BatchAccumulator, ctx: RunContext): Promise<void> {
    if (accumulator.isEmpty) return;
    const batch = accumulator.drain(nanoid(10));

    ctx.report.duplicatesMerged += batch.duplicates;
    if (batch.duplicates > 0) this.metrics.increment('ingest_duplicates_total', undefined, batch.duplicates);
    this.metrics.observe('ingest_batch_size', batch.entities.length + batch.relationships.length);

    for (let attempt = 1; ; attempt++) {
      const start = Date.now();
      try {
        // Entities first so relationship endpoints carry their real names
        if (batch.entities.length > 0) await this.storage.storeEntities(batch.entities);
        if (batch.relationships.length > 0) await this.storage.storeRelationships(batch.relationships);
      } catch (error) {
        const err = toError(error);
        this.events?.emit('ingest:batch_failed', { batchId: batch.id, workerId, attempt, error: err.message });
        const decision = await this.decide(err, batch, attempt);
        logger.warn({ batchId: batch.id, workerId, attempt, decision, err: err.message }, 'Batch write failed');

        if (decision === 'retry') {
          this.metrics.increment('ingest_batches_total', { status: 'retried' });
          continue;
        }
        ctx.report.batchesFailed++;
        this.metrics.increment('ingest_batches_total', { status: 'failed' });
        if (decision === 'abort') this.fail(ctx, err);
        return;
      }

      const durationMs = Date.now() - start;
      ctx.report.batchesCommitted++;
      ctx.report.entitiesWritten += batch.entities.length;
      ctx.report.relationshipsWritten += batch.relationships.length;
      this.metrics.increment('ingest_batches_total', { status: 'committed' });
      this.metrics.observe('ingest_flush_duration_ms', durationMs);

      // New edges can change any answer, so every cached result goes
      this.cache?.invalidateAll();
      this.events?.emit('ingest:batch_committed', {
        batchId: batch.id,
        workerId,
        entities: batch.entities.length,
        relationships: batch.relationships.length,
        durationMs,
      });
      logger.debug(
        { batchId: batch.id, workerId, entities: batch.entities.length, relationships: batch.relationships.length },
        'Batch committed',
      );
      return;
    }
  }

  private async decide(error: Error, batch: Batch, attempt: number): Promise<BatchErrorDecision> {
    try {
      return await this.onBatchError(error, batch, attempt);
    } catch (handlerError) {
      logger.error({ err: toError(handlerError).message }, 'Batch error handler threw; aborting');
      return 'abort';
    }
  }

  private reject(ctx: RunContext, record: RawRecord, reason: string): void {
    ctx.report.recordsRejected++;
    if (ctx.report.rejections.length < this.maxRejectionSamples) {
      ctx.report.rejections.push({ reason, record });
    }
    this.metrics.increment('ingest_records_total', { status: 'rejected' });
    this.events?.emit('ingest:record_rejected', { reason, record });
    logger.debug({ reason }, 'Record rejected');
  }

  private fail(ctx: RunContext, error: Error): void {
    if (!ctx.fatal) ctx.fatal = error;
    this.halt(ctx);
  }

  private halt(ctx: RunContext): void {
    ctx.stop.abort();
    closeAll(ctx);
  }
}

/** FNV-1a over the key, reduced to a worker index. */
export function workerFor(key: string, workers: number): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) % workers;
}

function closeAll(ctx: RunContext): void {
  for (const channel of ctx.channels) channel.close();
}

function queued(ctx: RunContext): number {
  return ctx.channels.reduce((total, channel) => total + channel.length, 0);
}

function iteratorOf(source: RecordSource): AsyncGenerator<readonly RawRecord[]> {
  return (async function* () {
    yield* source;
  })();
}

function emptyReport(): IngestionReport {
  return {
    recordsReceived: 0,
    recordsAccepted: 0,
    recordsRejected: 0,
    duplicatesMerged: 0,
    batchesCommitted: 0,
    batchesFailed: 0,
    entitiesWritten: 0,
    relationshipsWritten: 0,
    rejections: [],
    cancelled: false,
    durationMs: 0,
  };
}

function summary(report: IngestionReport): Record<string, number | boolean> {
  const { rejections: _samples, ...counts } = report;
  return counts;
}
