import { z } from 'zod';

// ===== Configuration =====

export const ReasonerConfigSchema = z.object({
  query: z.object({
    maxDepth: z.number().int().min(1).default(10),
    /** Wall-clock bound on a single traversal; unbounded when absent */
    timeoutMs: z.number().int().min(1).optional(),
  }).default({}),
  cache: z.object({
    capacity: z.number().int().min(1).default(1000),
    ttlMs: z.number().int().min(1).default(5 * 60 * 1000),
  }).default({}),
  breaker: z.object({
    failureThreshold: z.number().int().min(1).default(5),
    resetTimeoutMs: z.number().int().min(1).default(30_000),
    windowMs: z.number().int().min(1).default(60_000),
  }).default({}),
  ingestion: z.object({
    workers: z.number().int().min(1).max(64).default(4),
    queueDepth: z.number().int().min(1).default(256),
    batchSize: z.number().int().min(1).default(500),
    flushIntervalMs: z.number().int().min(1).default(1000),
    maxRejectionSamples: z.number().int().min(0).default(20),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type ReasonerConfig = z.infer<typeof ReasonerConfigSchema>;

/** Nested partial accepted by `ConfigManager.load` and `createReasoner`. */
export type ReasonerConfigInput = z.input<typeof ReasonerConfigSchema>;

// ===== Events =====

export interface ReasonerEvents {
  'breaker:transition': { breaker: string; from: string; to: string; consecutiveFailures: number };
  'cache:invalidated': { scope: 'all' | 'keys'; removed: number };
  'ingest:batch_committed': {
    batchId: string;
    workerId: number;
    entities: number;
    relationships: number;
    durationMs: number;
  };
  'ingest:batch_failed': { batchId: string; workerId: number; attempt: number; error: string };
  'ingest:record_rejected': { reason: string; record: Record<string, unknown> };
  'query:answered': { requestId: string; type: string; outcome: string; cacheHit: boolean; elapsedMs: number };
}
