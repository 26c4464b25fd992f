/**
 * ontology-reasoner: typed reasoning over weighted ontology graphs
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { createReasoner, InMemoryStorage, csvFileSource } from 'ontology-reasoner';
 *
 * const reasoner = createReasoner({ storage: new InMemoryStorage() });
 * await reasoner.ingestion.run(csvFileSource('ontology.csv', 500));
 * const result = await reasoner.orchestrator.ask({ type: 'InstanceOf', subject: 'Fido', object: 'Animal' });
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, PROJECT_CONFIG_FILE, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger, type Logger, type LoggerOptions } from './core/logger.js';
export {
  ReasonerError,
  ConfigError,
  ValidationError,
  StorageError,
  TransientStorageError,
  PermanentStorageError,
  BreakerOpenError,
  QueryCancelledError,
  IngestionError,
  ChannelClosedError,
} from './core/errors.js';
export {
  ReasonerConfigSchema,
  type ReasonerConfig,
  type ReasonerConfigInput,
  type ReasonerEvents,
} from './core/types.js';
export { AsyncSemaphore } from './core/semaphore.js';

// Storage
export {
  EdgeType,
  EDGE_TYPES,
  parseEdgeType,
  normalizeId,
  type Entity,
  type Relationship,
  type HealthStatus,
  type StoragePort,
} from './storage/types.js';
export { InMemoryStorage } from './storage/memory-store.js';
export { GuardedStorage, isBreakerFailure } from './storage/guarded-store.js';

// Resilience
export {
  CircuitBreaker,
  CircuitState,
  type BreakerState,
  type CircuitBreakerOptions,
} from './resilience/circuit-breaker.js';

// Query
export { QueryEngine, type QueryEngineOptions } from './query/engine.js';
export { QuestionSchema, normalizeQuestion, describeQuestion, type QuestionInput } from './query/question.js';
export {
  Outcome,
  type Question,
  type QuestionType,
  type QueryResult,
  type UnknownReason,
  type AnswerOptions,
} from './query/types.js';

// Cache
export {
  ResultCache,
  cacheKeyFor,
  type CacheEntry,
  type CacheStats,
  type CacheInvalidator,
  type ResultCacheOptions,
} from './cache/result-cache.js';

// Ingestion
export {
  IngestionPipeline,
  type IngestionPipelineOptions,
  type IngestionReport,
  type RejectedRecord,
  type BatchErrorDecision,
  type BatchErrorHandler,
  type RunOptions,
} from './ingestion/pipeline.js';
export { parseRecord, type RawRecord, type ParsedRecord, type RecordParseResult } from './ingestion/records.js';
export { BoundedChannel, type ReceiveResult } from './ingestion/channel.js';
export type { Batch } from './ingestion/batch.js';
export {
  batched,
  parseCsvLine,
  parseCsvLines,
  csvFileSource,
  RecordStream,
  RELATIONSHIP_CSV_HEADER,
  type RecordSource,
} from './ingestion/sources.js';

// Observability
export {
  InMemoryMetrics,
  NoopMetrics,
  safeMetrics,
  type MetricsSink,
  type MetricLabels,
  type MetricsSnapshot,
  type HistogramSnapshot,
} from './observability/metrics.js';

// Reasoner
export { Orchestrator, type AskManyOptions, type OrchestratorOptions, type ReasonerHealth } from './reasoner/orchestrator.js';
export { createReasoner, type CreateReasonerOptions, type Reasoner } from './reasoner/factory.js';

export { VERSION, NAME } from './version.js';
