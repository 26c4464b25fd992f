import type { EdgeType, Relationship } from '../storage/types.js';

/** The three question forms share their names with the edge types they traverse. */
export type QuestionType = EdgeType;

export interface Question {
  readonly type: QuestionType;
  /** Entity id the search starts from */
  readonly subject: string;
  /** Target entity id, or attribute id for HasAttribute */
  readonly object: string;
}

export enum Outcome {
  YES = 'YES',
  NO = 'NO',
  UNKNOWN = 'UNKNOWN',
}

export type UnknownReason =
  | 'depth_exceeded'
  | 'timeout'
  | 'backend_unavailable'
  | 'breaker_open'
  | 'storage_error';

export interface QueryResult {
  outcome: Outcome;
  /** Product of the edge confidences along `path`; 0 unless YES */
  confidence: number;
  /** Edges actually used, subject first */
  path: readonly Relationship[];
  entitiesVisited: number;
  maxDepthExceeded: boolean;
  cacheHit: boolean;
  elapsedMs: number;
  /** Set only for UNKNOWN */
  reason?: UnknownReason;
  /** Backend failure message behind a failure-caused UNKNOWN */
  error?: string;
}

export interface AnswerOptions {
  signal?: AbortSignal;
}
