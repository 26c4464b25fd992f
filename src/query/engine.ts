/**
 * Query Engine: answers typed questions by level-synchronous breadth-first
 * search over the ontology, reading edges through the (breaker-guarded)
 * storage port.
 *
 * Traversal rules:
 * - SubclassOf(A, B): follow SubclassOf edges from A until an edge reaches B.
 * - InstanceOf(A, B): one InstanceOf hop from A (every class is an alternate
 *   start), then SubclassOf edges until B.
 * - HasAttribute(A, B): a HasAttribute edge to B on A or on anything A reaches
 *   through SubclassOf edges.
 *
 * Every entity is expanded at most once per query. For each entity first
 * reached on a level, the strongest route from the previous level is kept;
 * the first level that produces a goal edge ends the search.
 */

import { getLogger } from '../core/logger.js';
import { raceWithSignal } from '../core/abort.js';
import { BreakerOpenError, PermanentStorageError, QueryCancelledError, toError } from '../core/errors.js';
import { EdgeType, type Relationship, type StoragePort } from '../storage/types.js';
import { bestPath, comparePaths, extendPath, startPath, type ScoredPath } from './path.js';
import { describeQuestion } from './question.js';
import { Outcome, type AnswerOptions, type Question, type QueryResult, type UnknownReason } from './types.js';

const logger = getLogger().child({ component: 'query-engine' });

export interface QueryEngineOptions {
  /** Longest path, in edges, the search may return (default: 10) */
  maxDepth?: number;
  /** Wall-clock limit per query; a query over the limit resolves UNKNOWN with reason `timeout` */
  timeoutMs?: number;
}

interface LevelRule {
  /** Edge type to request from storage; undefined fetches every type */
  fetch?: EdgeType;
  traverse: EdgeType;
  goal: EdgeType;
}

function ruleFor(type: EdgeType, depth: number): LevelRule {
  switch (type) {
    case EdgeType.SubclassOf:
      return { fetch: EdgeType.SubclassOf, traverse: EdgeType.SubclassOf, goal: EdgeType.SubclassOf };
    case EdgeType.InstanceOf:
      return depth === 0
        ? { fetch: EdgeType.InstanceOf, traverse: EdgeType.InstanceOf, goal: EdgeType.InstanceOf }
        : { fetch: EdgeType.SubclassOf, traverse: EdgeType.SubclassOf, goal: EdgeType.SubclassOf };
    case EdgeType.HasAttribute:
      return { traverse: EdgeType.SubclassOf, goal: EdgeType.HasAttribute };
  }
}

/** Raised internally when the query's own signal fires; never escapes `answer`. */
class TraversalStopped extends Error {
  constructor() {
    super('Traversal stopped');
    this.name = 'TraversalStopped';
  }
}

export class QueryEngine {
  private readonly maxDepth: number;
  private readonly timeoutMs?: number;

  constructor(
    private readonly storage: StoragePort,
    options: QueryEngineOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? 10;
    this.timeoutMs = options.timeoutMs;
    if (this.maxDepth < 1) throw new Error('maxDepth must be at least 1');
  }

  /**
   * Answer a normalized question. Resolves with a well-formed result for every
   * negative, undecided or failed search; rejects only with QueryCancelledError
   * when the caller's signal aborts.
   */
  async answer(question: Question, options: AnswerOptions = {}): Promise<QueryResult> {
    const start = Date.now();
    const { signal } = options;
    if (signal?.aborted) throw new QueryCancelledError();

    const stop = new AbortController();
    let timedOut = false;
    const timer = this.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          stop.abort();
        }, this.timeoutMs)
      : undefined;
    const onCallerAbort = (): void => stop.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const visits = { count: 0 };
    try {
      const partial = await this.search(question, stop.signal, visits);
      return { ...partial, entitiesVisited: visits.count, cacheHit: false, elapsedMs: Date.now() - start };
    } catch (error) {
      if (signal?.aborted) throw new QueryCancelledError();
      const base = { entitiesVisited: visits.count, elapsedMs: Date.now() - start };
      if (timedOut) {
        logger.warn({ question: describeQuestion(question), timeoutMs: this.timeoutMs }, 'Query timed out');
        return unknown('timeout', base);
      }
      return this.failureResult(question, error, base);
    } finally {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async search(
    question: Question,
    signal: AbortSignal,
    visits: { count: number },
  ): Promise<Omit<QueryResult, 'entitiesVisited' | 'cacheHit' | 'elapsedMs'>> {
    const visited = new Set<string>([question.subject]);
    let frontier: ScoredPath[] = [startPath(question.subject)];

    for (let depth = 0; ; depth++) {
      if (frontier.length === 0) {
        return { outcome: Outcome.NO, confidence: 0, path: [], maxDepthExceeded: false };
      }
      if (depth >= this.maxDepth) {
        return { outcome: Outcome.UNKNOWN, confidence: 0, path: [], maxDepthExceeded: true, reason: 'depth_exceeded' };
      }

      const rule = ruleFor(question.type, depth);
      const goals: ScoredPath[] = [];
      const next = new Map<string, ScoredPath>();

      for (const node of frontier) {
        const edges = await this.expand(node.id, rule.fetch, signal);
        visits.count++;

        for (const edge of edges) {
          if (!isUsable(edge, node.id)) continue;

          if (edge.edgeType === rule.goal && edge.tailEntity === question.object) {
            goals.push(extendPath(node, edge));
          } else if (edge.edgeType === rule.traverse && !visited.has(edge.tailEntity)) {
            const candidate = extendPath(node, edge);
            const current = next.get(edge.tailEntity);
            if (!current || comparePaths(candidate, current) < 0) {
              next.set(edge.tailEntity, candidate);
            }
          }
        }
      }

      const winner = bestPath(goals);
      if (winner) {
        return { outcome: Outcome.YES, confidence: winner.confidence, path: winner.edges, maxDepthExceeded: false };
      }

      for (const id of next.keys()) visited.add(id);
      frontier = [...next.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }
  }

  private expand(id: string, edgeType: EdgeType | undefined, signal: AbortSignal): Promise<Relationship[]> {
    return raceWithSignal(this.storage.getRelationshipsByHead(id, edgeType), signal, () => new TraversalStopped());
  }

  private failureResult(
    question: Question,
    error: unknown,
    base: { entitiesVisited: number; elapsedMs: number },
  ): QueryResult {
    const err = toError(error);
    let reason: UnknownReason;
    if (error instanceof BreakerOpenError) {
      reason = 'breaker_open';
    } else if (error instanceof PermanentStorageError) {
      reason = 'storage_error';
    } else {
      reason = 'backend_unavailable';
    }
    logger.warn({ question: describeQuestion(question), reason, err: err.message }, 'Query aborted by storage failure');
    return unknown(reason, base, err.message);
  }
}

/** Confidence must be positive evidence in (0, 1] and the edge must leave the node asked about. */
function isUsable(edge: Relationship, head: string): boolean {
  return edge.headEntity === head && edge.confidence > 0 && edge.confidence <= 1;
}

function unknown(
  reason: UnknownReason,
  base: { entitiesVisited: number; elapsedMs: number },
  error?: string,
): QueryResult {
  return {
    outcome: Outcome.UNKNOWN,
    confidence: 0,
    path: [],
    entitiesVisited: base.entitiesVisited,
    maxDepthExceeded: false,
    cacheHit: false,
    elapsedMs: base.elapsedMs,
    reason,
    ...(error !== undefined ? { error } : {}),
  };
}
