import type { Relationship } from '../storage/types.js';

/** A route from the question subject to some entity, with its evidence strength. */
export interface ScoredPath {
  /** Entity the path ends at */
  readonly id: string;
  readonly edges: readonly Relationship[];
  /** Product of edge confidences; 1 for the empty path */
  readonly confidence: number;
  /** Subject followed by every tail along the path */
  readonly ids: readonly string[];
}

export function startPath(subject: string): ScoredPath {
  return { id: subject, edges: [], confidence: 1, ids: [subject] };
}

export function extendPath(path: ScoredPath, edge: Relationship): ScoredPath {
  return {
    id: edge.tailEntity,
    edges: [...path.edges, edge],
    confidence: path.confidence * edge.confidence,
    ids: [...path.ids, edge.tailEntity],
  };
}

/**
 * Orders paths best-first: higher confidence, then fewer edges, then the
 * lexicographically smaller entity-id sequence. Negative when `a` wins.
 */
export function comparePaths(a: ScoredPath, b: ScoredPath): number {
  if (a.confidence !== b.confidence) return a.confidence > b.confidence ? -1 : 1;
  if (a.edges.length !== b.edges.length) return a.edges.length - b.edges.length;

  const n = Math.min(a.ids.length, b.ids.length);
  for (let i = 0; i < n; i++) {
    if (a.ids[i] !== b.ids[i]) return a.ids[i] < b.ids[i] ? -1 : 1;
  }
  return a.ids.length - b.ids.length;
}

export function bestPath(paths: readonly ScoredPath[]): ScoredPath | undefined {
  let best: ScoredPath | undefined;
  for (const path of paths) {
    if (!best || comparePaths(path, best) < 0) best = path;
  }
  return best;
}
