/**
 * Ontology data model and the storage contract every backend implements.
 */

export enum EdgeType {
  SubclassOf = 'SubclassOf',
  InstanceOf = 'InstanceOf',
  HasAttribute = 'HasAttribute',
}

export const EDGE_TYPES: readonly EdgeType[] = [EdgeType.SubclassOf, EdgeType.InstanceOf, EdgeType.HasAttribute];

export interface Entity {
  id: string;
  name: string;
  /** Epoch milliseconds of the first write */
  createdAt: number;
  metadata?: Record<string, string>;
}

/** Directed, weighted edge. Parallel edges between the same pair are permitted. */
export interface Relationship {
  headEntity: string;
  tailEntity: string;
  edgeType: EdgeType;
  /** In [0, 1] */
  confidence: number;
}

export type HealthStatus = 'healthy' | 'degraded' | 'down';

/**
 * Storage Port. Absent entities resolve to `undefined` and missing edges to
 * an empty array; only backend failures reject, as `TransientStorageError`
 * or `PermanentStorageError` (anything else is treated as transient).
 */
export interface StoragePort {
  getEntity(id: string): Promise<Entity | undefined>;
  getRelationshipsByHead(id: string, edgeType?: EdgeType): Promise<Relationship[]>;
  /** Idempotent upsert keyed by entity id */
  storeEntities(batch: readonly Entity[]): Promise<void>;
  /** Idempotent upsert keyed by (headEntity, tailEntity, edgeType) */
  storeRelationships(batch: readonly Relationship[]): Promise<void>;
  healthCheck(): Promise<HealthStatus>;
}

/** Canonical spelling for an edge type, accepting any case and ` `, `_` or `-` separators. */
export function parseEdgeType(value: string): EdgeType | undefined {
  const compact = value.toLowerCase().replace(/[\s_-]+/g, '');
  return EDGE_TYPES.find(type => type.toLowerCase() === compact);
}

/** Trim, collapse inner whitespace and lowercase an entity or attribute id. */
export function normalizeId(id: string): string {
  return id.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function relationshipKey(rel: Pick<Relationship, 'headEntity' | 'tailEntity' | 'edgeType'>): string {
  return `${rel.headEntity}\u0000${rel.tailEntity}\u0000${rel.edgeType}`;
}
