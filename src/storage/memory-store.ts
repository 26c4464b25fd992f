import { getLogger } from '../core/logger.js';
import {
  relationshipKey,
  type EdgeType,
  type Entity,
  type HealthStatus,
  type Relationship,
  type StoragePort,
} from './types.js';

const logger = getLogger().child({ component: 'memory-store' });

/**
 * InMemoryStorage: process-local StoragePort for development, tests and the CLI.
 * Relationships are indexed by head entity; each head keeps one edge per
 * (tail, edgeType) pair so repeated writes replace rather than accumulate.
 */
export class InMemoryStorage implements StoragePort {
  private entities = new Map<string, Entity>();
  private byHead = new Map<string, Map<string, Relationship>>();
  /** Ids registered only as relationship endpoints, awaiting a real entity record */
  private placeholders = new Set<string>();

  async getEntity(id: string): Promise<Entity | undefined> {
    const entity = this.entities.get(id);
    return entity ? cloneEntity(entity) : undefined;
  }

  async getRelationshipsByHead(id: string, edgeType?: EdgeType): Promise<Relationship[]> {
    const edges = this.byHead.get(id);
    if (!edges) return [];

    const result: Relationship[] = [];
    for (const rel of edges.values()) {
      if (edgeType === undefined || rel.edgeType === edgeType) {
        result.push({ ...rel });
      }
    }
    return result;
  }

  async storeEntities(batch: readonly Entity[]): Promise<void> {
    let created = 0;
    for (const entity of batch) {
      const existing = this.entities.get(entity.id);
      if (!existing) {
        this.entities.set(entity.id, cloneEntity(entity));
        created++;
        continue;
      }
      if (this.placeholders.delete(entity.id)) {
        existing.name = entity.name;
      }
      // name and createdAt are fixed by the first write; metadata merges last-write-wins
      if (entity.metadata) {
        existing.metadata = { ...existing.metadata, ...entity.metadata };
      }
    }
    logger.debug({ received: batch.length, created }, 'Stored entities');
  }

  async storeRelationships(batch: readonly Relationship[]): Promise<void> {
    let replaced = 0;
    const now = Date.now();

    for (const rel of batch) {
      this.ensureEntity(rel.headEntity, now);
      this.ensureEntity(rel.tailEntity, now);

      let edges = this.byHead.get(rel.headEntity);
      if (!edges) {
        edges = new Map();
        this.byHead.set(rel.headEntity, edges);
      }
      const key = relationshipKey(rel);
      if (edges.has(key)) replaced++;
      edges.set(key, { ...rel });
    }
    logger.debug({ received: batch.length, replaced }, 'Stored relationships');
  }

  async healthCheck(): Promise<HealthStatus> {
    return 'healthy';
  }

  get entityCount(): number {
    return this.entities.size;
  }

  get relationshipCount(): number {
    let total = 0;
    for (const edges of this.byHead.values()) total += edges.size;
    return total;
  }

  private ensureEntity(id: string, now: number): void {
    if (!this.entities.has(id)) {
      this.entities.set(id, { id, name: id, createdAt: now });
      this.placeholders.add(id);
    }
  }
}

function cloneEntity(entity: Entity): Entity {
  return entity.metadata ? { ...entity, metadata: { ...entity.metadata } } : { ...entity };
}
