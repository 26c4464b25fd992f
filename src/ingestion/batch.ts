import { relationshipKey, type Entity, type Relationship } from '../storage/types.js';
import type { ParsedRecord } from './records.js';

export interface Batch {
  id: string;
  entities: Entity[];
  relationships: Relationship[];
  /** Records merged into an earlier record of the same key */
  duplicates: number;
}

/**
 * Identity a record is deduplicated under. The pipeline routes by it, so
 * every occurrence of a key reaches the same worker in source order.
 */
export function dedupKey(record: ParsedRecord): string {
  return record.kind === 'entity'
    ? `entity:${record.entity.id}`
    : `relationship:${relationshipKey(record.relationship)}`;
}

/**
 * Collects validated records for one worker, deduplicating by entity id and by
 * (head, tail, edgeType). The last occurrence of a key replaces earlier ones.
 */
export class BatchAccumulator {
  private entities = new Map<string, Entity>();
  private relationships = new Map<string, Relationship>();
  private duplicates = 0;
  private startedAt: number | null = null;

  add(record: ParsedRecord, now: number = Date.now()): void {
    if (this.startedAt === null) this.startedAt = now;

    const key = dedupKey(record);
    if (record.kind === 'entity') {
      if (this.entities.has(key)) this.duplicates++;
      this.entities.set(key, { ...record.entity, createdAt: now });
    } else {
      if (this.relationships.has(key)) this.duplicates++;
      this.relationships.set(key, { ...record.relationship });
    }
  }

  /** Distinct records currently held */
  get size(): number {
    return this.entities.size + this.relationships.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /** Epoch ms of the first record in the current batch, or null when empty */
  get openedAt(): number | null {
    return this.startedAt;
  }

  /** Hand over the accumulated batch and start a new one. */
  drain(id: string): Batch {
    const batch: Batch = {
      id,
      entities: [...this.entities.values()],
      relationships: [...this.relationships.values()],
      duplicates: this.duplicates,
    };
    this.entities = new Map();
    this.relationships = new Map();
    this.duplicates = 0;
    this.startedAt = null;
    return batch;
  }
}
