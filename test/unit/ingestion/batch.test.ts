import { describe, it, expect } from 'vitest';
import { BatchAccumulator } from '../../../src/ingestion/batch.js';
import { EdgeType } from '../../../src/storage/types.js';

const rel = (head: string, tail: string, confidence: number) => ({
  kind: 'relationship' as const,
  relationship: { headEntity: head, tailEntity: tail, edgeType: EdgeType.SubclassOf, confidence },
});

describe('BatchAccumulator', () => {
  it('should start empty with no open time', () => {
    const batch = new BatchAccumulator();
    expect(batch.isEmpty).toBe(true);
    expect(batch.openedAt).toBeNull();
  });

  it('should keep the last occurrence of a duplicate relationship', () => {
    const batch = new BatchAccumulator();
    batch.add(rel('dog', 'animal', 0.4), 100);
    batch.add(rel('cat', 'animal', 1), 110);
    batch.add(rel('dog', 'animal', 0.9), 120);

    expect(batch.size).toBe(2);
    expect(batch.openedAt).toBe(100);

    const drained = batch.drain('b1');
    expect(drained.duplicates).toBe(1);
    expect(drained.relationships).toEqual([
      { headEntity: 'dog', tailEntity: 'animal', edgeType: EdgeType.SubclassOf, confidence: 0.9 },
      { headEntity: 'cat', tailEntity: 'animal', edgeType: EdgeType.SubclassOf, confidence: 1 },
    ]);
  });

  it('should stamp entities with the time they were added', () => {
    const batch = new BatchAccumulator();
    batch.add({ kind: 'entity', entity: { id: 'dog', name: 'Dog' } }, 500);
    batch.add({ kind: 'entity', entity: { id: 'dog', name: 'Doggo' } }, 600);

    const drained = batch.drain('b2');
    expect(drained.entities).toEqual([{ id: 'dog', name: 'Doggo', createdAt: 600 }]);
    expect(drained.duplicates).toBe(1);
  });

  it('should treat different edge types between the same pair as distinct', () => {
    const batch = new BatchAccumulator();
    batch.add(rel('fido', 'dog', 1));
    batch.add({
      kind: 'relationship',
      relationship: { headEntity: 'fido', tailEntity: 'dog', edgeType: EdgeType.InstanceOf, confidence: 1 },
    });
    expect(batch.size).toBe(2);
  });

  it('should reset after drain', () => {
    const batch = new BatchAccumulator();
    batch.add(rel('a', 'b', 1), 10);
    const drained = batch.drain('b3');

    expect(drained.id).toBe('b3');
    expect(batch.isEmpty).toBe(true);
    expect(batch.openedAt).toBeNull();
    expect(batch.drain('b4')).toEqual({ id: 'b4', entities: [], relationships: [], duplicates: 0 });
  });
});
