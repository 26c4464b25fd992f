import { describe, it, expect } from 'vitest';
import { bestPath, comparePaths, extendPath, startPath } from '../../../src/query/path.js';
import { edge } from '../../helpers/graph.js';

describe('ScoredPath', () => {
  it('should start empty with full confidence', () => {
    expect(startPath('a')).toEqual({ id: 'a', edges: [], confidence: 1, ids: ['a'] });
  });

  it('should multiply confidence and record ids when extended', () => {
    const path = extendPath(extendPath(startPath('a'), edge('a', 'SubclassOf', 'b', 0.5)), edge('b', 'SubclassOf', 'c', 0.5));
    expect(path.id).toBe('c');
    expect(path.confidence).toBe(0.25);
    expect(path.ids).toEqual(['a', 'b', 'c']);
    expect(path.edges).toHaveLength(2);
  });

  it('should not mutate the path it extends', () => {
    const root = startPath('a');
    extendPath(root, edge('a', 'SubclassOf', 'b', 0.5));
    expect(root.edges).toEqual([]);
    expect(root.ids).toEqual(['a']);
  });
});

describe('comparePaths', () => {
  const a = startPath('a');

  it('should prefer higher confidence', () => {
    const strong = extendPath(a, edge('a', 'SubclassOf', 'z', 0.9));
    const weak = extendPath(a, edge('a', 'SubclassOf', 'b', 0.4));
    expect(comparePaths(strong, weak)).toBeLessThan(0);
    expect(comparePaths(weak, strong)).toBeGreaterThan(0);
  });

  it('should prefer fewer edges at equal confidence', () => {
    const short = extendPath(a, edge('a', 'SubclassOf', 'z', 1));
    const long = extendPath(extendPath(a, edge('a', 'SubclassOf', 'b', 1)), edge('b', 'SubclassOf', 'z', 1));
    expect(comparePaths(short, long)).toBeLessThan(0);
  });

  it('should fall back to the id sequence', () => {
    const viaB = extendPath(a, edge('a', 'SubclassOf', 'b', 0.5));
    const viaC = extendPath(a, edge('a', 'SubclassOf', 'c', 0.5));
    expect(comparePaths(viaB, viaC)).toBeLessThan(0);
    expect(comparePaths(viaB, viaB)).toBe(0);
  });
});

describe('bestPath', () => {
  it('should return undefined for no candidates', () => {
    expect(bestPath([])).toBeUndefined();
  });

  it('should pick the winner regardless of input order', () => {
    const a = startPath('a');
    const candidates = [
      extendPath(a, edge('a', 'SubclassOf', 'c', 0.5)),
      extendPath(a, edge('a', 'SubclassOf', 'b', 0.5)),
      extendPath(a, edge('a', 'SubclassOf', 'd', 0.2)),
    ];
    expect(bestPath(candidates)?.id).toBe('b');
    expect(bestPath([...candidates].reverse())?.id).toBe('b');
  });
});
