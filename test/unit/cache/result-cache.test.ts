import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResultCache, cacheKeyFor } from '../../../src/cache/result-cache.js';
import { EventBus } from '../../../src/core/events.js';
import { InMemoryMetrics } from '../../../src/observability/metrics.js';
import { ValidationError } from '../../../src/core/errors.js';
import { Outcome, type QueryResult } from '../../../src/query/types.js';

function result(confidence: number): QueryResult {
  return {
    outcome: Outcome.YES,
    confidence,
    path: [],
    entitiesVisited: 1,
    maxDepthExceeded: false,
    cacheHit: false,
    elapsedMs: 3,
  };
}

describe('cacheKeyFor', () => {
  it('should produce the same key for equivalent spellings', () => {
    const a = cacheKeyFor({ type: 'SubclassOf', subject: 'Dog', object: 'Animal' });
    const b = cacheKeyFor({ type: 'subclass_of', subject: '  dog ', object: 'ANIMAL' });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{32}$/);
  });

  it('should distinguish question types and argument order', () => {
    const base = cacheKeyFor({ type: 'SubclassOf', subject: 'dog', object: 'animal' });
    expect(cacheKeyFor({ type: 'InstanceOf', subject: 'dog', object: 'animal' })).not.toBe(base);
    expect(cacheKeyFor({ type: 'SubclassOf', subject: 'animal', object: 'dog' })).not.toBe(base);
  });

  it('should reject malformed questions', () => {
    expect(() => cacheKeyFor({ type: 'PartOf', subject: 'a', object: 'b' })).toThrow(ValidationError);
  });
});

describe('ResultCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return stored values and count hits and misses', () => {
    const cache = new ResultCache();
    expect(cache.get('k')).toBeUndefined();
    cache.put('k', result(0.5));

    expect(cache.get('k')).toEqual(result(0.5));
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, size: 1, hitRatio: 0.5 });
  });

  it('should expire entries at their TTL', () => {
    const cache = new ResultCache({ defaultTtlMs: 1000 });
    cache.put('k', result(0.5));

    vi.advanceTimersByTime(999);
    expect(cache.get('k')).toBeDefined();

    vi.advanceTimersByTime(1);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(cache.stats().evictions).toBe(1);
  });

  it('should honour a per-entry TTL', () => {
    const cache = new ResultCache({ defaultTtlMs: 60_000 });
    cache.put('short', result(0.1), 100);
    cache.put('long', result(0.2));

    vi.advanceTimersByTime(100);
    expect(cache.get('short')).toBeUndefined();
    expect(cache.get('long')).toBeDefined();
  });

  it('should evict the least recently used entry at capacity', () => {
    const metrics = new InMemoryMetrics();
    const cache = new ResultCache({ capacity: 2, metrics });
    cache.put('a', result(0.1));
    cache.put('b', result(0.2));
    cache.get('a');
    cache.put('c', result(0.3));

    expect(cache.peek('b')).toBeUndefined();
    expect(cache.peek('a')).toBeDefined();
    expect(cache.peek('c')).toBeDefined();
    expect(metrics.counter('cache_evictions_total', { reason: 'lru' })).toBe(1);
    expect(metrics.gaugeValue('cache_entries')).toBe(2);
  });

  it('should not evict when overwriting an existing key', () => {
    const cache = new ResultCache({ capacity: 2 });
    cache.put('a', result(0.1));
    cache.put('b', result(0.2));
    cache.put('a', result(0.9));

    expect(cache.size).toBe(2);
    expect(cache.get('a')?.confidence).toBe(0.9);
    expect(cache.stats().evictions).toBe(0);
  });

  it('should clear everything on invalidateAll and announce it', () => {
    const events = new EventBus();
    const seen: Array<{ scope: string; removed: number }> = [];
    events.on('cache:invalidated', e => seen.push(e));
    const cache = new ResultCache({ events });
    cache.put('a', result(0.1));
    cache.put('b', result(0.2));

    expect(cache.invalidateAll()).toBe(2);
    expect(cache.size).toBe(0);
    expect(seen).toEqual([{ scope: 'all', removed: 2 }]);
  });

  it('should drop only the named keys on invalidate', () => {
    const cache = new ResultCache();
    cache.put('a', result(0.1));
    cache.put('b', result(0.2));

    expect(cache.invalidate(['a', 'missing'])).toBe(1);
    expect(cache.peek('a')).toBeUndefined();
    expect(cache.peek('b')).toBeDefined();
  });

  it('should advance the generation on every invalidation but not on writes', () => {
    const cache = new ResultCache();
    expect(cache.generation).toBe(0);

    cache.put('a', result(0.1));
    expect(cache.generation).toBe(0);

    cache.invalidateAll();
    cache.invalidate(['missing']);
    expect(cache.generation).toBe(2);
  });

  it('should prune expired entries without a lookup', () => {
    const cache = new ResultCache({ defaultTtlMs: 1000 });
    cache.put('old', result(0.1));
    vi.advanceTimersByTime(500);
    cache.put('new', result(0.2));
    vi.advanceTimersByTime(500);

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.stats().misses).toBe(0);
  });

  it('should not refresh recency on peek', () => {
    const cache = new ResultCache({ capacity: 2 });
    cache.put('a', result(0.1));
    cache.put('b', result(0.2));
    cache.peek('a');
    cache.put('c', result(0.3));

    expect(cache.peek('a')).toBeUndefined();
  });
});
