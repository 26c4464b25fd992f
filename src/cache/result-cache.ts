/**
 * Result Cache: bounded store of answered questions with per-entry TTL and
 * least-recently-used eviction. All operations are synchronous, so no other
 * task can interleave with a map update.
 */

import { createHash } from 'crypto';
import { getLogger } from '../core/logger.js';
import type { EventBus } from '../core/events.js';
import type { MetricsSink } from '../observability/metrics.js';
import { normalizeQuestion } from '../query/question.js';
import type { Question, QueryResult } from '../query/types.js';

const logger = getLogger().child({ component: 'result-cache' });

export interface CacheEntry {
  key: string;
  value: QueryResult;
  insertedAt: number;
  expiresAt: number;
  lastAccessed: number;
}

export interface ResultCacheOptions {
  /** Maximum entries before LRU eviction (default: 1000) */
  capacity?: number;
  /** TTL used when `put` is called without one (default: 5 minutes) */
  defaultTtlMs?: number;
  metrics?: MetricsSink;
  events?: EventBus;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRatio: number;
}

/** Anything that can drop cached answers after the graph changes. */
export interface CacheInvalidator {
  invalidateAll(): number;
}

/**
 * Deterministic key for a question: the normalized (type, subject, object)
 * triple hashed with sha256. Accepts raw input and normalizes it first.
 */
export function cacheKeyFor(question: Question | { type: string; subject: string; object: string }): string {
  const { type, subject, object } = normalizeQuestion(question);
  return createHash('sha256')
    .update(JSON.stringify([type, subject, object]))
    .digest('hex')
    .substring(0, 32);
}

export class ResultCache implements CacheInvalidator {
  // Map iteration order doubles as recency order: oldest first
  private entries = new Map<string, CacheEntry>();
  private readonly capacity: number;
  private readonly defaultTtlMs: number;
  private readonly metrics?: MetricsSink;
  private readonly events?: EventBus;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private epoch = 0;

  constructor(options: ResultCacheOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.defaultTtlMs = options.defaultTtlMs ?? 5 * 60 * 1000;
    this.metrics = options.metrics;
    this.events = options.events;
    if (this.capacity < 1) throw new Error('Cache capacity must be at least 1');
  }

  get(key: string): QueryResult | undefined {
    const entry = this.entries.get(key);
    const now = Date.now();

    if (!entry) {
      this.recordMiss();
      return undefined;
    }

    if (now >= entry.expiresAt) {
      this.entries.delete(key);
      this.recordEviction('ttl');
      this.recordMiss();
      return undefined;
    }

    entry.lastAccessed = now;
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    this.metrics?.increment('cache_hits_total');
    return entry.value;
  }

  put(key: string, value: QueryResult, ttlMs: number = this.defaultTtlMs): void {
    const now = Date.now();

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictLeastRecent();
    }

    this.entries.set(key, {
      key,
      value,
      insertedAt: now,
      expiresAt: now + ttlMs,
      lastAccessed: now,
    });
    this.updateSizeGauge();
  }

  /** Drop every entry. Returns how many were removed. */
  invalidateAll(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.afterInvalidation('all', removed);
    return removed;
  }

  /** Drop the given keys. Returns how many were present. */
  invalidate(keys: Iterable<string>): number {
    let removed = 0;
    for (const key of keys) {
      if (this.entries.delete(key)) removed++;
    }
    this.afterInvalidation('keys', removed);
    return removed;
  }

  /** Remove every expired entry without touching recency. */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        this.recordEviction('ttl');
        removed++;
      }
    }
    if (removed > 0) this.updateSizeGauge();
    return removed;
  }

  /** Entry metadata without refreshing recency; expired entries are reported as absent. */
  peek(key: string): Readonly<CacheEntry> | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() >= entry.expiresAt) return undefined;
    return entry;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Bumped by every invalidation. A caller that computes an answer across an
   * await reads it first and stores the answer only if it has not moved.
   */
  get generation(): number {
    return this.epoch;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRatio: lookups > 0 ? this.hits / lookups : 0,
    };
  }

  private evictLeastRecent(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.entries.delete(oldest.value);
    this.recordEviction('lru');
  }

  private recordMiss(): void {
    this.misses++;
    this.metrics?.increment('cache_misses_total');
  }

  private recordEviction(reason: 'lru' | 'ttl'): void {
    this.evictions++;
    this.metrics?.increment('cache_evictions_total', { reason });
    this.updateSizeGauge();
  }

  private afterInvalidation(scope: 'all' | 'keys', removed: number): void {
    this.epoch++;
    this.metrics?.increment('cache_invalidations_total', { scope });
    this.updateSizeGauge();
    this.events?.emit('cache:invalidated', { scope, removed });
    logger.debug({ scope, removed }, 'Cache invalidated');
  }

  private updateSizeGauge(): void {
    this.metrics?.gauge('cache_entries', this.entries.size);
  }
}
