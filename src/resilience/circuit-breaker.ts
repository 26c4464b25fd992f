/**
 * Circuit Breaker: fails fast while a backend is degrading and probes for recovery.
 * States: CLOSED (normal) → OPEN (blocking) → HALF_OPEN (single trial call).
 *
 * All state changes happen synchronously around the awaited call, so the
 * counters are never observed mid-update by another task.
 */

import { getLogger } from '../core/logger.js';
import { BreakerOpenError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import type { MetricsSink } from '../observability/metrics.js';

const logger = getLogger().child({ component: 'circuit-breaker' });

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const STATE_GAUGE: Record<CircuitState, number> = {
  [CircuitState.CLOSED]: 0,
  [CircuitState.HALF_OPEN]: 1,
  [CircuitState.OPEN]: 2,
};

export interface BreakerState {
  status: CircuitState;
  consecutiveFailures: number;
  /** Epoch ms of the last transition to OPEN; null while never opened or after recovery */
  openedAt: number | null;
}

export interface CircuitBreakerOptions {
  /** Consecutive counted failures before opening (default: 5) */
  failureThreshold?: number;
  /** Time in ms an OPEN breaker waits before admitting a trial call (default: 30000) */
  resetTimeoutMs?: number;
  /** A failure streak older than this restarts from one (default: 60000) */
  windowMs?: number;
  /** Which errors count toward the threshold (default: all) */
  isFailure?: (error: unknown) => boolean;
  metrics?: MetricsSink;
  events?: EventBus;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private streakStartedAt = 0;
  private openedAt: number | null = null;
  private successCount = 0;
  private failureCount = 0;
  private rejectedCount = 0;

  /** Identifies the admitted HALF_OPEN trial; 0 when none is in flight */
  private trialToken = 0;
  private trialStartedAt = 0;
  private nextToken = 1;

  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly windowMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly metrics?: MetricsSink;
  private readonly events?: EventBus;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {},
  ) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 30_000;
    this.windowMs = options.windowMs ?? 60_000;
    this.isFailure = options.isFailure ?? (() => true);
    this.metrics = options.metrics;
    this.events = options.events;
    this.metrics?.gauge('breaker_state', STATE_GAUGE[this.state], { breaker: name });
  }

  /**
   * Execute a function through the circuit breaker.
   * Throws BreakerOpenError without calling `fn` while the circuit is open.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const token = this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.onFailure(error, token);
      throw error;
    }
    this.onSuccess(token);
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): BreakerState & { successCount: number; failureCount: number; rejectedCount: number } {
    return {
      status: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      successCount: this.successCount,
      failureCount: this.failureCount,
      rejectedCount: this.rejectedCount,
    };
  }

  /**
   * Force the circuit back to CLOSED with clean counters.
   */
  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialToken = 0;
  }

  /** Returns the trial token when this call is the HALF_OPEN probe, else 0. */
  private admit(): number {
    const now = Date.now();

    if (this.state === CircuitState.OPEN) {
      const elapsed = now - (this.openedAt ?? now);
      if (elapsed <= this.resetTimeoutMs) {
        this.rejectedCount++;
        throw new BreakerOpenError(this.name, this.resetTimeoutMs - elapsed);
      }
      this.transitionTo(CircuitState.HALF_OPEN);
      return this.startTrial(now);
    }

    if (this.state === CircuitState.HALF_OPEN) {
      // A trial that has hung longer than the reset timeout is abandoned;
      // its eventual outcome is ignored and a fresh probe is admitted.
      if (this.trialToken !== 0 && now - this.trialStartedAt <= this.resetTimeoutMs) {
        this.rejectedCount++;
        throw new BreakerOpenError(this.name, 0);
      }
      return this.startTrial(now);
    }

    return 0;
  }

  private startTrial(now: number): number {
    this.trialToken = this.nextToken++;
    this.trialStartedAt = now;
    return this.trialToken;
  }

  private onSuccess(token: number): void {
    this.successCount++;

    if (token !== 0) {
      if (token !== this.trialToken) return;
      // Recovery confirmed: close the circuit
      this.trialToken = 0;
      this.consecutiveFailures = 0;
      this.openedAt = null;
      this.transitionTo(CircuitState.CLOSED);
    } else if (this.state === CircuitState.CLOSED) {
      this.consecutiveFailures = 0;
    }
  }

  private onFailure(error: unknown, token: number): void {
    const counted = this.isFailure(error);
    if (counted) this.failureCount++;

    if (token !== 0) {
      if (token !== this.trialToken) return;
      this.trialToken = 0;
      if (counted) {
        // Recovery failed: re-open with a fresh cooldown
        this.consecutiveFailures++;
        this.open();
      }
      return;
    }

    if (!counted) return;

    const now = Date.now();
    if (this.consecutiveFailures === 0 || now - this.streakStartedAt > this.windowMs) {
      this.consecutiveFailures = 1;
      this.streakStartedAt = now;
    } else {
      this.consecutiveFailures++;
    }

    if (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    this.openedAt = Date.now();
    this.transitionTo(CircuitState.OPEN);
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;

    const from = this.state;
    this.state = newState;
    logger.info(
      { breaker: this.name, from, to: newState, failures: this.consecutiveFailures },
      'Circuit breaker state transition',
    );
    this.metrics?.increment('breaker_transitions_total', { breaker: this.name, to: newState });
    this.metrics?.gauge('breaker_state', STATE_GAUGE[newState], { breaker: this.name });
    this.events?.emit('breaker:transition', {
      breaker: this.name,
      from,
      to: newState,
      consecutiveFailures: this.consecutiveFailures,
    });
  }
}
