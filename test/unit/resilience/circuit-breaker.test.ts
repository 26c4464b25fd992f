import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CircuitBreaker, CircuitState } from '../../../src/resilience/circuit-breaker.js';
import { BreakerOpenError, PermanentStorageError, TransientStorageError } from '../../../src/core/errors.js';
import { EventBus } from '../../../src/core/events.js';
import { InMemoryMetrics } from '../../../src/observability/metrics.js';
import { isBreakerFailure } from '../../../src/storage/guarded-store.js';

const boom = () => Promise.reject(new TransientStorageError('connection reset'));
const ok = () => Promise.resolve('ok');

async function failTimes(breaker: CircuitBreaker, times: number): Promise<void> {
  for (let i = 0; i < times; i++) {
    await expect(breaker.execute(boom)).rejects.toThrow('connection reset');
  }
}

describe('CircuitBreaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should pass calls through while closed', async () => {
    const breaker = new CircuitBreaker('test');
    await expect(breaker.execute(ok)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should open after the failure threshold and stop calling the backend', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 3 });
    await failTimes(breaker, 3);
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    const fn = vi.fn(ok);
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(BreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
    expect(breaker.getStats().rejectedCount).toBe(1);
  });

  it('should reset the streak on success', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 3 });
    await failTimes(breaker, 2);
    await breaker.execute(ok);
    await failTimes(breaker, 2);

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats().consecutiveFailures).toBe(2);
  });

  it('should not count failures the classifier rejects', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 2, isFailure: isBreakerFailure });
    for (let i = 0; i < 5; i++) {
      await expect(
        breaker.execute(() => Promise.reject(new PermanentStorageError('bad schema'))),
      ).rejects.toBeInstanceOf(PermanentStorageError);
    }

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats().consecutiveFailures).toBe(0);
    expect(breaker.getStats().failureCount).toBe(0);
  });

  it('should restart a streak older than the window', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 3, windowMs: 1000 });
    await failTimes(breaker, 2);
    vi.advanceTimersByTime(1001);
    await failTimes(breaker, 1);

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats().consecutiveFailures).toBe(1);

    await failTimes(breaker, 2);
    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('should admit a trial after the reset timeout and close on success', async () => {
    const events = new EventBus();
    const transitions: string[] = [];
    events.on('breaker:transition', e => transitions.push(e.to));
    const breaker = new CircuitBreaker('test', { failureThreshold: 1, resetTimeoutMs: 1000, events });

    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1000);
    await expect(breaker.execute(ok)).rejects.toBeInstanceOf(BreakerOpenError);

    vi.advanceTimersByTime(1);
    await expect(breaker.execute(ok)).resolves.toBe('ok');

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(transitions).toEqual(['OPEN', 'HALF_OPEN', 'CLOSED']);
    expect(breaker.getStats().openedAt).toBeNull();
  });

  it('should reopen with a fresh timeout when the trial fails', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 1, resetTimeoutMs: 1000 });
    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1001);
    await failTimes(breaker, 1);

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getStats().openedAt).toBe(Date.now());

    const rejection = await breaker.execute(ok).catch((e: unknown) => e);
    expect(rejection).toBeInstanceOf(BreakerOpenError);
    expect(rejection).toMatchObject({ remainingMs: 1000, breakerName: 'test' });
  });

  it('should reject other calls while the trial is in flight', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 1, resetTimeoutMs: 1000 });
    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1001);

    let finishTrial: (value: string) => void = () => undefined;
    const trial = breaker.execute(() => new Promise<string>(resolve => {
      finishTrial = resolve;
    }));
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    const second = vi.fn(ok);
    await expect(breaker.execute(second)).rejects.toBeInstanceOf(BreakerOpenError);
    expect(second).not.toHaveBeenCalled();

    finishTrial('recovered');
    await expect(trial).resolves.toBe('recovered');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should stay half-open when the trial fails with an uncounted error', async () => {
    const breaker = new CircuitBreaker('test', {
      failureThreshold: 1,
      resetTimeoutMs: 1000,
      isFailure: isBreakerFailure,
    });
    await failTimes(breaker, 1);
    vi.advanceTimersByTime(1001);

    await expect(
      breaker.execute(() => Promise.reject(new PermanentStorageError('bad row'))),
    ).rejects.toBeInstanceOf(PermanentStorageError);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await expect(breaker.execute(ok)).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('should report transitions to the metrics sink', async () => {
    const metrics = new InMemoryMetrics();
    const breaker = new CircuitBreaker('storage', { failureThreshold: 2, metrics });
    expect(metrics.gaugeValue('breaker_state', { breaker: 'storage' })).toBe(0);

    await failTimes(breaker, 2);

    expect(metrics.counter('breaker_transitions_total', { breaker: 'storage', to: 'OPEN' })).toBe(1);
    expect(metrics.gaugeValue('breaker_state', { breaker: 'storage' })).toBe(2);
  });

  it('should close and clear counters on reset', async () => {
    const breaker = new CircuitBreaker('test', { failureThreshold: 1 });
    await failTimes(breaker, 1);
    breaker.reset();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    expect(breaker.getStats()).toMatchObject({ consecutiveFailures: 0, openedAt: null });
    await expect(breaker.execute(ok)).resolves.toBe('ok');
  });
});
