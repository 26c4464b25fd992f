/**
 * Metrics: the emission contract every component reports through, plus
 * an in-process collector used for tests, the CLI and health snapshots.
 */

import { getLogger } from '../core/logger.js';

const logger = getLogger().child({ component: 'metrics' });

export type MetricLabels = Record<string, string>;

/**
 * Sink for counters, histograms and gauges. Implementations must never
 * block or throw; wrap untrusted sinks with {@link safeMetrics}.
 */
export interface MetricsSink {
  increment(name: string, labels?: MetricLabels, by?: number): void;
  observe(name: string, value: number, labels?: MetricLabels): void;
  gauge(name: string, value: number, labels?: MetricLabels): void;
}

export interface HistogramSnapshot {
  count: number;
  sum: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSnapshot>;
}

export class NoopMetrics implements MetricsSink {
  increment(): void {}
  observe(): void {}
  gauge(): void {}
}

interface Histogram {
  count: number;
  sum: number;
  min: number;
  max: number;
  samples: number[];
}

/**
 * InMemoryMetrics keeps counters and gauges keyed by name and label set.
 * Histograms retain the most recent `maxSamples` observations for percentiles.
 */
export class InMemoryMetrics implements MetricsSink {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private histograms = new Map<string, Histogram>();
  private maxSamples: number;

  constructor(maxSamples = 1000) {
    this.maxSamples = maxSamples;
  }

  increment(name: string, labels?: MetricLabels, by = 1): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  observe(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    let hist = this.histograms.get(key);
    if (!hist) {
      hist = { count: 0, sum: 0, min: value, max: value, samples: [] };
      this.histograms.set(key, hist);
    }
    hist.count++;
    hist.sum += value;
    hist.min = Math.min(hist.min, value);
    hist.max = Math.max(hist.max, value);
    hist.samples.push(value);
    if (hist.samples.length > this.maxSamples) {
      hist.samples.shift();
    }
  }

  gauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  /** Counter value for an exact name and label set (0 when never incremented). */
  counter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  /** Sum of a counter across every label set. */
  counterTotal(name: string): number {
    let total = 0;
    for (const [key, value] of this.counters) {
      if (key === name || key.startsWith(`${name}{`)) total += value;
    }
    return total;
  }

  gaugeValue(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }

  histogram(name: string, labels?: MetricLabels): HistogramSnapshot | undefined {
    const hist = this.histograms.get(seriesKey(name, labels));
    return hist ? summarize(hist) : undefined;
  }

  snapshot(): MetricsSnapshot {
    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [key, hist] of this.histograms) {
      histograms[key] = summarize(hist);
    }
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
    };
  }

  clear(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}

/**
 * Wrap a sink so that a failing backend never reaches the caller.
 */
export function safeMetrics(sink: MetricsSink): MetricsSink {
  const guard = (op: string, name: string, fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      logger.debug({ op, metric: name, err }, 'Metrics sink failed; emission dropped');
    }
  };

  return {
    increment: (name, labels, by) => guard('increment', name, () => sink.increment(name, labels, by)),
    observe: (name, value, labels) => guard('observe', name, () => sink.observe(name, value, labels)),
    gauge: (name, value, labels) => guard('gauge', name, () => sink.gauge(name, value, labels)),
  };
}

/** `name{a="1",b="2"}` with labels sorted so the key is order-independent. */
export function seriesKey(name: string, labels?: MetricLabels): string {
  if (!labels) return name;
  const keys = Object.keys(labels).sort();
  if (keys.length === 0) return name;
  return `${name}{${keys.map(k => `${k}="${labels[k]}"`).join(',')}}`;
}

function summarize(hist: Histogram): HistogramSnapshot {
  const sorted = [...hist.samples].sort((a, b) => a - b);
  return {
    count: hist.count,
    sum: hist.sum,
    min: hist.min,
    max: hist.max,
    p50: percentile(sorted, 0.5),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
  };
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(sorted.length * p) - 1;
  return sorted[Math.max(0, Math.min(idx, sorted.length - 1))];
}
