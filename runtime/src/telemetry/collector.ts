/**
 * In-memory metrics collection.
 *
 * Labels are stored via composite keys: "name|k1=v1|k2=v2" (sorted keys).
 *
 * @module
 */

import type {
  HistogramEntry,
  MetricsCollectorConfig,
  MetricsProvider,
  MetricsSnapshot,
} from './types.js';

const DEFAULT_MAX_HISTOGRAM_ENTRIES = 10_000;

/**
 * Build a composite key from metric name and optional labels.
 * Labels are sorted by key for deterministic ordering.
 *
 * Examples:
 *   buildKey("a.b") → "a.b"
 *   buildKey("a.b", { agent: "vision", reason: "timeout" }) → "a.b|agent=vision|reason=timeout"
 */
export function buildKey(name: string, labels?: Record<string, string>): string {
  if (!labels || Object.keys(labels).length === 0) return name;
  const sorted = Object.keys(labels).sort();
  const parts = sorted.map((k) => `${k}=${labels[k]}`);
  return `${name}|${parts.join('|')}`;
}

/**
 * Counters, gauges and FIFO-bounded histograms held in memory.
 */
export class InMemoryMetricsCollector implements MetricsProvider {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramEntry[]>();
  private readonly maxHistogramEntries: number;
  private readonly now: () => number;

  constructor(config: MetricsCollectorConfig = {}) {
    this.maxHistogramEntries = config.maxHistogramEntries ?? DEFAULT_MAX_HISTOGRAM_ENTRIES;
    this.now = config.now ?? Date.now;
  }

  counter(name: string, value = 1, labels?: Record<string, string>): void {
    const key = buildKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  histogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = buildKey(name, labels);
    let entries = this.histograms.get(key);
    if (!entries) {
      entries = [];
      this.histograms.set(key, entries);
    }
    entries.push({ value, timestamp: this.now(), labels });
    // FIFO eviction
    while (entries.length > this.maxHistogramEntries) {
      entries.shift();
    }
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    this.gauges.set(buildKey(name, labels), value);
  }

  getSnapshot(): MetricsSnapshot {
    const histograms: Record<string, HistogramEntry[]> = {};
    for (const [key, entries] of this.histograms) {
      histograms[key] = [...entries];
    }
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
      timestamp: this.now(),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
  }
}
