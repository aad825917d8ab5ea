/**
 * Telemetry type definitions for @trustlens/runtime.
 *
 * @module
 */

/**
 * Metrics sink accepted by runtime components. Labels become part of the
 * series key.
 */
export interface MetricsProvider {
  counter(name: string, value?: number, labels?: Record<string, string>): void;
  histogram(name: string, value: number, labels?: Record<string, string>): void;
  gauge(name: string, value: number, labels?: Record<string, string>): void;
}

export interface HistogramEntry {
  value: number;
  timestamp: number;
  labels?: Record<string, string>;
}

/** Collected values keyed by composite key: "name|label=val" */
export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramEntry[]>;
  timestamp: number;
}

export interface MetricsCollectorConfig {
  /** Maximum histogram entries per series. Default: 10_000 */
  maxHistogramEntries?: number;
  now?: () => number;
}
