/**
 * Telemetry module.
 *
 * @module
 */

export type {
  MetricsProvider,
  MetricsSnapshot,
  HistogramEntry,
  MetricsCollectorConfig,
} from './types.js';
export { InMemoryMetricsCollector, buildKey } from './collector.js';
export { NoopMetricsProvider } from './noop.js';
export { TELEMETRY_METRIC_NAMES } from './metric-names.js';
