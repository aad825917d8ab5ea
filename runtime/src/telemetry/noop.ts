/**
 * No-op metrics provider. Used when telemetry is not configured.
 *
 * @module
 */

import type { MetricsProvider } from "./types.js";

export class NoopMetricsProvider implements MetricsProvider {
  counter(
    _name: string,
    _value?: number,
    _labels?: Record<string, string>,
  ): void {}
  histogram(
    _name: string,
    _value: number,
    _labels?: Record<string, string>,
  ): void {}
  gauge(
    _name: string,
    _value: number,
    _labels?: Record<string, string>,
  ): void {}
}
