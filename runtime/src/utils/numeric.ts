/**
 * Numeric clamping and guard utilities.
 *
 * Scoring code runs every agent-supplied number through these before it
 * enters a weighted sum, so NaN and Infinity never reach a score.
 *
 * @module
 */

/** Clamp a number to [0, 1]. Non-finite values resolve to 0. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/** Clamp to [min, max]. Non-finite values resolve to `min`. */
export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/** Clamp an optional ratio to [0, 1], returning `fallback` for undefined / non-finite. */
export function clampRatio(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return clamp01(value);
}

/** Normalize a non-negative count against a ceiling, saturating at 1. */
export function saturate(value: number | undefined, ceiling: number): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) return 0;
  return Math.min(value / ceiling, 1);
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Arithmetic mean; 0 for an empty list. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}
