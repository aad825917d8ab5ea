/**
 * Shared validation helpers for accumulate-errors validators.
 *
 * Each check pushes onto a shared error array so a config file with several
 * problems is reported in one pass.
 *
 * @module
 */

import { isRecord } from "./type-guards.js";

// ============================================================================
// Result type
// ============================================================================

/** Outcome of an accumulate-errors validation pass. */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Build a {@link ValidationResult} from an error list. */
export function validationResult(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

// ============================================================================
// Field checks
// ============================================================================

/** Push an error if `value` is not a finite number. */
export function requireFiniteNumber(
  value: unknown,
  field: string,
  errors: string[],
): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    errors.push(`${field} must be a finite number`);
  }
}

/** Push an error if `value` is not a finite number in [min, max]. */
export function requireNumberRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
  errors: string[],
): void {
  if (
    typeof value !== "number" ||
    !Number.isFinite(value) ||
    value < min ||
    value > max
  ) {
    errors.push(`${field} must be a number between ${min} and ${max}`);
  }
}

/** Push an error if `value` is not one of the allowed strings. */
export function requireOneOf(
  value: unknown,
  field: string,
  allowed: ReadonlySet<string>,
  errors: string[],
): void {
  if (typeof value !== "string" || !allowed.has(value)) {
    errors.push(`${field} must be one of: ${[...allowed].join(", ")}`);
  }
}

/** Push an error if `value` is not an integer in [min, max]. */
export function requireIntRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
  errors: string[],
): void {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    errors.push(`${field} must be an integer between ${min} and ${max}`);
  }
}

/**
 * Push an error if `value` is not a plain object. Returns the narrowed record
 * so nested checks can continue, or `null` when the section is unusable.
 */
export function requireRecord(
  value: unknown,
  field: string,
  errors: string[],
): Record<string, unknown> | null {
  if (!isRecord(value)) {
    errors.push(`${field} must be an object`);
    return null;
  }
  return value;
}
