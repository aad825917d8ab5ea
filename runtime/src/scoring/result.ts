/**
 * Construction and recognition of frozen {@link TrustScoreResult} values.
 *
 * @module
 */

import { clamp, clamp01 } from '../utils/numeric.js';
import { isRecord } from '../utils/type-guards.js';
import { riskLevelFor } from './risk-level.js';
import type { TrustScoreInput, TrustScoreResult } from './types.js';

function toScore(value: number): number {
  return Number.isFinite(value) ? Math.round(clamp(value, 0, 100)) : 0;
}

/**
 * Build a result with `riskLevel` derived from the final score. The returned
 * value and its arrays are frozen.
 */
export function createTrustScoreResult(input: TrustScoreInput): TrustScoreResult {
  const finalScore = toScore(input.finalScore);
  return Object.freeze({
    ...input,
    finalScore,
    riskLevel: riskLevelFor(finalScore),
    preOverrideScore: toScore(input.preOverrideScore),
    rawScore: toScore(input.rawScore),
    qualityPenalty: clamp01(input.qualityPenalty),
    confidence: clamp01(input.confidence),
    subSignals: Object.freeze(input.subSignals.map((signal) => Object.freeze({ ...signal }))),
    overridesApplied: Object.freeze([...input.overridesApplied]),
    overrideDetails: Object.freeze(input.overrideDetails.map((detail) => Object.freeze({ ...detail }))),
  });
}

/** True for values produced by {@link createTrustScoreResult}. */
export function isTrustScoreResult(value: unknown): value is TrustScoreResult {
  return (
    isRecord(value) &&
    Object.isFrozen(value) &&
    typeof value.finalScore === 'number' &&
    Number.isInteger(value.finalScore) &&
    value.riskLevel === riskLevelFor(value.finalScore) &&
    typeof value.confidence === 'number' &&
    Array.isArray(value.subSignals) &&
    Array.isArray(value.overridesApplied)
  );
}
