/**
 * Scaling of a trust score by accumulated degradation penalties.
 *
 * @module
 */

import { createTrustScoreResult } from '../scoring/result.js';
import type { TrustScoreResult } from '../scoring/types.js';
import { roundTo } from '../utils/numeric.js';

/** Upper bound of the summed penalty. */
export const MAX_TOTAL_PENALTY = 0.9;

/** Lowest score a degraded audit can be pushed down to. */
export const DEFAULT_PENALTY_FLOOR = 1;

/** Sum of stage penalties, capped at {@link MAX_TOTAL_PENALTY}. */
export function totalPenalty(penalties: readonly number[]): number {
  let sum = 0;
  for (const penalty of penalties) {
    if (Number.isFinite(penalty) && penalty > 0) sum += penalty;
  }
  return roundTo(Math.min(MAX_TOTAL_PENALTY, sum), 4);
}

/**
 * `final = round(raw × (1 − penalty))`, never below `min(raw, floor)`.
 *
 * `raw` is the post-override score of `result`. The returned result keeps it
 * as `rawScore`, and its risk level follows the penalized score.
 */
export function applyQualityPenalty(
  result: TrustScoreResult,
  penalties: readonly number[],
  floor: number = DEFAULT_PENALTY_FLOOR,
): TrustScoreResult {
  const penalty = totalPenalty(penalties);
  if (penalty === 0) return result;

  const raw = result.finalScore;
  const adjusted = Math.round(raw * (1 - penalty));
  const finalScore = Math.max(Math.min(raw, floor), adjusted);
  return createTrustScoreResult({
    ...result,
    finalScore,
    rawScore: raw,
    qualityPenalty: penalty,
    explanation: `${result.explanation} Degraded evidence: score ${raw} scaled by ${roundTo(1 - penalty, 4)} to ${finalScore}.`,
  });
}
