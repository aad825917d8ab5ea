/**
 * Score to risk level mapping.
 *
 * @module
 */

import type { RiskLevel } from './types.js';

/** Lower bound of each level, most trusted first. */
export const RISK_LEVEL_THRESHOLDS: ReadonlyArray<readonly [RiskLevel, number]> = [
  ['TRUSTED', 90],
  ['PROBABLY_SAFE', 70],
  ['SUSPICIOUS', 40],
  ['HIGH_RISK', 20],
  ['DANGEROUS', 0],
];

export function riskLevelFor(score: number): RiskLevel {
  for (const [level, lowerBound] of RISK_LEVEL_THRESHOLDS) {
    if (score >= lowerBound) return level;
  }
  return 'DANGEROUS';
}

/** 0 for TRUSTED up to 4 for DANGEROUS. */
export function riskSeverity(level: RiskLevel): number {
  return RISK_LEVEL_THRESHOLDS.findIndex(([candidate]) => candidate === level);
}
