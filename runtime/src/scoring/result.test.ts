import { describe, it, expect } from 'vitest';
import { createTrustScoreResult, isTrustScoreResult } from './result.js';
import type { TrustScoreInput } from './types.js';

function input(overrides: Partial<TrustScoreInput> = {}): TrustScoreInput {
  return {
    finalScore: 72,
    preOverrideScore: 72,
    rawScore: 72,
    qualityPenalty: 0,
    subSignals: [],
    overridesApplied: [],
    overrideDetails: [],
    decisiveOverride: null,
    confidence: 0.8,
    siteType: 'general',
    explanation: '',
    ...overrides,
  };
}

describe('createTrustScoreResult', () => {
  it('derives the risk level from the final score', () => {
    expect(createTrustScoreResult(input({ finalScore: 90 })).riskLevel).toBe('TRUSTED');
    expect(createTrustScoreResult(input({ finalScore: 89 })).riskLevel).toBe('PROBABLY_SAFE');
  });

  it('rounds and clamps scores into [0, 100]', () => {
    expect(createTrustScoreResult(input({ finalScore: 140 })).finalScore).toBe(100);
    expect(createTrustScoreResult(input({ finalScore: -3 })).finalScore).toBe(0);
    expect(createTrustScoreResult(input({ finalScore: 41.6 })).finalScore).toBe(42);
    expect(createTrustScoreResult(input({ finalScore: Number.NaN })).finalScore).toBe(0);
  });

  it('returns a frozen value', () => {
    const result = createTrustScoreResult(input({ overridesApplied: ['no_ssl'] }));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.overridesApplied)).toBe(true);
  });

  it('recognizes built results only', () => {
    expect(isTrustScoreResult(createTrustScoreResult(input()))).toBe(true);
    expect(isTrustScoreResult({ ...createTrustScoreResult(input()) })).toBe(false);
    expect(isTrustScoreResult(Object.freeze({ ...input(), riskLevel: 'TRUSTED' }))).toBe(false);
    expect(isTrustScoreResult(null)).toBe(false);
  });
});
