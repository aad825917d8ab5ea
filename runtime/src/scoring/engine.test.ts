import { describe, it, expect } from 'vitest';
import { TrustScoreEngine } from './engine.js';
import { ConfigurationError } from '../types/errors.js';
import type { SubSignals } from './types.js';

const CLEAN: SubSignals = {
  visual: { score: 0.95, confidence: 0.85 },
  structural: { score: 0.9, confidence: 0.7 },
  temporal: { score: 1, confidence: 0.7 },
  graph: { score: 0.9, confidence: 0.6 },
  meta: { score: 1, confidence: 0.85 },
};

function uniform(score: number): SubSignals {
  return {
    visual: { score, confidence: 1 },
    structural: { score, confidence: 1 },
    temporal: { score, confidence: 1 },
    graph: { score, confidence: 1 },
    meta: { score, confidence: 1 },
  };
}

describe('TrustScoreEngine', () => {
  const engine = new TrustScoreEngine();

  it('scores clean evidence as trusted without overrides', () => {
    const result = engine.score(CLEAN, 'general');

    expect(result.finalScore).toBe(94);
    expect(result.preOverrideScore).toBe(94);
    expect(result.riskLevel).toBe('TRUSTED');
    expect(result.overridesApplied).toEqual([]);
    expect(result.decisiveOverride).toBeNull();
    expect(result.confidence).toBeCloseTo(0.725, 4);
  });

  it('drops an absent security signal and renormalizes the rest', () => {
    const result = engine.score(CLEAN, 'general');
    const names = result.subSignals.map((signal) => signal.name);
    expect(names).toEqual(['visual', 'structural', 'temporal', 'graph', 'meta']);
    const visual = result.subSignals.find((signal) => signal.name === 'visual');
    expect(visual?.weight).toBeCloseTo(0.25, 10);
    const total = result.subSignals.reduce((sum, signal) => sum + signal.weight, 0);
    expect(total).toBeCloseTo(1, 10);
  });

  it('uses all six weights when security is present', () => {
    const result = engine.score({ ...uniform(1), security: { score: 1, confidence: 1 } }, 'general');
    expect(result.subSignals).toHaveLength(6);
    expect(result.finalScore).toBe(100);
    expect(result.confidence).toBeCloseTo(1, 4);
  });

  it('scores a missing required signal as neutral with zero confidence', () => {
    const result = engine.score({ visual: { score: 0.9, confidence: 1 } }, 'general');
    expect(result.finalScore).toBe(60);
    expect(result.confidence).toBeCloseTo(0.25, 4);
    const graph = result.subSignals.find((signal) => signal.name === 'graph');
    expect(graph).toMatchObject({ score: 0.5, confidence: 0, present: false });
  });

  it('is non-decreasing in each sub-signal', () => {
    for (const name of ['visual', 'structural', 'temporal', 'graph', 'meta'] as const) {
      let previous = -1;
      for (let step = 0; step <= 10; step++) {
        const signals: SubSignals = { ...uniform(0.6), [name]: { score: step / 10, confidence: 1 } };
        const { finalScore, overridesApplied } = engine.score(signals, 'ecommerce');
        if (overridesApplied.length > 0) continue;
        expect(finalScore).toBeGreaterThanOrEqual(previous);
        previous = finalScore;
      }
    }
  });

  describe('overrides', () => {
    it('lets graph evidence cap a trusted-looking visual signal', () => {
      const result = engine.score({ ...uniform(1), graph: { score: 0.3, confidence: 0.9 } }, 'general');

      expect(result.preOverrideScore).toBe(78);
      expect(result.finalScore).toBe(69);
      expect(result.riskLevel).toBe('SUSPICIOUS');
      expect(result.overridesApplied).toEqual(['graph_overrides_vision']);
      expect(result.decisiveOverride).toBe('graph_overrides_vision');
    });

    it('fires graph_overrides_vision on a contradiction even with a high graph score', () => {
      const result = engine.score(
        { ...uniform(1), graph: { score: 0.9, confidence: 0.9 } },
        'general',
        { graphContradiction: true },
      );
      expect(result.preOverrideScore).toBe(97);
      expect(result.finalScore).toBe(69);
    });

    it('records every fired rule and keeps the most severe', () => {
      const result = engine.score(uniform(1), 'general', {
        hasSsl: false,
        fakeTimerDetected: true,
        isBlacklisted: true,
      });

      expect(result.overridesApplied).toEqual(['domain_blacklisted', 'no_ssl', 'fake_timer_detected']);
      expect(result.overrideDetails.map((detail) => detail.candidateScore)).toEqual([15, 50, 75]);
      expect(result.decisiveOverride).toBe('domain_blacklisted');
      expect(result.finalScore).toBe(15);
      expect(result.riskLevel).toBe('DANGEROUS');
    });

    it('evaluates deductions against the pre-override score', () => {
      const result = engine.score(uniform(1), 'general', {
        fakeTimerDetected: true,
        badgesDisplayed: 3,
        badgesVerified: 0,
      });
      expect(result.overrideDetails.map((detail) => detail.candidateScore)).toEqual([75, 85]);
      expect(result.finalScore).toBe(75);
      expect(result.decisiveOverride).toBe('fake_timer_detected');
    });

    it('never deducts below zero', () => {
      const result = engine.score(uniform(0.1), 'general', { fakeTimerDetected: true });
      expect(result.preOverrideScore).toBe(10);
      expect(result.finalScore).toBe(0);
    });

    it('forces a confirmed critical indicator to high risk', () => {
      const result = engine.score(uniform(1), 'general', { criticalIndicator: true });
      expect(result.finalScore).toBe(39);
      expect(result.riskLevel).toBe('HIGH_RISK');
    });

    it('distinguishes an invalid certificate from missing TLS', () => {
      expect(engine.score(uniform(1), 'general', { hasSsl: true, sslValid: false }).overridesApplied).toEqual([
        'invalid_ssl',
      ]);
      expect(engine.score(uniform(1), 'general', { hasSsl: false, sslValid: false }).overridesApplied).toEqual([
        'no_ssl',
      ]);
    });

    it('forces new domains with weak graph evidence below 30', () => {
      const result = engine.score({ ...uniform(1), graph: { score: 0.2, confidence: 0.5 } }, 'general', {
        domainAgeDays: 3,
      });
      expect(result.overridesApplied).toEqual(['new_domain_low_graph', 'graph_overrides_vision']);
      expect(result.finalScore).toBe(30);
    });

    it('applies paranoia rules only to the high-risk profile', () => {
      const paranoid = engine.score(uniform(1), 'darknet_suspicious', { hasSsl: false });
      expect(paranoid.overridesApplied).toEqual(['paranoia_no_ssl', 'no_ssl']);
      expect(paranoid.decisiveOverride).toBe('paranoia_no_ssl');
      expect(paranoid.finalScore).toBe(25);

      const regular = engine.score(uniform(1), 'general', { hasSsl: false });
      expect(regular.overridesApplied).toEqual(['no_ssl']);
      expect(regular.finalScore).toBe(50);
    });
  });

  it('merges configured weight overrides onto the profile', () => {
    const tuned = new TrustScoreEngine({ weightOverrides: { general: { meta: 0 } } });
    const result = tuned.score(CLEAN, 'general');
    expect(result.subSignals.find((signal) => signal.name === 'meta')?.weight).toBe(0);
    const visual = result.subSignals.find((signal) => signal.name === 'visual');
    expect(visual?.weight).toBeCloseTo(0.2 / 0.7, 10);
  });

  it('rejects an invalid weight override', () => {
    const broken = new TrustScoreEngine({ weightOverrides: { general: { visual: Number.NaN } } });
    expect(() => broken.score(CLEAN, 'general')).toThrow(ConfigurationError);
  });
});
