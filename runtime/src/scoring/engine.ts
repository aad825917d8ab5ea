/**
 * Weighted multi-signal trust scoring with hard-stop overrides.
 *
 * `score = 100 × Σ wᵢ·Sᵢ` over the site profile's weights, renormalized over
 * the signals that apply. Overrides then force or cap the result.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { clamp01, roundTo } from '../utils/numeric.js';
import { ConfigurationError } from '../types/errors.js';
import { applyOverrides, OVERRIDE_RULES, PARANOIA_RULES, type OverrideRule } from './overrides.js';
import { createTrustScoreResult } from './result.js';
import { getSiteProfile, type SiteTypeProfile } from './site-profiles.js';
import {
  OPTIONAL_SIGNALS,
  SIGNAL_NAMES,
  type AppliedOverride,
  type HardStopConditions,
  type SignalName,
  type SiteType,
  type SubSignalScore,
  type SubSignals,
  type TrustScoreEngineConfig,
  type TrustScoreResult,
} from './types.js';

/** Score assumed for a required signal that is missing. */
export const NEUTRAL_SIGNAL_SCORE = 0.5;

export interface TrustScoreEngineOptions extends TrustScoreEngineConfig {
  logger?: Logger;
}

export class TrustScoreEngine {
  private readonly weightOverrides: TrustScoreEngineConfig['weightOverrides'];
  private readonly logger: Logger;

  constructor(options: TrustScoreEngineOptions = {}) {
    this.weightOverrides = options.weightOverrides;
    this.logger = options.logger ?? silentLogger;
  }

  /** Profile for `siteType` with configured weight overrides applied. */
  profileFor(siteType: SiteType): SiteTypeProfile {
    return getSiteProfile(siteType, this.weightOverrides?.[siteType]);
  }

  /**
   * @throws ConfigurationError for an unknown site type or an invalid weight profile
   */
  score(subSignals: SubSignals, siteType: SiteType, hardStops: HardStopConditions = {}): TrustScoreResult {
    const profile = this.profileFor(siteType);
    const signalScores = this.weighSignals(subSignals, profile);

    let weighted = 0;
    let confidence = 0;
    for (const signal of signalScores) {
      weighted += signal.contribution;
      confidence += signal.weight * signal.confidence;
    }
    const preOverrideScore = Math.round(clamp01(weighted) * 100);

    const signalValues: Partial<Record<SignalName, number>> = {};
    for (const signal of signalScores) {
      if (signal.present) signalValues[signal.name] = signal.score;
    }
    const rules: readonly OverrideRule[] = profile.paranoia
      ? [...OVERRIDE_RULES, ...PARANOIA_RULES]
      : OVERRIDE_RULES;
    const outcome = applyOverrides(preOverrideScore, { conditions: hardStops, signals: signalValues }, rules);
    if (outcome.applied.length > 0) {
      this.logger.debug(
        `Overrides fired for ${siteType}: ${outcome.applied.map((o) => o.id).join(', ')} (decisive: ${outcome.decisive ?? 'none'})`,
      );
    }

    return createTrustScoreResult({
      finalScore: outcome.finalScore,
      preOverrideScore,
      rawScore: outcome.finalScore,
      qualityPenalty: 0,
      subSignals: signalScores,
      overridesApplied: outcome.applied.map((override) => override.id),
      overrideDetails: outcome.applied,
      decisiveOverride: outcome.decisive,
      confidence: roundTo(confidence, 4),
      siteType,
      explanation: explain(outcome.finalScore, preOverrideScore, signalScores, outcome.applied),
    });
  }

  private weighSignals(subSignals: SubSignals, profile: SiteTypeProfile): SubSignalScore[] {
    const active = SIGNAL_NAMES.filter(
      (name) => subSignals[name] !== undefined || !OPTIONAL_SIGNALS.includes(name),
    );
    const totalWeight = active.reduce((sum, name) => sum + profile.weights[name], 0);
    if (totalWeight <= 0) {
      throw new ConfigurationError(`Weight profile for "${profile.siteType}" sums to zero`);
    }

    return active.map((name) => {
      const signal = subSignals[name];
      const weight = profile.weights[name] / totalWeight;
      const score = signal ? clamp01(signal.score) : NEUTRAL_SIGNAL_SCORE;
      return {
        name,
        score,
        confidence: signal ? clamp01(signal.confidence) : 0,
        weight,
        contribution: weight * score,
        present: signal !== undefined,
      };
    });
  }
}

function explain(
  finalScore: number,
  preOverrideScore: number,
  signals: readonly SubSignalScore[],
  applied: readonly AppliedOverride[],
): string {
  const lines = [`Trust score ${finalScore}/100 (pre-override ${preOverrideScore})`];
  const byContribution = [...signals].sort((a, b) => b.contribution - a.contribution);
  for (const signal of byContribution) {
    const note = signal.present ? `confidence ${Math.round(signal.confidence * 100)}%` : 'missing, neutral';
    lines.push(
      `  ${signal.name}: ${signal.score.toFixed(2)} x ${signal.weight.toFixed(3)} = ${signal.contribution.toFixed(4)} (${note})`,
    );
  }
  for (const override of applied) {
    lines.push(`  override ${override.id}: ${override.action} ${override.value} -> ${override.candidateScore}`);
  }
  return lines.join('\n');
}
