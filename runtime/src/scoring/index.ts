/**
 * Trust scoring: weighted sub-signals, site profiles and override rules.
 *
 * @module
 */

export {
  SIGNAL_NAMES,
  OPTIONAL_SIGNALS,
  SITE_TYPES,
  type SignalName,
  type SignalWeights,
  type SubSignal,
  type SubSignals,
  type SubSignalScore,
  type RiskLevel,
  type SiteType,
  type HardStopConditions,
  type OverrideAction,
  type AppliedOverride,
  type TrustScoreResult,
  type TrustScoreInput,
  type TrustScoreEngineConfig,
} from './types.js';

export { RISK_LEVEL_THRESHOLDS, riskLevelFor, riskSeverity } from './risk-level.js';
export { createTrustScoreResult, isTrustScoreResult } from './result.js';
export {
  DEFAULT_SIGNAL_WEIGHTS,
  SITE_TYPE_PROFILES,
  getSiteProfile,
  resolveSiteType,
  isSiteType,
  type SiteTypeProfile,
} from './site-profiles.js';
export { classifySiteType, type SiteClassification, type SiteClassificationInput } from './site-classifier.js';
export {
  OVERRIDE_RULES,
  PARANOIA_RULES,
  applyOverrides,
  candidateScore,
  type OverrideRule,
  type OverrideContext,
  type OverrideOutcome,
} from './overrides.js';
export { TrustScoreEngine, NEUTRAL_SIGNAL_SCORE, type TrustScoreEngineOptions } from './engine.js';
export {
  buildSubSignals,
  deriveHardStops,
  sourceConsensus,
  type ReputationWeights,
  type SourceConsensus,
} from './signals.js';
