/**
 * Trust scoring types.
 *
 * @module
 */

export const SIGNAL_NAMES = ['visual', 'structural', 'temporal', 'graph', 'meta', 'security'] as const;

export type SignalName = (typeof SIGNAL_NAMES)[number];

/** Signals that only count when their stage actually ran. */
export const OPTIONAL_SIGNALS: readonly SignalName[] = ['security'];

export type SignalWeights = Record<SignalName, number>;

/** One scored input. `score` and `confidence` are in [0, 1]. */
export interface SubSignal {
  score: number;
  confidence: number;
}

export type SubSignals = Partial<Record<SignalName, SubSignal>>;

export interface SubSignalScore {
  name: SignalName;
  score: number;
  confidence: number;
  /** Normalized weight actually used */
  weight: number;
  /** `weight × score` */
  contribution: number;
  /** False when the signal was missing and scored neutral */
  present: boolean;
}

export type RiskLevel = 'TRUSTED' | 'PROBABLY_SAFE' | 'SUSPICIOUS' | 'HIGH_RISK' | 'DANGEROUS';

export const SITE_TYPES = [
  'ecommerce',
  'company_portfolio',
  'financial',
  'saas_subscription',
  'darknet_suspicious',
  'general',
] as const;

export type SiteType = (typeof SITE_TYPES)[number];

/** Facts that can force or cap the score regardless of the weighted formula. */
export interface HardStopConditions {
  /** False when the site is served without TLS */
  hasSsl?: boolean;
  /** False when the certificate is invalid or self-signed */
  sslValid?: boolean;
  domainAgeDays?: number;
  isBlacklisted?: boolean;
  whoisPrivate?: boolean;
  /** A confirmed critical indicator (critical dark pattern or security finding) */
  criticalIndicator?: boolean;
  /** Graph found a contradicted entity or a severe inconsistency */
  graphContradiction?: boolean;
  fakeTimerDetected?: boolean;
  badgesDisplayed?: number;
  badgesVerified?: number;
  captchaBlocked?: boolean;
  phishingDetected?: boolean;
  /** 0 = clean, 1 = heavily obfuscated */
  jsRiskScore?: number;
  crossDomainSensitiveForms?: boolean;
}

export type OverrideAction = 'cap_at' | 'force_below' | 'deduct';

export interface AppliedOverride {
  id: string;
  name: string;
  action: OverrideAction;
  value: number;
  /** Score this rule alone would produce from the pre-override score */
  candidateScore: number;
}

/** Immutable scoring outcome. Build with `createTrustScoreResult`. */
export interface TrustScoreResult {
  /** Integer in [0, 100] after overrides and quality penalty */
  readonly finalScore: number;
  readonly riskLevel: RiskLevel;
  /** Weighted score before overrides */
  readonly preOverrideScore: number;
  /** Score after overrides, before the quality penalty */
  readonly rawScore: number;
  /** Accumulated degradation penalty applied to `rawScore` */
  readonly qualityPenalty: number;
  readonly subSignals: readonly SubSignalScore[];
  /** Every fired rule id, in priority order */
  readonly overridesApplied: readonly string[];
  readonly overrideDetails: readonly AppliedOverride[];
  /** Rule that produced the final score, if any fired */
  readonly decisiveOverride: string | null;
  /** Weight-averaged sub-signal confidence */
  readonly confidence: number;
  readonly siteType: SiteType;
  readonly explanation: string;
}

export type TrustScoreInput = Omit<TrustScoreResult, 'riskLevel'>;

export interface TrustScoreEngineConfig {
  /** Partial weights merged onto a site profile, keyed by site type */
  weightOverrides?: Partial<Record<SiteType, Partial<SignalWeights>>>;
}
