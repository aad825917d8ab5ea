/**
 * Derivation of sub-signals and hard-stop conditions from audit evidence.
 *
 * @module
 */

import type {
  AuditEvidence,
  GraphResult,
  PageMetadata,
  SecurityResult,
  SourceVerdict,
  VisionResult,
} from '../agents/types.js';
import type { ReputationManager } from '../reputation/manager.js';
import type { VerdictType } from '../reputation/types.js';
import { clamp01, mean, roundTo } from '../utils/numeric.js';
import type { HardStopConditions, SubSignal, SubSignals } from './types.js';

/** Reputation lookups consensus weighting needs. */
export type ReputationWeights = Pick<ReputationManager, 'consensusWeight' | 'confidenceThreshold'>;

const VERDICT_TRUST: Readonly<Record<Exclude<VerdictType, 'UNKNOWN'>, number>> = {
  SAFE: 1,
  SUSPICIOUS: 0.5,
  MALICIOUS: 0,
};

/** Confidence for a signal whose stage returned fallback data. */
const DEGRADED_CONFIDENCE = 0.2;
const DOMAIN_AGE_SATURATION_DAYS = 365;
const CRITICAL_FINDING_CONFIDENCE = 0.8;

// ============================================================================
// Consensus
// ============================================================================

export interface SourceConsensus {
  /** Reputation-weighted trust in [0, 1] */
  score: number;
  /** Sources that passed their confidence threshold */
  sources: string[];
}

/**
 * Reputation-weighted agreement of per-source verdicts. UNKNOWN verdicts and
 * claims below the source's confidence threshold are excluded. Returns null
 * when nothing usable remains.
 */
export function sourceConsensus(
  verdicts: readonly SourceVerdict[],
  reputation: ReputationWeights,
): SourceConsensus | null {
  let weightedTrust = 0;
  let totalWeight = 0;
  const sources: string[] = [];
  for (const claim of verdicts) {
    if (claim.verdict === 'UNKNOWN') continue;
    if (claim.confidence < reputation.confidenceThreshold(claim.source)) continue;
    const weight = reputation.consensusWeight(claim.source) * claim.confidence;
    if (weight <= 0) continue;
    weightedTrust += weight * VERDICT_TRUST[claim.verdict];
    totalWeight += weight;
    sources.push(claim.source);
  }
  if (totalWeight === 0) return null;
  return { score: weightedTrust / totalWeight, sources };
}

// ============================================================================
// Per-signal derivation
// ============================================================================

function pageStructureScore(metadata: PageMetadata): number {
  let score = 0.7;
  const hasSsl = metadata.hasSsl === true;
  score += hasSsl ? 0.2 : -0.2;
  if (metadata.hasPasswordForm && !hasSsl) score -= 0.2;
  if (metadata.hasCardForm && !hasSsl) score -= 0.25;
  if ((metadata.externalScriptCount ?? 0) > 20) score -= 0.05;
  if ((metadata.externalLinkRatio ?? 0) > 0.8) score -= 0.05;
  return clamp01(score);
}

function structuralSignal(evidence: AuditEvidence): SubSignal | undefined {
  if (evidence.scoutResults.length === 0) return undefined;
  const degraded = evidence.degradedAgents.includes('scout');
  const pages = evidence.scoutResults.filter((result) => Object.keys(result.metadata).length > 0);
  if (pages.length === 0) {
    return { score: 0.5, confidence: DEGRADED_CONFIDENCE };
  }
  return {
    score: roundTo(mean(pages.map((page) => pageStructureScore(page.metadata))), 3),
    confidence: degraded ? 0.5 : 0.7,
  };
}

function visualSignal(vision: VisionResult, degraded: boolean): SubSignal {
  return { score: vision.visualScore, confidence: degraded ? DEGRADED_CONFIDENCE : 0.85 };
}

function temporalSignal(vision: VisionResult, degraded: boolean): SubSignal {
  if (degraded) return { score: 0.5, confidence: DEGRADED_CONFIDENCE };
  const findings = vision.temporalFindings ?? [];
  const suspicious = findings.filter((finding) => finding.suspicious).length;
  const score = vision.temporalScore ?? clamp01(1 - 0.3 * suspicious);
  return { score, confidence: suspicious > 0 ? 0.9 : 0.7 };
}

function graphSignal(graph: GraphResult, degraded: boolean, reputation: ReputationWeights | undefined): SubSignal {
  if (degraded) return { score: graph.graphScore, confidence: DEGRADED_CONFIDENCE };
  const consensus = reputation ? sourceConsensus(graph.sourceVerdicts ?? [], reputation) : null;
  const score = consensus ? (graph.graphScore + consensus.score) / 2 : graph.graphScore;
  const evidenceCount = graph.verifiedEntities.length + (consensus?.sources.length ?? 0);
  return { score: roundTo(score, 4), confidence: Math.min(0.9, 0.5 + 0.1 * evidenceCount) };
}

function metaSignal(graph: GraphResult | null, landing: PageMetadata | undefined): SubSignal | undefined {
  const intel = graph?.domainIntel;
  if (!intel) return undefined;
  const sslOk = (intel.sslValid ?? landing?.hasSsl === true) && intel.sslSelfSigned !== true;
  const age = intel.domainAgeDays;
  const agePart = age === undefined ? 0.25 : 0.5 * Math.min(1, Math.max(0, age) / DOMAIN_AGE_SATURATION_DAYS);
  return { score: roundTo((sslOk ? 0.5 : 0) + agePart, 4), confidence: 0.85 };
}

function securitySignal(security: SecurityResult, degraded: boolean): SubSignal {
  if (degraded) return { score: security.overallScore, confidence: DEGRADED_CONFIDENCE };
  let score = security.overallScore;
  if (security.phishingDetected) score -= 0.4;
  if (security.suspiciousRedirects) score -= 0.2;
  const jsRisk = security.jsRiskScore ?? 0;
  if (jsRisk > 0.5) score -= jsRisk * 0.3;
  return {
    score: roundTo(clamp01(score), 3),
    confidence: security.modules.length >= 2 ? 0.8 : 0.5,
  };
}

/**
 * Sub-signals for the evidence gathered so far. A signal is omitted when its
 * stage produced nothing, so the engine scores it neutral with zero
 * confidence (or drops it, for the optional security signal).
 */
export function buildSubSignals(evidence: AuditEvidence, reputation?: ReputationWeights): SubSignals {
  const signals: SubSignals = {};
  const landing = evidence.scoutResults[0]?.metadata;

  const structural = structuralSignal(evidence);
  if (structural) signals.structural = structural;

  if (evidence.vision) {
    const degraded = evidence.degradedAgents.includes('vision');
    signals.visual = visualSignal(evidence.vision, degraded);
    signals.temporal = temporalSignal(evidence.vision, degraded);
  }

  if (evidence.graph) {
    signals.graph = graphSignal(evidence.graph, evidence.degradedAgents.includes('graph'), reputation);
  }

  const meta = metaSignal(evidence.graph, landing);
  if (meta) signals.meta = meta;

  if (evidence.security) {
    signals.security = securitySignal(evidence.security, evidence.degradedAgents.includes('security'));
  }
  return signals;
}

// ============================================================================
// Hard stops
// ============================================================================

export function deriveHardStops(evidence: AuditEvidence): HardStopConditions {
  const landing = evidence.scoutResults[0]?.metadata;
  const intel = evidence.graph?.domainIntel;
  const vision = evidence.vision;
  const security = evidence.security;

  let sslValid: boolean | undefined;
  if (intel?.sslValid === false || intel?.sslSelfSigned === true) sslValid = false;
  else if (intel?.sslValid === true) sslValid = true;

  const criticalFinding =
    vision?.findings.some(
      (finding) => finding.severity === 'critical' && finding.confidence >= CRITICAL_FINDING_CONFIDENCE,
    ) ?? false;
  const criticalModule = security?.modules.some((module) => module.critical === true) ?? false;

  const graphContradiction =
    evidence.graph !== null &&
    (evidence.graph.verifiedEntities.some((entity) => entity.status === 'contradicted') ||
      evidence.graph.inconsistencies.some(
        (inconsistency) => inconsistency.severity === 'high' || inconsistency.severity === 'critical',
      ));

  const fakeTimerDetected =
    (vision?.temporalFindings?.some(
      (finding) => finding.suspicious && (finding.kind === 'countdown' || finding.kind === 'timer'),
    ) ??
      false) ||
    (vision?.findings.some((finding) => finding.patternType === 'fake_countdown') ?? false);

  return {
    hasSsl: landing?.hasSsl,
    sslValid,
    domainAgeDays: intel?.domainAgeDays,
    isBlacklisted: intel?.isBlacklisted,
    whoisPrivate: intel?.whoisPrivate,
    criticalIndicator: criticalFinding || criticalModule,
    graphContradiction,
    fakeTimerDetected,
    badgesDisplayed: vision?.trustBadges?.displayed,
    badgesVerified: vision?.trustBadges?.verified,
    captchaBlocked: evidence.scoutResults.some((result) => result.metadata.captchaBlocked === true),
    phishingDetected: security?.phishingDetected,
    jsRiskScore: security?.jsRiskScore,
    crossDomainSensitiveForms: security?.crossDomainForms,
  };
}
