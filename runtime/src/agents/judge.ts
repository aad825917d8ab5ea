/**
 * Default judge: scores the gathered evidence and decides whether another
 * investigation pass is worth it.
 *
 * @module
 */

import type { TrustScoreEngine } from '../scoring/engine.js';
import { buildSubSignals, deriveHardStops, type ReputationWeights } from '../scoring/signals.js';
import { resolveSiteType } from '../scoring/site-profiles.js';
import type { SiteTypeProfile } from '../scoring/site-profiles.js';
import type { TrustScoreResult } from '../scoring/types.js';
import { PRIORITY_PATHS, selectPriorityPages } from './pages.js';
import type { AgentCallContext, AuditEvidence, JudgeAgent, JudgeDecision, JudgeOutput } from './types.js';

export interface JudgeOptions {
  engine: TrustScoreEngine;
  reputation?: ReputationWeights;
  /** Below this overall confidence the judge asks for more evidence. Default: 0.6 */
  confidenceThreshold?: number;
  /** Vision/graph gap that counts as disagreement. Default: 0.4 */
  disagreementThreshold?: number;
  /** Follow-up pages requested per iteration. Default: 3 */
  maxPagesPerIteration?: number;
  priorityPaths?: readonly string[];
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;
export const DEFAULT_DISAGREEMENT_THRESHOLD = 0.4;
export const DEFAULT_PAGES_PER_ITERATION = 3;

function signalsDisagree(result: TrustScoreResult, threshold: number): boolean {
  const visual = result.subSignals.find((signal) => signal.name === 'visual');
  const graph = result.subSignals.find((signal) => signal.name === 'graph');
  if (!visual?.present || !graph?.present) return false;
  return Math.abs(visual.score - graph.score) > threshold;
}

function narrate(evidence: AuditEvidence, result: TrustScoreResult, profile: SiteTypeProfile): string {
  const risk = result.riskLevel.replace('_', ' ').toLowerCase();
  if (evidence.verdictMode === 'simple') {
    return `${evidence.url} looks ${risk} (${result.finalScore}/100). ${profile.simpleFocus}`;
  }
  const parts = [
    `${profile.name} audit of ${evidence.url}: trust score ${result.finalScore}/100 (${result.riskLevel}), confidence ${Math.round(result.confidence * 100)}%.`,
  ];
  if (result.overridesApplied.length > 0) {
    parts.push(`Overrides: ${result.overridesApplied.join(', ')}.`);
  }
  if (evidence.degradedAgents.length > 0) {
    parts.push(`Degraded evidence from: ${evidence.degradedAgents.join(', ')}.`);
  }
  parts.push(`Focus: ${profile.narrativeFocus}`);
  return parts.join(' ');
}

/**
 * Score `evidence` and decide. Asks for more investigation when confidence is
 * low or vision and graph disagree, and unvisited priority pages exist.
 */
export function computeVerdict(evidence: AuditEvidence, options: JudgeOptions): JudgeOutput {
  const siteType = resolveSiteType(evidence.siteType);
  const trustScore = options.engine.score(
    buildSubSignals(evidence, options.reputation),
    siteType,
    deriveHardStops(evidence),
  );
  const profile = options.engine.profileFor(siteType);

  const uncertain =
    trustScore.confidence < (options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD) ||
    signalsDisagree(trustScore, options.disagreementThreshold ?? DEFAULT_DISAGREEMENT_THRESHOLD);
  const candidates = uncertain
    ? selectPriorityPages(
        evidence.url,
        evidence.scoutResults.flatMap((result) => result.discoveredLinks),
        evidence.investigatedUrls,
        options.maxPagesPerIteration ?? DEFAULT_PAGES_PER_ITERATION,
        options.priorityPaths ?? PRIORITY_PATHS,
      )
    : [];
  const decision: JudgeDecision = candidates.length > 0 ? 'REQUEST_MORE_INVESTIGATION' : 'RENDER_VERDICT';

  return {
    trustScore,
    narrative: narrate(evidence, trustScore, profile),
    decision,
    investigateUrls: candidates,
  };
}

export class EvidenceJudge implements JudgeAgent {
  constructor(private readonly options: JudgeOptions) {}

  async deliberate(evidence: AuditEvidence, context: AgentCallContext): Promise<JudgeOutput> {
    context.signal.throwIfAborted();
    return computeVerdict(evidence, this.options);
  }
}
