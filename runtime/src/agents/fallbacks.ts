/**
 * Default fallback registrations for every pipeline stage.
 *
 * @module
 */

import type { FallbackRegistry } from '../resilience/types.js';
import { createTrustScoreResult } from '../scoring/result.js';
import { isSiteType } from '../scoring/site-profiles.js';
import {
  graphResultSchema,
  judgeOutputSchema,
  resultValidator,
  scoutResultSchema,
  securityResultSchema,
  visionResultSchema,
} from './schemas.js';
import type { AgentResults, AuditEvidence, JudgeOutput, ScoutResult } from './types.js';

/** Neutral score of a verdict rendered with no usable evidence. */
const BASELINE_SCORE = 50;

export interface FallbackSources {
  /** Page the scout stage was asked to capture */
  currentUrl(): string;
  /** Evidence gathered so far in this audit */
  evidence(): AuditEvidence;
  /** Local verdict computation used when the judge agent fails */
  computeVerdict(evidence: AuditEvidence): JudgeOutput;
}

function emptyScout(url: string): ScoutResult {
  return { url, metadata: {}, screenshotPaths: [], discoveredLinks: [] };
}

/** Verdict used when even the local computation fails. */
export function baselineVerdict(siteType: string): JudgeOutput {
  const trustScore = createTrustScoreResult({
    finalScore: BASELINE_SCORE,
    preOverrideScore: BASELINE_SCORE,
    rawScore: BASELINE_SCORE,
    qualityPenalty: 0,
    subSignals: [],
    overridesApplied: [],
    overrideDetails: [],
    decisiveOverride: null,
    confidence: 0,
    siteType: isSiteType(siteType) ? siteType : 'general',
    explanation: 'No evidence could be scored',
  });
  return {
    trustScore,
    narrative: 'Insufficient evidence to render a reliable verdict.',
    decision: 'RENDER_VERDICT',
    investigateUrls: [],
  };
}

export function createAgentFallbacks(sources: FallbackSources): FallbackRegistry<AgentResults> {
  return {
    scout: {
      mode: 'PARTIAL',
      missingFields: ['metadata', 'screenshotPaths', 'discoveredLinks'],
      produce: () => emptyScout(sources.currentUrl()),
      baseline: () => emptyScout(sources.currentUrl()),
      validate: resultValidator('scout', scoutResultSchema),
    },
    vision: {
      mode: 'SIMPLIFIED',
      missingFields: ['findings', 'temporalFindings', 'trustBadges'],
      produce: () => ({ findings: [], visualScore: 0.5 }),
      baseline: () => ({ findings: [], visualScore: 0.5 }),
      validate: resultValidator('vision', visionResultSchema),
    },
    graph: {
      mode: 'SIMPLIFIED',
      missingFields: ['verifiedEntities', 'inconsistencies', 'domainIntel', 'sourceVerdicts'],
      produce: () => ({ verifiedEntities: [], inconsistencies: [], graphScore: 0.5 }),
      baseline: () => ({ verifiedEntities: [], inconsistencies: [], graphScore: 0.5 }),
      validate: resultValidator('graph', graphResultSchema),
    },
    security: {
      mode: 'SIMPLIFIED',
      missingFields: ['modules'],
      produce: () => ({ modules: [], overallScore: 0.5 }),
      baseline: () => ({ modules: [], overallScore: 0.5 }),
      validate: resultValidator('security', securityResultSchema),
    },
    judge: {
      mode: 'ALTERNATIVE',
      missingFields: ['investigateUrls'],
      produce: () => {
        const verdict = sources.computeVerdict(sources.evidence());
        return { ...verdict, decision: 'RENDER_VERDICT', investigateUrls: [] };
      },
      baseline: () => baselineVerdict(sources.evidence().siteType),
      validate: resultValidator('judge', judgeOutputSchema),
    },
  };
}
