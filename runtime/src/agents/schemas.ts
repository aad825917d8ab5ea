/**
 * Runtime schemas for agent results.
 *
 * Agents live outside the process boundary in practice (browsers, model
 * servers, OSINT services), so their results are parsed before use. A result
 * that fails its schema is a malformed-result agent failure.
 *
 * @module
 */

import { z } from 'zod';
import { isTrustScoreResult } from '../scoring/result.js';
import type { TrustScoreResult } from '../scoring/types.js';
import { malformedOnThrow } from '../resilience/degradation.js';
import type {
  GraphResult,
  JudgeOutput,
  ScoutResult,
  SecurityResult,
  VisionResult,
} from './types.js';

const unit = z.number().min(0).max(1);
const count = z.number().int().nonnegative();
const severity = z.enum(['low', 'medium', 'high', 'critical']);
const entityType = z.enum(['company', 'person', 'address', 'phone', 'email', 'domain']);

export const scoutResultSchema: z.ZodType<ScoutResult> = z.object({
  url: z.string().min(1),
  metadata: z.object({
    title: z.string().optional(),
    hasSsl: z.boolean().optional(),
    domNodeCount: count.optional(),
    domDepth: count.optional(),
    scriptCount: count.optional(),
    externalScriptCount: count.optional(),
    formCount: count.optional(),
    hasPasswordForm: z.boolean().optional(),
    hasCardForm: z.boolean().optional(),
    iframeCount: count.optional(),
    stylesheetCount: count.optional(),
    externalLinkRatio: unit.optional(),
    redirectChain: z.array(z.string()).optional(),
    externalResourceCount: count.optional(),
    loadTimeMs: z.number().nonnegative().optional(),
    hasLazyLoad: z.boolean().optional(),
    hasAnimation: z.boolean().optional(),
    viewportChanges: count.optional(),
    captchaBlocked: z.boolean().optional(),
    entities: z.array(z.object({ name: z.string(), type: entityType })).optional(),
  }),
  screenshotPaths: z.array(z.string()),
  siteTypeHint: z.string().optional(),
  discoveredLinks: z.array(z.string()),
});

export const visionResultSchema: z.ZodType<VisionResult> = z.object({
  findings: z.array(
    z.object({
      category: z.string(),
      patternType: z.string(),
      severity,
      confidence: unit,
      evidence: z.string().optional(),
      screenshotPath: z.string().optional(),
    }),
  ),
  visualScore: unit,
  temporalFindings: z
    .array(
      z.object({
        kind: z.enum(['countdown', 'timer', 'animation', 'stock_counter']),
        suspicious: z.boolean(),
        detail: z.string().optional(),
      }),
    )
    .optional(),
  temporalScore: unit.optional(),
  trustBadges: z.object({ displayed: count, verified: count }).optional(),
});

export const graphResultSchema: z.ZodType<GraphResult> = z.object({
  verifiedEntities: z.array(
    z.object({
      entity: z.string(),
      entityType,
      status: z.enum(['confirmed', 'unverified', 'contradicted']),
      source: z.string(),
      confidence: unit,
    }),
  ),
  inconsistencies: z.array(z.object({ description: z.string(), severity })),
  graphScore: unit,
  domainIntel: z
    .object({
      domainAgeDays: z.number().optional(),
      sslValid: z.boolean().optional(),
      sslSelfSigned: z.boolean().optional(),
      isBlacklisted: z.boolean().optional(),
      whoisPrivate: z.boolean().optional(),
    })
    .optional(),
  sourceVerdicts: z
    .array(
      z.object({
        source: z.string().min(1),
        verdict: z.enum(['MALICIOUS', 'SAFE', 'SUSPICIOUS', 'UNKNOWN']),
        confidence: unit,
      }),
    )
    .optional(),
});

export const securityResultSchema: z.ZodType<SecurityResult> = z.object({
  modules: z.array(
    z.object({
      module: z.string(),
      score: unit,
      findings: z.array(z.string()),
      critical: z.boolean().optional(),
    }),
  ),
  overallScore: unit,
  phishingDetected: z.boolean().optional(),
  suspiciousRedirects: z.boolean().optional(),
  jsRiskScore: unit.optional(),
  crossDomainForms: z.boolean().optional(),
});

export const judgeOutputSchema: z.ZodType<JudgeOutput> = z.object({
  trustScore: z.custom<TrustScoreResult>(isTrustScoreResult, {
    message: 'trustScore must be a TrustScoreResult',
  }),
  narrative: z.string(),
  decision: z.enum(['RENDER_VERDICT', 'REQUEST_MORE_INVESTIGATION']),
  investigateUrls: z.array(z.string()),
});

function zodIssues(error: unknown): string[] {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return [String(error)];
}

/** Validator for an agent result that throws `MalformedResultError`. */
export function resultValidator<T>(agent: string, schema: z.ZodType<T>): (value: unknown) => T {
  return malformedOnThrow(agent, (value) => schema.parse(value), zodIssues);
}
