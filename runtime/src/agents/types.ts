/**
 * Contracts of the evidence-gathering agents the audit pipeline calls.
 *
 * Agents are external collaborators: browser capture, vision model, entity
 * and graph verification, security heuristics, and the judge. Each is an
 * async operation that returns an immutable result or throws.
 *
 * @module
 */

import type { AgentName } from '../types/agents.js';
import type { VerdictType } from '../reputation/types.js';
import type { TrustScoreResult } from '../scoring/types.js';

export type { AgentName };

/** Passed to every agent call. `signal` aborts on deadline or cancellation. */
export interface AgentCallContext {
  signal: AbortSignal;
  auditId: string;
  iteration: number;
}

export type Severity = 'low' | 'medium' | 'high' | 'critical';

// ============================================================================
// Scout
// ============================================================================

export interface ViewportOptions {
  width: number;
  height: number;
  fullPage?: boolean;
}

export type EntityType = 'company' | 'person' | 'address' | 'phone' | 'email' | 'domain';

export interface EntityMention {
  name: string;
  type: EntityType;
}

/** Page facts captured by the browser agent. Every field is optional. */
export interface PageMetadata {
  title?: string;
  hasSsl?: boolean;
  domNodeCount?: number;
  domDepth?: number;
  scriptCount?: number;
  externalScriptCount?: number;
  formCount?: number;
  hasPasswordForm?: boolean;
  hasCardForm?: boolean;
  iframeCount?: number;
  stylesheetCount?: number;
  externalLinkRatio?: number;
  redirectChain?: string[];
  externalResourceCount?: number;
  loadTimeMs?: number;
  hasLazyLoad?: boolean;
  hasAnimation?: boolean;
  viewportChanges?: number;
  captchaBlocked?: boolean;
  entities?: EntityMention[];
}

export interface ScoutResult {
  url: string;
  metadata: PageMetadata;
  screenshotPaths: string[];
  siteTypeHint?: string;
  /** Same-site links found on the page, absolute URLs */
  discoveredLinks: string[];
}

export interface ScoutAgent {
  scout(url: string, viewport: ViewportOptions, context: AgentCallContext): Promise<ScoutResult>;
}

// ============================================================================
// Vision
// ============================================================================

export interface DarkPatternFinding {
  category: string;
  patternType: string;
  severity: Severity;
  confidence: number;
  evidence?: string;
  screenshotPath?: string;
}

export type TemporalKind = 'countdown' | 'timer' | 'animation' | 'stock_counter';

export interface TemporalFinding {
  kind: TemporalKind;
  /** True when the element resets or lies (fake urgency) */
  suspicious: boolean;
  detail?: string;
}

export interface TrustBadgeSummary {
  displayed: number;
  verified: number;
}

export interface VisionResult {
  findings: DarkPatternFinding[];
  visualScore: number;
  temporalFindings?: TemporalFinding[];
  temporalScore?: number;
  trustBadges?: TrustBadgeSummary;
}

export interface VisionAgent {
  analyze(
    screenshotPaths: readonly string[],
    taxonomySubset: readonly string[],
    context: AgentCallContext,
  ): Promise<VisionResult>;
}

// ============================================================================
// Graph
// ============================================================================

export type VerificationStatus = 'confirmed' | 'unverified' | 'contradicted';

export interface EntityVerification {
  entity: string;
  entityType: EntityType;
  status: VerificationStatus;
  source: string;
  confidence: number;
}

export interface Inconsistency {
  description: string;
  severity: Severity;
}

export interface DomainIntel {
  domainAgeDays?: number;
  sslValid?: boolean;
  sslSelfSigned?: boolean;
  isBlacklisted?: boolean;
  whoisPrivate?: boolean;
}

/** Threat verdict reported by one external verification source. */
export interface SourceVerdict {
  source: string;
  verdict: VerdictType;
  confidence: number;
}

export interface GraphResult {
  verifiedEntities: EntityVerification[];
  inconsistencies: Inconsistency[];
  graphScore: number;
  domainIntel?: DomainIntel;
  sourceVerdicts?: SourceVerdict[];
}

export interface GraphInvestigator {
  investigate(
    entities: readonly EntityMention[],
    domain: string,
    context: AgentCallContext,
  ): Promise<GraphResult>;
}

// ============================================================================
// Security
// ============================================================================

export interface SecurityModuleResult {
  module: string;
  score: number;
  findings: string[];
  critical?: boolean;
}

export interface SecurityResult {
  modules: SecurityModuleResult[];
  overallScore: number;
  phishingDetected?: boolean;
  suspiciousRedirects?: boolean;
  jsRiskScore?: number;
  crossDomainForms?: boolean;
}

export interface SecurityScanner {
  scan(url: string, modules: readonly string[], context: AgentCallContext): Promise<SecurityResult>;
}

// ============================================================================
// Judge
// ============================================================================

export type JudgeDecision = 'RENDER_VERDICT' | 'REQUEST_MORE_INVESTIGATION';

export type VerdictMode = 'expert' | 'simple';

/** Everything gathered for one audit so far. */
export interface AuditEvidence {
  url: string;
  siteType: string;
  verdictMode: VerdictMode;
  iteration: number;
  scoutResults: readonly ScoutResult[];
  vision: VisionResult | null;
  graph: GraphResult | null;
  security: SecurityResult | null;
  /** Agents whose latest result is fallback data */
  degradedAgents: readonly AgentName[];
  /** URLs already scouted, normalized */
  investigatedUrls: readonly string[];
}

export interface JudgeOutput {
  trustScore: TrustScoreResult;
  narrative: string;
  decision: JudgeDecision;
  /** Pages to scout next when requesting more investigation */
  investigateUrls: string[];
}

export interface JudgeAgent {
  deliberate(evidence: AuditEvidence, context: AgentCallContext): Promise<JudgeOutput>;
}

/** Result type of every pipeline stage, keyed by agent name. */
export interface AgentResults {
  scout: ScoutResult;
  vision: VisionResult;
  graph: GraphResult;
  security: SecurityResult;
  judge: JudgeOutput;
}

export interface AuditAgents {
  scout: ScoutAgent;
  vision: VisionAgent;
  graph: GraphInvestigator;
  judge: JudgeAgent;
  security?: SecurityScanner;
}
