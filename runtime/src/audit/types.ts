/**
 * Types for audit runs, their budgets, reports and progress events.
 *
 * @module
 */

import type { ComplexityMetrics } from '../budget/types.js';
import type { AgentName, VerdictMode } from '../agents/types.js';
import type { VerdictType } from '../reputation/types.js';
import type { FallbackMode, DegradationReason } from '../resilience/types.js';
import type { SiteType, TrustScoreResult } from '../scoring/types.js';

export const AUDIT_TIERS = ['quick_scan', 'standard_audit', 'deep'] as const;

export type AuditTier = (typeof AUDIT_TIERS)[number];

/** Hard limits of one audit run. */
export interface AuditBudget {
  maxIterations: number;
  maxElapsedMs: number;
  /** Agent invocations; breaker short-circuits are not counted */
  maxExternalCalls: number;
  /** Distinct pages scouted over the whole audit */
  maxPages: number;
}

export interface AuditRequest {
  url: string;
  /** One of {@link AUDIT_TIERS}. Default: 'standard_audit' */
  tier?: string;
  /** Default: 'expert' */
  verdictMode?: VerdictMode;
  /** Security modules to run; none skips the security stage */
  securityModules?: readonly string[];
  /** Known site type; skips classification. An unknown value fails the audit. */
  siteType?: string;
}

/** Pipeline position of a run. `DONE` and `ERROR` are terminal. */
export type AuditPhase = 'SCOUT' | 'ANALYZE' | 'JUDGE' | 'LOOP' | 'DONE' | 'ERROR';

export type AuditStatus = Extract<AuditPhase, 'DONE' | 'ERROR'>;

/** One stage execution that was served by fallback data. */
export interface DegradationFlag {
  agent: AgentName;
  iteration: number;
  reason: DegradationReason;
  fallbackMode: FallbackMode;
  qualityPenalty: number;
  missingData: readonly string[];
  errorMessage: string;
}

/** A source verdict recorded with the reputation manager during the audit. */
export interface RecordedPrediction {
  source: string;
  verdict: VerdictType;
  confidence: number;
  /** Index to pass back with the actual verdict */
  predictionIndex: number;
}

export interface AuditReport {
  auditId: string;
  url: string;
  tier: AuditTier;
  verdictMode: VerdictMode;
  status: AuditStatus;
  siteType: SiteType;
  iterations: number;
  trustScore: TrustScoreResult | null;
  narrative: string;
  degradation: readonly DegradationFlag[];
  /** Sum of stage penalties, capped at 0.9 */
  totalPenalty: number;
  externalCalls: number;
  elapsedMs: number;
  investigatedUrls: readonly string[];
  complexityHistory: readonly ComplexityMetrics[];
  predictions: readonly RecordedPrediction[];
  /** A budget limit stopped the audit before the judge was satisfied */
  budgetExhausted: boolean;
  /** The verdict was computed locally because the judge could not run */
  forcedVerdict: boolean;
  error?: string;
}

export type StageSummary = Readonly<Record<string, string | number | boolean>>;

interface AuditEventBase {
  auditId: string;
  timestamp: number;
}

export interface StageStartedEvent extends AuditEventBase {
  type: 'stage_started';
  stage: AgentName;
  iteration: number;
  /** Sum of current deadlines for this stage and the ones after it in the iteration */
  estimatedRemainingMs: number;
}

export interface StageCompletedEvent extends AuditEventBase {
  type: 'stage_completed';
  stage: AgentName;
  iteration: number;
  durationMs: number;
  summary: StageSummary;
  degraded: DegradationFlag | null;
  /** Sum of current deadlines for the stages still to run in the iteration */
  estimatedRemainingMs: number;
}

export interface AuditCompleteEvent extends AuditEventBase {
  type: 'audit_complete';
  report: AuditReport;
}

export interface AuditErrorEvent extends AuditEventBase {
  type: 'audit_error';
  message: string;
  report: AuditReport;
}

export type AuditEvent = StageStartedEvent | StageCompletedEvent | AuditCompleteEvent | AuditErrorEvent;

export type AuditEventType = AuditEvent['type'];

/**
 * Receives progress events. A rejected or thrown send is logged and ignored.
 * The run waits for each send only up to the orchestrator's sink timeout.
 */
export type AuditEventSink = (event: AuditEvent) => void | Promise<void>;

export function isTerminalEvent(event: AuditEvent): event is AuditCompleteEvent | AuditErrorEvent {
  return event.type === 'audit_complete' || event.type === 'audit_error';
}
