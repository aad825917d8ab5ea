/**
 * Audit orchestration, budgets, event streaming and the service surface.
 *
 * @module
 */

export {
  AUDIT_TIERS,
  isTerminalEvent,
  type AuditTier,
  type AuditBudget,
  type AuditRequest,
  type AuditPhase,
  type AuditStatus,
  type DegradationFlag,
  type RecordedPrediction,
  type AuditReport,
  type StageSummary,
  type StageStartedEvent,
  type StageCompletedEvent,
  type AuditCompleteEvent,
  type AuditErrorEvent,
  type AuditEvent,
  type AuditEventSink,
} from './types.js';
export {
  DEFAULT_AUDIT_TIER,
  DEFAULT_TIER_BUDGETS,
  isAuditTier,
  resolveTier,
  resolveBudget,
  type TierBudgetOverrides,
} from './tiers.js';
export { AuditNotFoundError, AuditUnavailableError, AuditCancelledError } from './errors.js';
export { MAX_TOTAL_PENALTY, DEFAULT_PENALTY_FLOOR, totalPenalty, applyQualityPenalty } from './penalty.js';
export { AuditEventChannel } from './event-channel.js';
export {
  AuditOrchestrator,
  DEFAULT_VIEWPORT,
  type AuditOrchestratorConfig,
  type AuditRunOptions,
} from './orchestrator.js';
export {
  AuditService,
  DEFAULT_MAX_CONCURRENT_AUDITS,
  type AuditLifecycle,
  type AuditServiceConfig,
  type OutcomeSummary,
} from './service.js';
