/**
 * Engine configuration shape.
 *
 * @module
 */

import type { TierBudgetOverrides } from '../audit/tiers.js';
import type { BudgetTier, TimeoutConfig, TimeoutStrategy } from '../budget/types.js';
import type { CircuitBreakerConfig } from '../resilience/types.js';
import type { SignalWeights, SiteType } from '../scoring/types.js';
import type { AgentName } from '../types/agents.js';
import type { LogLevel } from '../utils/logger.js';

export interface LoggingSettings {
  level: LogLevel;
}

export interface AuditSettings {
  /** Below this confidence another pass is attempted */
  confidenceThreshold: number;
  maxPagesPerIteration: number;
  maxConcurrentAudits: number;
  /** Lowest score the degradation penalty can push a verdict to */
  penaltyFloor: number;
  /** Longest wait in ms for one event sink delivery */
  sinkTimeoutMs: number;
  /** How long in ms a finished audit stays reachable by id */
  finishedAuditRetentionMs: number;
  maxFinishedAudits: number;
}

export interface TimeoutSettings {
  strategy: TimeoutStrategy;
  minSamples: number;
  historyCapacity: number;
  /** Lower bound of ADAPTIVE deadlines in ms */
  minDeadlineMs: number;
  /** Per-tier deadline overrides in ms */
  tiers: Partial<Record<BudgetTier, Partial<TimeoutConfig>>>;
}

export interface ReputationSettings {
  /** SQLite file for source reputation; null keeps it in memory */
  dbPath: string | null;
}

export interface ScoringSettings {
  weightOverrides: Partial<Record<SiteType, Partial<SignalWeights>>>;
}

export interface EngineConfig {
  logging: LoggingSettings;
  audit: AuditSettings;
  /** Budget overrides per audit tier */
  tiers: TierBudgetOverrides;
  timeouts: TimeoutSettings;
  circuitBreakers: Partial<Record<AgentName, CircuitBreakerConfig>>;
  scoring: ScoringSettings;
  reputation: ReputationSettings;
}

/** What a config file may contain. Every section and field is optional. */
export interface EngineConfigInput {
  logging?: Partial<LoggingSettings>;
  audit?: Partial<AuditSettings>;
  tiers?: TierBudgetOverrides;
  timeouts?: Partial<TimeoutSettings>;
  circuitBreakers?: Partial<Record<AgentName, CircuitBreakerConfig>>;
  scoring?: Partial<ScoringSettings>;
  reputation?: Partial<ReputationSettings>;
}
