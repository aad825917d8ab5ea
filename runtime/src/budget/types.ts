/**
 * Types for complexity analysis and adaptive agent deadlines.
 *
 * @module
 */

import type { AgentName } from '../types/agents.js';
import type { Logger } from '../utils/logger.js';

/**
 * Complexity of one audited page, computed fresh per iteration.
 * Raw counts are kept beside the normalized sub-scores.
 */
export interface ComplexityMetrics {
  url: string;
  // Structural
  domNodeCount: number;
  domDepth: number;
  scriptCount: number;
  formCount: number;
  iframeCount: number;
  stylesheetCount: number;
  // Network
  redirectHops: number;
  externalResourceCount: number;
  loadTimeMs: number;
  // Dynamic content
  screenshotCount: number;
  hasLazyLoad: boolean;
  hasAnimation: boolean;
  hasCountdown: boolean;
  viewportChanges: number;
  securityModuleCount: number;
  /** Mean normalized value per family, for explainability */
  subScores: ComplexitySubScores;
  /** Composite score in [0, 1] */
  score: number;
}

export interface ComplexitySubScores {
  structural: number;
  network: number;
  dynamic: number;
}

export type TimeoutStrategy = 'FAST' | 'STANDARD' | 'CONSERVATIVE' | 'ADAPTIVE';

/** Fixed budget tiers. */
export type BudgetTier = Exclude<TimeoutStrategy, 'ADAPTIVE'>;

/** Deadline in ms per agent for one tier. */
export type TimeoutConfig = Record<AgentName, number>;

export type TimeoutTable = Record<BudgetTier, TimeoutConfig>;

export interface TimeoutManagerConfig {
  /** Default: 'ADAPTIVE' */
  strategy?: TimeoutStrategy;
  /** Samples needed before history drives ADAPTIVE deadlines. Default: 3 */
  minSamples?: number;
  /** Rolling history size per agent. Default: 10 */
  historyCapacity?: number;
  /** Per-tier overrides merged over the defaults */
  tiers?: Partial<Record<BudgetTier, Partial<TimeoutConfig>>>;
  /** Lower bound of ADAPTIVE deadlines. Default: 1_000 */
  minDeadlineMs?: number;
  logger?: Logger;
}

export interface ExecutionSample {
  durationMs: number;
  succeeded: boolean;
}

export interface ExecutionStats {
  samples: number;
  meanMs: number;
  successRate: number;
}
