/**
 * Per-agent deadlines from complexity tiers and rolling execution history.
 *
 * @module
 */

import type { AgentName } from '../types/agents.js';
import type { ExecutionRecorder } from '../resilience/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { mean } from '../utils/numeric.js';
import type {
  BudgetTier,
  ComplexityMetrics,
  ExecutionSample,
  ExecutionStats,
  TimeoutConfig,
  TimeoutManagerConfig,
  TimeoutStrategy,
  TimeoutTable,
} from './types.js';

export const DEFAULT_TIMEOUT_TABLE: Readonly<TimeoutTable> = {
  FAST: { scout: 10_000, vision: 15_000, graph: 5_000, security: 8_000, judge: 5_000 },
  STANDARD: { scout: 20_000, vision: 30_000, graph: 10_000, security: 15_000, judge: 10_000 },
  CONSERVATIVE: { scout: 35_000, vision: 50_000, graph: 15_000, security: 25_000, judge: 15_000 },
};

/** Complexity below this budgets at FAST. */
export const FAST_COMPLEXITY_CEILING = 0.3;
/** Complexity below this budgets at STANDARD; anything higher is CONSERVATIVE. */
export const STANDARD_COMPLEXITY_CEILING = 0.6;
/** Safety buffer applied to the historical mean. */
export const ADAPTIVE_SAFETY_FACTOR = 1.2;

/** Lowest ADAPTIVE deadline. Keeps a history of instant failures from starving the next call. */
export const DEFAULT_MIN_DEADLINE_MS = 1_000;

const DEFAULT_MIN_SAMPLES = 3;
const DEFAULT_HISTORY_CAPACITY = 10;

/** Budget tier for a complexity score. Missing metrics budget at STANDARD. */
export function tierForComplexity(metrics: ComplexityMetrics | null | undefined): BudgetTier {
  if (!metrics) return 'STANDARD';
  if (metrics.score < FAST_COMPLEXITY_CEILING) return 'FAST';
  if (metrics.score < STANDARD_COMPLEXITY_CEILING) return 'STANDARD';
  return 'CONSERVATIVE';
}

/**
 * Deadline oracle shared by all audits in the process. Durations recorded by
 * one audit inform the ADAPTIVE deadlines of the next.
 */
export class TimeoutManager implements ExecutionRecorder {
  readonly strategy: TimeoutStrategy;

  private readonly minSamples: number;
  private readonly historyCapacity: number;
  private readonly minDeadlineMs: number;
  private readonly table: TimeoutTable;
  private readonly history = new Map<string, ExecutionSample[]>();
  private readonly logger: Logger;

  constructor(config: TimeoutManagerConfig = {}) {
    this.strategy = config.strategy ?? 'ADAPTIVE';
    this.minSamples = Math.max(1, config.minSamples ?? DEFAULT_MIN_SAMPLES);
    this.historyCapacity = Math.max(1, config.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this.minDeadlineMs = Math.max(0, config.minDeadlineMs ?? DEFAULT_MIN_DEADLINE_MS);
    this.logger = config.logger ?? silentLogger;
    this.table = {
      FAST: { ...DEFAULT_TIMEOUT_TABLE.FAST, ...config.tiers?.FAST },
      STANDARD: { ...DEFAULT_TIMEOUT_TABLE.STANDARD, ...config.tiers?.STANDARD },
      CONSERVATIVE: { ...DEFAULT_TIMEOUT_TABLE.CONSERVATIVE, ...config.tiers?.CONSERVATIVE },
    };
  }

  /**
   * Deadline in ms for the next call of `agent`.
   *
   * Fixed strategies return their tier's value. ADAPTIVE uses
   * `max(mean(history) × 1.2, minDeadlineMs)` once `minSamples` durations are
   * known, and the complexity tier before that.
   */
  deadlineFor(
    agent: AgentName,
    metrics?: ComplexityMetrics | null,
    strategy: TimeoutStrategy = this.strategy,
  ): number {
    if (strategy !== 'ADAPTIVE') {
      return this.table[strategy][agent];
    }

    const samples = this.history.get(agent) ?? [];
    if (samples.length >= this.minSamples) {
      const adaptive = mean(samples.map((sample) => sample.durationMs)) * ADAPTIVE_SAFETY_FACTOR;
      return Math.max(adaptive, this.minDeadlineMs);
    }
    return this.table[tierForComplexity(metrics)][agent];
  }

  /** Append an observed duration; the oldest sample is evicted at capacity. */
  recordExecution(agent: string, durationMs: number, succeeded: boolean): void {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      this.logger.debug(`Ignoring invalid duration ${durationMs} for ${agent}`);
      return;
    }
    let samples = this.history.get(agent);
    if (!samples) {
      samples = [];
      this.history.set(agent, samples);
    }
    samples.push({ durationMs, succeeded });
    while (samples.length > this.historyCapacity) {
      samples.shift();
    }
  }

  /** Sum of current deadlines for the agents still to run. */
  estimateRemaining(
    pendingAgents: readonly AgentName[],
    metrics?: ComplexityMetrics | null,
    strategy: TimeoutStrategy = this.strategy,
  ): number {
    let total = 0;
    for (const agent of pendingAgents) {
      total += this.deadlineFor(agent, metrics, strategy);
    }
    return total;
  }

  getHistory(agent: string): number[] {
    return (this.history.get(agent) ?? []).map((sample) => sample.durationMs);
  }

  getStats(agent: string): ExecutionStats {
    const samples = this.history.get(agent) ?? [];
    if (samples.length === 0) {
      return { samples: 0, meanMs: 0, successRate: 0 };
    }
    const succeeded = samples.filter((sample) => sample.succeeded).length;
    return {
      samples: samples.length,
      meanMs: mean(samples.map((sample) => sample.durationMs)),
      successRate: succeeded / samples.length,
    };
  }

  /** Tier table in effect, after config overrides. */
  getTier(tier: BudgetTier): Readonly<TimeoutConfig> {
    return this.table[tier];
  }

  reset(agent?: string): void {
    if (agent !== undefined) {
      this.history.delete(agent);
      return;
    }
    this.history.clear();
  }
}
