/**
 * Type definitions for circuit breaking and graceful degradation.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import type { MetricsProvider } from '../telemetry/types.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';

// ============================================================================
// Circuit breaker
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/** Outcome of the most recent half-open trial. */
export type HalfOpenTrial = 'idle' | 'in_flight' | 'succeeded' | 'failed';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit. Default: 3 */
  failureThreshold?: number;
  /** Backoff of the first open cycle. Default: 30_000 */
  baseBackoffMs?: number;
  /** Ceiling for the backoff. Default: 300_000 */
  maxBackoffMs?: number;
  /** Growth factor per consecutive open cycle. Default: 2 */
  backoffMultiplier?: number;
}

export interface CircuitBreakerOptions extends CircuitBreakerConfig {
  now?: () => number;
  logger?: Logger;
  /**
   * Errors for which this returns true propagate to the caller untouched:
   * no failure is counted and no fallback runs.
   */
  ignoreError?: (error: unknown) => boolean;
  onStateChange?: (change: CircuitStateChange) => void;
}

export interface CircuitStateChange {
  name: string;
  from: CircuitState;
  to: CircuitState;
  at: number;
  backoffMs: number;
}

/** Why a call was served by its fallback instead of its result. */
export type CircuitFallbackReason =
  | { kind: 'open'; retryAt: number }
  | { kind: 'half_open_busy' }
  | { kind: 'failure'; error: unknown };

export type CircuitFallback<T> = (reason: CircuitFallbackReason) => T | Promise<T>;

/** Point-in-time copy of a breaker's state. */
export interface CircuitBreakerState {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  lastFailureAt: number | null;
  currentBackoffMs: number;
  /** Epoch ms at which an OPEN circuit admits its trial call */
  nextAttemptAt: number | null;
  halfOpenTrial: HalfOpenTrial;
  /** Consecutive open cycles since the circuit last closed */
  openCycles: number;
  totalCalls: number;
  totalFailures: number;
  totalShortCircuits: number;
}

// ============================================================================
// Degradation
// ============================================================================

export type FallbackMode = 'NONE' | 'SIMPLIFIED' | 'CACHED' | 'PARTIAL' | 'ALTERNATIVE';

export type DegradationReason = 'circuit_open' | 'timeout' | 'error' | 'malformed_result';

export interface FallbackContext {
  agent: string;
  reason: DegradationReason;
  error?: unknown;
}

/**
 * Fallback registration for one agent. `produce` builds simplified data and
 * may fail; `baseline` returns the neutral payload used when it does.
 */
export interface AgentFallback<T> {
  mode: FallbackMode;
  /** Result fields the fallback cannot supply */
  missingFields: readonly string[];
  produce(context: FallbackContext): T | Promise<T>;
  baseline(): T;
  /** Runtime check of a real result; throw to reject it as malformed. */
  validate?(value: unknown): T;
}

/** A fallback for every agent of the result map. */
export type FallbackRegistry<TResults> = {
  [K in keyof TResults]: AgentFallback<TResults[K]>;
};

export interface DegradedResult<T> {
  agent: string;
  /** Always present, even after a total failure */
  data: T;
  missingData: readonly string[];
  /** In [0.2, 0.7] */
  qualityPenalty: number;
  fallbackMode: FallbackMode;
  reason: DegradationReason;
  errorMessage: string;
}

export interface StageOutcome<T> {
  result: T;
  degraded: DegradedResult<T> | null;
  durationMs: number;
  /** False when the breaker short-circuited and the agent never ran */
  invoked: boolean;
}

export interface ExecuteOptions {
  deadlineMs: number;
  signal?: AbortSignal;
}

/** Sink for observed agent execution durations. */
export interface ExecutionRecorder {
  recordExecution(agent: string, durationMs: number, succeeded: boolean): void;
}

export interface DegradationManagerConfig<TResults> {
  breakers: CircuitBreakerRegistry;
  fallbacks: FallbackRegistry<TResults>;
  recorder?: ExecutionRecorder;
  logger?: Logger;
  metrics?: MetricsProvider;
  now?: () => number;
}
