/**
 * Per-dependency circuit breaker with exponential open-cycle backoff.
 *
 * A breaker is long-lived and shared by every audit that calls the same
 * dependency. All state changes happen synchronously between awaits, so
 * concurrent audits on the event loop never observe a half-applied update.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { isConfigurationError } from '../types/errors.js';
import { CircuitOpenError } from './errors.js';
import type {
  CircuitBreakerConfig,
  CircuitBreakerOptions,
  CircuitBreakerState,
  CircuitFallback,
  CircuitFallbackReason,
  CircuitState,
  CircuitStateChange,
  HalfOpenTrial,
} from './types.js';

export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_BASE_BACKOFF_MS = 30_000;
export const DEFAULT_MAX_BACKOFF_MS = 300_000;
export const DEFAULT_BACKOFF_MULTIPLIER = 2;

type Admission = { run: true; trial: boolean } | { run: false; reason: CircuitFallbackReason };

export class CircuitBreaker {
  readonly name: string;

  private readonly failureThreshold: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly backoffMultiplier: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly ignoreError?: (error: unknown) => boolean;
  private readonly onStateChange?: (change: CircuitStateChange) => void;

  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;
  private currentBackoffMs: number;
  private nextAttemptAt: number | null = null;
  private halfOpenTrial: HalfOpenTrial = 'idle';
  private openCycles = 0;
  private totalCalls = 0;
  private totalFailures = 0;
  private totalShortCircuits = 0;

  constructor(name: string, options: CircuitBreakerOptions = {}) {
    this.name = name;
    this.failureThreshold = Math.max(1, Math.floor(options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD));
    this.baseBackoffMs = Math.max(0, options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS);
    this.maxBackoffMs = Math.max(this.baseBackoffMs, options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS);
    this.backoffMultiplier = Math.max(1, options.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.ignoreError = options.ignoreError;
    this.onStateChange = options.onStateChange;
    this.currentBackoffMs = this.baseBackoffMs;
  }

  /**
   * Run `operation` through the breaker.
   *
   * Without a `fallback`, a rejected call throws {@link CircuitOpenError} and
   * a failed call rethrows the operation's error.
   */
  async call<T>(operation: () => Promise<T>, fallback?: CircuitFallback<T>): Promise<T> {
    this.totalCalls += 1;
    const admission = this.admit();

    if (!admission.run) {
      this.totalShortCircuits += 1;
      return this.serveFallback(admission.reason, fallback);
    }

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (this.ignoreError?.(error)) {
        if (admission.trial) {
          // Inconclusive trial: let the next caller try again.
          this.halfOpenTrial = 'idle';
        }
        throw error;
      }
      this.recordFailure(admission.trial);
      return this.serveFallback({ kind: 'failure', error }, fallback);
    }

    this.recordSuccess(admission.trial);
    return result;
  }

  getState(): CircuitBreakerState {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
      currentBackoffMs: this.currentBackoffMs,
      nextAttemptAt: this.nextAttemptAt,
      halfOpenTrial: this.halfOpenTrial,
      openCycles: this.openCycles,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
      totalShortCircuits: this.totalShortCircuits,
    };
  }

  /** Force the circuit back to CLOSED with base backoff. Counters are kept. */
  reset(): void {
    this.transition('CLOSED');
    this.consecutiveFailures = 0;
    this.openCycles = 0;
    this.currentBackoffMs = this.baseBackoffMs;
    this.nextAttemptAt = null;
    this.halfOpenTrial = 'idle';
  }

  // --------------------------------------------------------------------------
  // State machine
  // --------------------------------------------------------------------------

  private admit(): Admission {
    if (this.state === 'CLOSED') {
      return { run: true, trial: false };
    }

    if (this.state === 'OPEN') {
      const retryAt = this.nextAttemptAt ?? 0;
      if (this.now() < retryAt) {
        return { run: false, reason: { kind: 'open', retryAt } };
      }
      this.transition('HALF_OPEN');
      this.halfOpenTrial = 'in_flight';
      return { run: true, trial: true };
    }

    if (this.halfOpenTrial === 'in_flight') {
      return { run: false, reason: { kind: 'half_open_busy' } };
    }
    this.halfOpenTrial = 'in_flight';
    return { run: true, trial: true };
  }

  private recordSuccess(trial: boolean): void {
    if (trial) {
      this.halfOpenTrial = 'succeeded';
      this.consecutiveFailures = 0;
      this.openCycles = 0;
      this.currentBackoffMs = this.baseBackoffMs;
      this.nextAttemptAt = null;
      this.transition('CLOSED');
      return;
    }
    if (this.state === 'CLOSED') {
      this.consecutiveFailures = 0;
    }
    // A late success admitted before the circuit opened does not close it.
  }

  private recordFailure(trial: boolean): void {
    this.totalFailures += 1;
    this.lastFailureAt = this.now();

    if (trial) {
      this.halfOpenTrial = 'failed';
      this.open();
      return;
    }
    if (this.state !== 'CLOSED') {
      return;
    }
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    this.openCycles += 1;
    this.currentBackoffMs = Math.min(
      this.maxBackoffMs,
      this.baseBackoffMs * this.backoffMultiplier ** (this.openCycles - 1),
    );
    this.nextAttemptAt = this.now() + this.currentBackoffMs;
    this.transition('OPEN');
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;

    const change: CircuitStateChange = {
      name: this.name,
      from,
      to,
      at: this.now(),
      backoffMs: this.currentBackoffMs,
    };
    if (to === 'OPEN') {
      this.logger.warn(
        `Circuit "${this.name}" opened for ${this.currentBackoffMs}ms (cycle ${this.openCycles})`,
      );
    } else {
      this.logger.info(`Circuit "${this.name}" ${from} -> ${to}`);
    }
    this.onStateChange?.(change);
  }

  private async serveFallback<T>(
    reason: CircuitFallbackReason,
    fallback: CircuitFallback<T> | undefined,
  ): Promise<T> {
    if (fallback) {
      return fallback(reason);
    }
    if (reason.kind === 'failure') {
      throw reason.error;
    }
    throw new CircuitOpenError(this.name, reason.kind === 'open' ? reason.retryAt : undefined);
  }
}

// ============================================================================
// Registry
// ============================================================================

/** Per-agent breaker defaults. */
export const DEFAULT_AGENT_BREAKER_CONFIGS: Readonly<Record<string, CircuitBreakerConfig>> = {
  scout: { failureThreshold: 3, baseBackoffMs: 30_000 },
  vision: { failureThreshold: 3, baseBackoffMs: 60_000 },
  graph: { failureThreshold: 5, baseBackoffMs: 30_000 },
  security: { failureThreshold: 3, baseBackoffMs: 45_000 },
  judge: { failureThreshold: 3, baseBackoffMs: 30_000 },
};

export interface CircuitBreakerRegistryConfig {
  /** Per-name configuration, merged over {@link DEFAULT_AGENT_BREAKER_CONFIGS} */
  configs?: Readonly<Record<string, CircuitBreakerConfig>>;
  now?: () => number;
  logger?: Logger;
  /** Defaults to treating configuration errors as non-failures. */
  ignoreError?: (error: unknown) => boolean;
  onStateChange?: (change: CircuitStateChange) => void;
}

/**
 * Process-wide set of breakers, one per dependency name, created on first use.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly configs: Readonly<Record<string, CircuitBreakerConfig>>;
  private readonly options: CircuitBreakerRegistryConfig;

  constructor(config: CircuitBreakerRegistryConfig = {}) {
    this.options = config;
    this.configs = { ...DEFAULT_AGENT_BREAKER_CONFIGS, ...config.configs };
  }

  get(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(name, {
        ...this.configs[name],
        now: this.options.now,
        logger: this.options.logger,
        ignoreError: this.options.ignoreError ?? isConfigurationError,
        onStateChange: this.options.onStateChange,
      });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  names(): string[] {
    return [...this.breakers.keys()];
  }

  snapshot(): CircuitBreakerState[] {
    return [...this.breakers.values()].map((breaker) => breaker.getState());
  }

  /** Reset one breaker, or all of them. */
  reset(name?: string): void {
    if (name !== undefined) {
      this.breakers.get(name)?.reset();
      return;
    }
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}
