/**
 * Graceful degradation around agent calls.
 *
 * Every call runs inside the agent's circuit breaker and under a deadline.
 * Whatever happens (short-circuit, timeout, thrown error, malformed result)
 * the caller gets a usable payload back; failures come with a
 * {@link DegradedResult} describing what is missing and how much the final
 * score should be discounted.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';
import { isConfigurationError } from '../types/errors.js';
import type { MetricsProvider } from '../telemetry/types.js';
import { TELEMETRY_METRIC_NAMES } from '../telemetry/metric-names.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { AgentTimeoutError, MalformedResultError } from './errors.js';
import { withDeadline } from './timeout.js';
import type {
  AgentFallback,
  CircuitFallbackReason,
  DegradationManagerConfig,
  DegradationReason,
  DegradedResult,
  ExecuteOptions,
  ExecutionRecorder,
  FallbackRegistry,
  StageOutcome,
} from './types.js';

/** Penalty when the registered fallback produced simplified data. */
export const FALLBACK_QUALITY_PENALTY = 0.2;
/** Penalty when only the neutral baseline payload is available. */
export const TOTAL_FAILURE_QUALITY_PENALTY = 0.7;

type Attempt<T> = { ok: true; value: T } | { ok: false; degraded: DegradedResult<T> };

function classify(reason: CircuitFallbackReason): { reason: DegradationReason; error?: unknown } {
  if (reason.kind !== 'failure') {
    return { reason: 'circuit_open' };
  }
  if (reason.error instanceof AgentTimeoutError) {
    return { reason: 'timeout', error: reason.error };
  }
  if (reason.error instanceof MalformedResultError) {
    return { reason: 'malformed_result', error: reason.error };
  }
  return { reason: 'error', error: reason.error };
}

function describeReason(reason: CircuitFallbackReason): string {
  switch (reason.kind) {
    case 'open':
      return `circuit open until ${new Date(reason.retryAt).toISOString()}`;
    case 'half_open_busy':
      return 'circuit half-open, trial call in flight';
    case 'failure':
      return toErrorMessage(reason.error);
  }
}

/**
 * Runs agent operations with breaker, deadline and fallback handling.
 *
 * `TResults` maps each agent name to its result type; the constructor
 * requires a fallback for every one of them.
 */
export class DegradationManager<TResults extends object> {
  private readonly breakers: CircuitBreakerRegistry;
  private readonly fallbacks: FallbackRegistry<TResults>;
  private readonly recorder?: ExecutionRecorder;
  private readonly logger: Logger;
  private readonly metrics?: MetricsProvider;
  private readonly now: () => number;

  constructor(config: DegradationManagerConfig<TResults>) {
    this.breakers = config.breakers;
    this.fallbacks = config.fallbacks;
    this.recorder = config.recorder;
    this.logger = config.logger ?? silentLogger;
    this.metrics = config.metrics;
    this.now = config.now ?? Date.now;
  }

  async execute<K extends keyof TResults & string>(
    agent: K,
    operation: (signal: AbortSignal) => Promise<TResults[K]>,
    options: ExecuteOptions,
  ): Promise<StageOutcome<TResults[K]>> {
    const registration: AgentFallback<TResults[K]> = this.fallbacks[agent];
    const breaker = this.breakers.get(agent);
    const startedAt = this.now();
    let invoked = false;

    const attempt = await breaker.call<Attempt<TResults[K]>>(
      async () => {
        invoked = true;
        const callStartedAt = this.now();
        try {
          const raw = await withDeadline(operation, options.deadlineMs, agent, options.signal);
          const value = registration.validate ? registration.validate(raw) : raw;
          this.recorder?.recordExecution(agent, this.now() - callStartedAt, true);
          return { ok: true, value };
        } catch (error) {
          this.recorder?.recordExecution(agent, this.now() - callStartedAt, false);
          throw error;
        }
      },
      async (reason) => ({ ok: false, degraded: await this.degrade(agent, registration, reason) }),
    );

    const durationMs = this.now() - startedAt;
    if (attempt.ok) {
      return { result: attempt.value, degraded: null, durationMs, invoked };
    }
    return { result: attempt.degraded.data, degraded: attempt.degraded, durationMs, invoked };
  }

  private async degrade<T>(
    agent: string,
    registration: AgentFallback<T>,
    cause: CircuitFallbackReason,
  ): Promise<DegradedResult<T>> {
    const { reason, error } = classify(cause);
    const errorMessage = describeReason(cause);
    this.metrics?.counter(TELEMETRY_METRIC_NAMES.STAGE_DEGRADED_TOTAL, 1, { agent, reason });

    let data: T | undefined;
    try {
      data = await registration.produce({ agent, reason, error });
    } catch (fallbackError) {
      if (isConfigurationError(fallbackError)) throw fallbackError;
      this.logger.warn(
        `Fallback for ${agent} failed (${toErrorMessage(fallbackError)}); using baseline data`,
      );
    }

    if (data === undefined || data === null) {
      this.logger.warn(`${agent} degraded to baseline: ${errorMessage}`);
      return {
        agent,
        data: registration.baseline(),
        missingData: registration.missingFields,
        qualityPenalty: TOTAL_FAILURE_QUALITY_PENALTY,
        fallbackMode: 'PARTIAL',
        reason,
        errorMessage,
      };
    }

    this.logger.warn(`${agent} degraded (${registration.mode}): ${errorMessage}`);
    return {
      agent,
      data,
      missingData: registration.missingFields,
      qualityPenalty: FALLBACK_QUALITY_PENALTY,
      fallbackMode: registration.mode,
      reason,
      errorMessage,
    };
  }
}

/**
 * Wrap a validation function so its failures surface as
 * {@link MalformedResultError}.
 */
export function malformedOnThrow<T>(
  agent: string,
  parse: (value: unknown) => T,
  formatIssues: (error: unknown) => string[] = (error) => [toErrorMessage(error)],
): (value: unknown) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new MalformedResultError(agent, formatIssues(error));
    }
  };
}
