/**
 * Failure isolation for agent calls: circuit breakers, deadlines and
 * graceful degradation.
 *
 * @module
 */

export type {
  CircuitState,
  HalfOpenTrial,
  CircuitBreakerConfig,
  CircuitBreakerOptions,
  CircuitStateChange,
  CircuitFallbackReason,
  CircuitFallback,
  CircuitBreakerState,
  FallbackMode,
  DegradationReason,
  FallbackContext,
  AgentFallback,
  FallbackRegistry,
  DegradedResult,
  StageOutcome,
  ExecuteOptions,
  ExecutionRecorder,
  DegradationManagerConfig,
} from './types.js';

export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  DEFAULT_AGENT_BREAKER_CONFIGS,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_BASE_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_BACKOFF_MULTIPLIER,
  type CircuitBreakerRegistryConfig,
} from './circuit-breaker.js';

export {
  DegradationManager,
  malformedOnThrow,
  FALLBACK_QUALITY_PENALTY,
  TOTAL_FAILURE_QUALITY_PENALTY,
} from './degradation.js';

export { withDeadline, linkAbortSignal } from './timeout.js';

export {
  AgentFailureError,
  AgentTimeoutError,
  MalformedResultError,
  CircuitOpenError,
} from './errors.js';
