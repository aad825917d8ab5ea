/**
 * Agent failure types recovered by the resilience layer.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

/**
 * An agent call raised, or was cancelled before it produced a result.
 */
export class AgentFailureError extends RuntimeError {
  public readonly agentName: string;

  constructor(agentName: string, message: string, cause?: unknown) {
    super(`${agentName} failed: ${message}`, RuntimeErrorCodes.AGENT_FAILURE);
    this.name = 'AgentFailureError';
    this.agentName = agentName;
    this.cause = cause;
  }
}

/**
 * An agent call exceeded its deadline and was aborted.
 */
export class AgentTimeoutError extends RuntimeError {
  public readonly agentName: string;
  public readonly timeoutMs: number;

  constructor(agentName: string, timeoutMs: number) {
    super(`${agentName} timed out after ${timeoutMs}ms`, RuntimeErrorCodes.AGENT_TIMEOUT);
    this.name = 'AgentTimeoutError';
    this.agentName = agentName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An agent returned a value that failed its result schema.
 */
export class MalformedResultError extends RuntimeError {
  public readonly agentName: string;
  public readonly issues: readonly string[];

  constructor(agentName: string, issues: readonly string[]) {
    super(
      `${agentName} returned a malformed result: ${issues.join('; ')}`,
      RuntimeErrorCodes.MALFORMED_RESULT,
    );
    this.name = 'MalformedResultError';
    this.agentName = agentName;
    this.issues = issues;
  }
}

/**
 * Raised by a circuit breaker call that has no fallback while the circuit
 * rejects calls.
 */
export class CircuitOpenError extends RuntimeError {
  public readonly breakerName: string;
  /** Epoch ms of the next permitted trial, when known */
  public readonly retryAt?: number;

  constructor(breakerName: string, retryAt?: number) {
    super(
      retryAt !== undefined
        ? `Circuit "${breakerName}" is open until ${new Date(retryAt).toISOString()}`
        : `Circuit "${breakerName}" is open`,
      RuntimeErrorCodes.CIRCUIT_OPEN,
    );
    this.name = 'CircuitOpenError';
    this.breakerName = breakerName;
    this.retryAt = retryAt;
  }
}
