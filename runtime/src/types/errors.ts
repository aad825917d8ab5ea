/**
 * Error types for @trustlens/runtime.
 *
 * Every error raised by the runtime extends {@link RuntimeError} and carries
 * a stable string code from {@link RuntimeErrorCodes}. Module-specific
 * subclasses live beside their modules (resilience/errors.ts,
 * audit/errors.ts, reputation/errors.ts).
 *
 * @module
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

/**
 * Runtime error codes.
 */
export const RuntimeErrorCodes = {
  /** Input validation failed */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** Unknown site type, missing weight entry, or an invalid config file */
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  /** An agent raised an error */
  AGENT_FAILURE: 'AGENT_FAILURE',
  /** An agent did not finish before its deadline */
  AGENT_TIMEOUT: 'AGENT_TIMEOUT',
  /** An agent returned a value that does not match its result contract */
  MALFORMED_RESULT: 'MALFORMED_RESULT',
  /** A circuit breaker rejected the call without running it */
  CIRCUIT_OPEN: 'CIRCUIT_OPEN',
  /** No audit exists for the given id */
  AUDIT_NOT_FOUND: 'AUDIT_NOT_FOUND',
  /** The audit service is shutting down or cannot accept work */
  AUDIT_UNAVAILABLE: 'AUDIT_UNAVAILABLE',
  /** An audit run was aborted by its caller */
  AUDIT_CANCELLED: 'AUDIT_CANCELLED',
  /** Reading or writing persisted reputation state failed */
  REPUTATION_STORE_ERROR: 'REPUTATION_STORE_ERROR',
  /** The shared browser could not be launched or is closed */
  BROWSER_UNAVAILABLE: 'BROWSER_UNAVAILABLE',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Runtime Error Class
// ============================================================================

/**
 * Base class for all runtime errors.
 *
 * @example
 * ```typescript
 * try {
 *   engine.score(signals, 'casino', conditions);
 * } catch (err) {
 *   if (err instanceof RuntimeError) {
 *     console.log(`Runtime error: ${err.code} - ${err.message}`);
 *   }
 * }
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Shared Error Classes
// ============================================================================

/**
 * Error thrown when input validation fails.
 */
export class ValidationError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
  }
}

/**
 * Fatal configuration problem. Aborts an audit with the ERROR status.
 *
 * @example
 * ```typescript
 * if (!profile) {
 *   throw new ConfigurationError(`Unknown site type "${siteType}"`);
 * }
 * ```
 */
export class ConfigurationError extends RuntimeError {
  /** Individual problems, when the error aggregates several */
  public readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(message, RuntimeErrorCodes.CONFIGURATION_ERROR);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Type guard to check if an error is a RuntimeError.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
