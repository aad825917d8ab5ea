/**
 * @trustlens/runtime - website fraud audit orchestration and trust scoring
 *
 * This is the main entry point for the @trustlens/runtime package. It
 * re-exports the runtime, the audit service and orchestrator, the resilience
 * and budgeting primitives, the scoring engine and source reputation.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Runtime class
export {
  TrustLensRuntime,
  CIRCUIT_STATE_GAUGE,
  type TrustLensRuntimeConfig,
  type AgentDependencies,
} from './runtime.js';

// Errors
export {
  RuntimeErrorCodes,
  RuntimeError,
  ValidationError,
  ConfigurationError,
  isRuntimeError,
  isConfigurationError,
  type RuntimeErrorCode,
} from './types/errors.js';
export { AGENT_NAMES } from './types/agents.js';

// Module barrels
export * from './audit/index.js';
export * from './agents/index.js';
export * from './browser/index.js';
export * from './budget/index.js';
export * from './config/index.js';
export * from './reputation/index.js';
export * from './resilience/index.js';
export * from './scoring/index.js';
export * from './telemetry/index.js';
export * from './utils/index.js';
