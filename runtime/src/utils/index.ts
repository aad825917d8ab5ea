/**
 * Utility exports for @trustlens/runtime
 * @module
 */

export { type Logger, type LogLevel, LOG_LEVEL_NAMES, createLogger, silentLogger } from './logger.js';

export { sleep, toErrorMessage, createDeferred, THIRTY_DAYS_MS, type Deferred } from './async.js';

export { clamp01, clamp, clampRatio, saturate, roundTo, mean } from './numeric.js';

export { isRecord, isStringArray, isOneOf } from './type-guards.js';

export {
  validationResult,
  requireFiniteNumber,
  requireNumberRange,
  requireOneOf,
  requireIntRange,
  requireRecord,
  type ValidationResult,
} from './validation.js';

export { Semaphore } from './semaphore.js';
