/**
 * Complexity analysis and adaptive deadline budgeting.
 *
 * @module
 */

export type {
  ComplexityMetrics,
  ComplexitySubScores,
  TimeoutStrategy,
  BudgetTier,
  TimeoutConfig,
  TimeoutTable,
  TimeoutManagerConfig,
  ExecutionSample,
  ExecutionStats,
} from './types.js';

export {
  ComplexityAnalyzer,
  COMPLEXITY_CEILINGS,
  COMPLEXITY_WEIGHTS,
} from './complexity-analyzer.js';

export {
  TimeoutManager,
  tierForComplexity,
  DEFAULT_TIMEOUT_TABLE,
  FAST_COMPLEXITY_CEILING,
  STANDARD_COMPLEXITY_CEILING,
  ADAPTIVE_SAFETY_FACTOR,
  DEFAULT_MIN_DEADLINE_MS,
} from './timeout-manager.js';
