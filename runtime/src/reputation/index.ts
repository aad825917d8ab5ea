/**
 * Source reputation tracking and persistence.
 *
 * @module
 */

export {
  CORE_SOURCES,
  VERDICT_TYPES,
  type VerdictType,
  type PredictionRecord,
  type SourceReputationSnapshot,
  type ReputationSummary,
  type ReputationManagerConfig,
  type ReputationStore,
} from './types.js';

export {
  ReputationManager,
  isPredictionCorrect,
  volumeBonus,
  thresholdForReputation,
  NEUTRAL_ACCURACY,
} from './manager.js';

export { InMemoryReputationStore } from './store.js';
export { SqliteReputationStore, type SqliteReputationStoreConfig } from './sqlite-store.js';
export { ReputationStoreError } from './errors.js';
