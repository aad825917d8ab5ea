/**
 * Engine configuration.
 *
 * @module
 */

export type {
  EngineConfig,
  EngineConfigInput,
  LoggingSettings,
  AuditSettings,
  TimeoutSettings,
  ReputationSettings,
  ScoringSettings,
} from './types.js';
export {
  DEFAULT_ENGINE_CONFIG,
  getDefaultConfigPath,
  parseEngineConfig,
  validateEngineConfig,
  mergeEngineConfig,
  loadEngineConfig,
  type ParsedEngineConfig,
} from './loader.js';
