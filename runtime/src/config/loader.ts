/**
 * Engine configuration loading, validation and defaults.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIDENCE_THRESHOLD, DEFAULT_PAGES_PER_ITERATION } from '../agents/judge.js';
import { DEFAULT_PENALTY_FLOOR } from '../audit/penalty.js';
import { DEFAULT_SINK_TIMEOUT_MS } from '../audit/orchestrator.js';
import {
  DEFAULT_FINISHED_AUDIT_RETENTION_MS,
  DEFAULT_MAX_CONCURRENT_AUDITS,
  DEFAULT_MAX_FINISHED_AUDITS,
} from '../audit/service.js';
import { isAuditTier, type TierBudgetOverrides } from '../audit/tiers.js';
import type { AuditBudget } from '../audit/types.js';
import { DEFAULT_MIN_DEADLINE_MS } from '../budget/timeout-manager.js';
import type { BudgetTier, TimeoutConfig, TimeoutStrategy } from '../budget/types.js';
import type { CircuitBreakerConfig } from '../resilience/types.js';
import { SIGNAL_NAMES, SITE_TYPES, type SignalWeights, type SiteType } from '../scoring/types.js';
import { AGENT_NAMES, type AgentName } from '../types/agents.js';
import { ConfigurationError } from '../types/errors.js';
import { THIRTY_DAYS_MS, toErrorMessage } from '../utils/async.js';
import { LOG_LEVEL_NAMES, type LogLevel } from '../utils/logger.js';
import { isOneOf } from '../utils/type-guards.js';
import {
  requireIntRange,
  requireNumberRange,
  requireOneOf,
  requireRecord,
  validationResult,
  type ValidationResult,
} from '../utils/validation.js';
import type {
  AuditSettings,
  EngineConfig,
  EngineConfigInput,
  ReputationSettings,
  ScoringSettings,
  TimeoutSettings,
} from './types.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  logging: { level: 'info' },
  audit: {
    confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
    maxPagesPerIteration: DEFAULT_PAGES_PER_ITERATION,
    maxConcurrentAudits: DEFAULT_MAX_CONCURRENT_AUDITS,
    penaltyFloor: DEFAULT_PENALTY_FLOOR,
    sinkTimeoutMs: DEFAULT_SINK_TIMEOUT_MS,
    finishedAuditRetentionMs: DEFAULT_FINISHED_AUDIT_RETENTION_MS,
    maxFinishedAudits: DEFAULT_MAX_FINISHED_AUDITS,
  },
  tiers: {},
  timeouts: {
    strategy: 'ADAPTIVE',
    minSamples: 3,
    historyCapacity: 10,
    minDeadlineMs: DEFAULT_MIN_DEADLINE_MS,
    tiers: {},
  },
  circuitBreakers: {},
  scoring: { weightOverrides: {} },
  reputation: { dbPath: null },
};

export function getDefaultConfigPath(): string {
  return process.env.TRUSTLENS_CONFIG ?? join(homedir(), '.trustlens', 'config.json');
}

// ============================================================================
// Field readers
// ============================================================================

const TOP_LEVEL_KEYS: readonly string[] = [
  'logging',
  'audit',
  'tiers',
  'timeouts',
  'circuitBreakers',
  'scoring',
  'reputation',
];
const TIMEOUT_STRATEGIES = new Set<TimeoutStrategy>(['FAST', 'STANDARD', 'CONSERVATIVE', 'ADAPTIVE']);
const BUDGET_TIERS: readonly BudgetTier[] = ['FAST', 'STANDARD', 'CONSERVATIVE'];
const MAX_DEADLINE_MS = 600_000;
const MAX_BACKOFF_MS = 3_600_000;

function rejectUnknownKeys(
  section: Record<string, unknown>,
  field: string,
  known: readonly string[],
  errors: string[],
): void {
  for (const key of Object.keys(section)) {
    if (!known.includes(key)) errors.push(`${field}.${key} is not a known setting`);
  }
}

function optionalInt(
  section: Record<string, unknown>,
  key: string,
  field: string,
  min: number,
  max: number,
  errors: string[],
): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  requireIntRange(value, `${field}.${key}`, min, max, errors);
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

function optionalNumber(
  section: Record<string, unknown>,
  key: string,
  field: string,
  min: number,
  max: number,
  errors: string[],
): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  requireNumberRange(value, `${field}.${key}`, min, max, errors);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** Copy defined entries only, so a partial section never masks a default. */
function compact<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (!isOwnKey(value, key)) continue;
    const entry = value[key];
    if (entry !== undefined) result[key] = entry;
  }
  return result;
}

function isOwnKey<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(value, key);
}

// ============================================================================
// Section parsers
// ============================================================================

function parseLogging(raw: unknown, errors: string[]): EngineConfigInput['logging'] {
  const section = requireRecord(raw, 'logging', errors);
  if (!section) return undefined;
  rejectUnknownKeys(section, 'logging', ['level'], errors);
  const level = section.level;
  if (level === undefined) return {};
  requireOneOf(level, 'logging.level', LOG_LEVEL_NAMES, errors);
  const levels: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
  return isOneOf(level, levels) ? { level } : {};
}

function parseAudit(raw: unknown, errors: string[]): Partial<AuditSettings> | undefined {
  const section = requireRecord(raw, 'audit', errors);
  if (!section) return undefined;
  rejectUnknownKeys(
    section,
    'audit',
    [
      'confidenceThreshold',
      'maxPagesPerIteration',
      'maxConcurrentAudits',
      'penaltyFloor',
      'sinkTimeoutMs',
      'finishedAuditRetentionMs',
      'maxFinishedAudits',
    ],
    errors,
  );
  return compact({
    confidenceThreshold: optionalNumber(section, 'confidenceThreshold', 'audit', 0, 1, errors),
    maxPagesPerIteration: optionalInt(section, 'maxPagesPerIteration', 'audit', 1, 50, errors),
    maxConcurrentAudits: optionalInt(section, 'maxConcurrentAudits', 'audit', 1, 256, errors),
    penaltyFloor: optionalInt(section, 'penaltyFloor', 'audit', 0, 100, errors),
    sinkTimeoutMs: optionalInt(section, 'sinkTimeoutMs', 'audit', 0, 60_000, errors),
    finishedAuditRetentionMs: optionalInt(section, 'finishedAuditRetentionMs', 'audit', 0, THIRTY_DAYS_MS, errors),
    maxFinishedAudits: optionalInt(section, 'maxFinishedAudits', 'audit', 0, 100_000, errors),
  });
}

function parseBudget(raw: unknown, field: string, errors: string[]): Partial<AuditBudget> {
  const section = requireRecord(raw, field, errors);
  if (!section) return {};
  rejectUnknownKeys(section, field, ['maxIterations', 'maxElapsedMs', 'maxExternalCalls', 'maxPages'], errors);
  return compact({
    maxIterations: optionalInt(section, 'maxIterations', field, 1, 50, errors),
    maxElapsedMs: optionalInt(section, 'maxElapsedMs', field, 1, 3_600_000, errors),
    maxExternalCalls: optionalInt(section, 'maxExternalCalls', field, 1, 1_000, errors),
    maxPages: optionalInt(section, 'maxPages', field, 1, 100, errors),
  });
}

function parseTiers(raw: unknown, errors: string[]): TierBudgetOverrides | undefined {
  const section = requireRecord(raw, 'tiers', errors);
  if (!section) return undefined;
  const tiers: TierBudgetOverrides = {};
  for (const [key, value] of Object.entries(section)) {
    if (!isAuditTier(key)) {
      errors.push(`tiers.${key} is not a known audit tier`);
      continue;
    }
    tiers[key] = parseBudget(value, `tiers.${key}`, errors);
  }
  return tiers;
}

function parseDeadlines(raw: unknown, field: string, errors: string[]): Partial<TimeoutConfig> {
  const section = requireRecord(raw, field, errors);
  if (!section) return {};
  const deadlines: Partial<TimeoutConfig> = {};
  for (const key of Object.keys(section)) {
    if (!isOneOf(key, AGENT_NAMES)) {
      errors.push(`${field}.${key} is not a known agent`);
      continue;
    }
    const value = optionalInt(section, key, field, 1, MAX_DEADLINE_MS, errors);
    if (value !== undefined) deadlines[key] = value;
  }
  return deadlines;
}

function parseTimeouts(raw: unknown, errors: string[]): Partial<TimeoutSettings> | undefined {
  const section = requireRecord(raw, 'timeouts', errors);
  if (!section) return undefined;
  rejectUnknownKeys(section, 'timeouts', ['strategy', 'minSamples', 'historyCapacity', 'minDeadlineMs', 'tiers'], errors);

  const result: Partial<TimeoutSettings> = compact({
    minSamples: optionalInt(section, 'minSamples', 'timeouts', 1, 100, errors),
    historyCapacity: optionalInt(section, 'historyCapacity', 'timeouts', 1, 1_000, errors),
    minDeadlineMs: optionalInt(section, 'minDeadlineMs', 'timeouts', 0, MAX_DEADLINE_MS, errors),
  });
  const strategy = section.strategy;
  if (strategy !== undefined) {
    requireOneOf(strategy, 'timeouts.strategy', TIMEOUT_STRATEGIES, errors);
    if (isOneOf(strategy, [...TIMEOUT_STRATEGIES])) result.strategy = strategy;
  }
  if (section.tiers !== undefined) {
    const tierSection = requireRecord(section.tiers, 'timeouts.tiers', errors);
    if (tierSection) {
      const tiers: TimeoutSettings['tiers'] = {};
      for (const [key, value] of Object.entries(tierSection)) {
        if (!isOneOf(key, BUDGET_TIERS)) {
          errors.push(`timeouts.tiers.${key} is not a known timeout tier`);
          continue;
        }
        tiers[key] = parseDeadlines(value, `timeouts.tiers.${key}`, errors);
      }
      result.tiers = tiers;
    }
  }
  return result;
}

function parseBreaker(raw: unknown, field: string, errors: string[]): CircuitBreakerConfig {
  const section = requireRecord(raw, field, errors);
  if (!section) return {};
  rejectUnknownKeys(
    section,
    field,
    ['failureThreshold', 'baseBackoffMs', 'maxBackoffMs', 'backoffMultiplier'],
    errors,
  );
  const config = compact({
    failureThreshold: optionalInt(section, 'failureThreshold', field, 1, 100, errors),
    baseBackoffMs: optionalInt(section, 'baseBackoffMs', field, 0, MAX_BACKOFF_MS, errors),
    maxBackoffMs: optionalInt(section, 'maxBackoffMs', field, 0, MAX_BACKOFF_MS, errors),
    backoffMultiplier: optionalNumber(section, 'backoffMultiplier', field, 1, 10, errors),
  });
  if (
    config.baseBackoffMs !== undefined &&
    config.maxBackoffMs !== undefined &&
    config.maxBackoffMs < config.baseBackoffMs
  ) {
    errors.push(`${field}.maxBackoffMs must not be below baseBackoffMs`);
  }
  return config;
}

function parseBreakers(raw: unknown, errors: string[]): Partial<Record<AgentName, CircuitBreakerConfig>> | undefined {
  const section = requireRecord(raw, 'circuitBreakers', errors);
  if (!section) return undefined;
  const breakers: Partial<Record<AgentName, CircuitBreakerConfig>> = {};
  for (const [key, value] of Object.entries(section)) {
    if (!isOneOf(key, AGENT_NAMES)) {
      errors.push(`circuitBreakers.${key} is not a known agent`);
      continue;
    }
    breakers[key] = parseBreaker(value, `circuitBreakers.${key}`, errors);
  }
  return breakers;
}

function parseWeights(raw: unknown, field: string, errors: string[]): Partial<SignalWeights> {
  const section = requireRecord(raw, field, errors);
  if (!section) return {};
  const weights: Partial<SignalWeights> = {};
  for (const key of Object.keys(section)) {
    if (!isOneOf(key, SIGNAL_NAMES)) {
      errors.push(`${field}.${key} is not a known signal`);
      continue;
    }
    const value = optionalNumber(section, key, field, 0, 1, errors);
    if (value !== undefined) weights[key] = value;
  }
  return weights;
}

function parseScoring(raw: unknown, errors: string[]): Partial<ScoringSettings> | undefined {
  const section = requireRecord(raw, 'scoring', errors);
  if (!section) return undefined;
  rejectUnknownKeys(section, 'scoring', ['weightOverrides'], errors);
  if (section.weightOverrides === undefined) return {};
  const overrides = requireRecord(section.weightOverrides, 'scoring.weightOverrides', errors);
  if (!overrides) return {};
  const weightOverrides: Partial<Record<SiteType, Partial<SignalWeights>>> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (!isOneOf(key, SITE_TYPES)) {
      errors.push(`scoring.weightOverrides.${key} is not a known site type`);
      continue;
    }
    weightOverrides[key] = parseWeights(value, `scoring.weightOverrides.${key}`, errors);
  }
  return { weightOverrides };
}

function parseReputation(raw: unknown, errors: string[]): Partial<ReputationSettings> | undefined {
  const section = requireRecord(raw, 'reputation', errors);
  if (!section) return undefined;
  rejectUnknownKeys(section, 'reputation', ['dbPath'], errors);
  const dbPath = section.dbPath;
  if (dbPath === undefined) return {};
  if (dbPath === null) return { dbPath: null };
  if (typeof dbPath !== 'string' || dbPath.trim() === '') {
    errors.push('reputation.dbPath must be a non-empty string or null');
    return {};
  }
  return { dbPath };
}

// ============================================================================
// Public API
// ============================================================================

export interface ParsedEngineConfig {
  input: EngineConfigInput;
  errors: string[];
}

/** Read a raw config value into its typed form, collecting every problem. */
export function parseEngineConfig(value: unknown): ParsedEngineConfig {
  const errors: string[] = [];
  const root = requireRecord(value, 'config', errors);
  if (!root) return { input: {}, errors };
  rejectUnknownKeys(root, 'config', TOP_LEVEL_KEYS, errors);

  const input: EngineConfigInput = {};
  if (root.logging !== undefined) input.logging = parseLogging(root.logging, errors);
  if (root.audit !== undefined) input.audit = parseAudit(root.audit, errors);
  if (root.tiers !== undefined) input.tiers = parseTiers(root.tiers, errors);
  if (root.timeouts !== undefined) input.timeouts = parseTimeouts(root.timeouts, errors);
  if (root.circuitBreakers !== undefined) input.circuitBreakers = parseBreakers(root.circuitBreakers, errors);
  if (root.scoring !== undefined) input.scoring = parseScoring(root.scoring, errors);
  if (root.reputation !== undefined) input.reputation = parseReputation(root.reputation, errors);
  return { input, errors };
}

export function validateEngineConfig(value: unknown): ValidationResult {
  return validationResult(parseEngineConfig(value).errors);
}

/** Merge a partial config over {@link DEFAULT_ENGINE_CONFIG}. */
export function mergeEngineConfig(partial: EngineConfigInput = {}): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  return {
    logging: { ...defaults.logging, ...partial.logging },
    audit: { ...defaults.audit, ...partial.audit },
    tiers: { ...defaults.tiers, ...partial.tiers },
    timeouts: {
      ...defaults.timeouts,
      ...partial.timeouts,
      tiers: { ...defaults.timeouts.tiers, ...partial.timeouts?.tiers },
    },
    circuitBreakers: { ...defaults.circuitBreakers, ...partial.circuitBreakers },
    scoring: {
      weightOverrides: { ...defaults.scoring.weightOverrides, ...partial.scoring?.weightOverrides },
    },
    reputation: { ...defaults.reputation, ...partial.reputation },
  };
}

/**
 * Load and validate a JSON config file, merged over the defaults.
 *
 * @throws ConfigurationError when the file cannot be read, is not JSON, or
 * fails validation; `problems` lists every validation error
 */
export async function loadEngineConfig(path: string = getDefaultConfigPath()): Promise<EngineConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file at ${path}: ${toErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file at ${path} is not valid JSON: ${toErrorMessage(error)}`);
  }

  const { input, errors } = parseEngineConfig(parsed);
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid config at ${path}: ${errors.join('; ')}`, errors);
  }
  return mergeEngineConfig(input);
}
