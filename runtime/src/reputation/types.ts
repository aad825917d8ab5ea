/**
 * Types for external verification source reputation.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';

export type VerdictType = 'MALICIOUS' | 'SAFE' | 'SUSPICIOUS' | 'UNKNOWN';

export const VERDICT_TYPES: readonly VerdictType[] = ['MALICIOUS', 'SAFE', 'SUSPICIOUS', 'UNKNOWN'];

/** Sources registered on construction. */
export const CORE_SOURCES = ['dns', 'whois', 'ssl', 'urlvoid', 'abuseipdb'] as const;

export interface PredictionRecord {
  /** Absolute index within the source, assigned in recording order */
  index: number;
  verdict: VerdictType;
  confidence: number;
  timestamp: number;
  actual?: VerdictType;
  correct?: boolean;
}

/** Serializable state of one source; what a store persists. */
export interface SourceReputationSnapshot {
  source: string;
  totalPredictions: number;
  correctPredictions: number;
  falsePositives: number;
  falseNegatives: number;
  /** Newest last, bounded */
  recentPredictions: PredictionRecord[];
}

/** Derived figures for one source. */
export interface ReputationSummary {
  source: string;
  totalPredictions: number;
  accuracy: number;
  recentAccuracy: number;
  falsePositiveRate: number;
  falseNegativeRate: number;
  weightedReputation: number;
  consensusWeight: number;
  confidenceThreshold: number;
}

export interface ReputationManagerConfig {
  /** Extra sources to register besides {@link CORE_SOURCES} */
  sources?: readonly string[];
  /** Default: 100 */
  recentCapacity?: number;
  /** Default: 30 days */
  recentWindowMs?: number;
  now?: () => number;
  logger?: Logger;
}

/** Persistence for reputation state between process restarts. */
export interface ReputationStore {
  load(): Promise<SourceReputationSnapshot[]>;
  save(snapshots: readonly SourceReputationSnapshot[]): Promise<void>;
  close(): Promise<void>;
}
