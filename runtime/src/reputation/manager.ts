/**
 * Accuracy tracking and consensus weighting for external verification
 * sources (DNS, WHOIS, TLS checks, threat-intel lookups).
 *
 * This is the runtime's long-lived learning state. Every mutation is a
 * synchronous read-modify-write, so concurrent audits sharing one manager
 * cannot interleave inside an update.
 *
 * @module
 */

import { THIRTY_DAYS_MS } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { clamp01 } from '../utils/numeric.js';
import {
  CORE_SOURCES,
  type PredictionRecord,
  type ReputationManagerConfig,
  type ReputationSummary,
  type SourceReputationSnapshot,
  type VerdictType,
} from './types.js';

const DEFAULT_RECENT_CAPACITY = 100;
/** Accuracy assumed for a source with no history. */
export const NEUTRAL_ACCURACY = 0.5;

interface SourceState {
  totalPredictions: number;
  correctPredictions: number;
  falsePositives: number;
  falseNegatives: number;
  recent: PredictionRecord[];
}

/**
 * Exact match is correct. A SUSPICIOUS prediction also counts as correct
 * when the actual verdict turned out MALICIOUS or SAFE.
 */
export function isPredictionCorrect(predicted: VerdictType, actual: VerdictType): boolean {
  if (predicted === actual) return true;
  return predicted === 'SUSPICIOUS' && (actual === 'MALICIOUS' || actual === 'SAFE');
}

/** Multiplier rewarding sources with a long track record. */
export function volumeBonus(totalPredictions: number): number {
  if (totalPredictions >= 100) return 1.2;
  if (totalPredictions >= 50) return 1.1;
  if (totalPredictions >= 20) return 1.05;
  return 1.0;
}

/** Minimum claim confidence to trust from a source of this reputation. */
export function thresholdForReputation(reputation: number): number {
  if (reputation >= 0.8) return 0.3;
  if (reputation >= 0.6) return 0.4;
  if (reputation >= 0.4) return 0.5;
  return 0.7;
}

function emptyState(): SourceState {
  return {
    totalPredictions: 0,
    correctPredictions: 0,
    falsePositives: 0,
    falseNegatives: 0,
    recent: [],
  };
}

export class ReputationManager {
  private readonly sources = new Map<string, SourceState>();
  private readonly recentCapacity: number;
  private readonly recentWindowMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(config: ReputationManagerConfig = {}) {
    this.recentCapacity = Math.max(1, config.recentCapacity ?? DEFAULT_RECENT_CAPACITY);
    this.recentWindowMs = config.recentWindowMs ?? THIRTY_DAYS_MS;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? silentLogger;
    for (const source of [...CORE_SOURCES, ...(config.sources ?? [])]) {
      this.sources.set(source, emptyState());
    }
  }

  /** Record a claim by `source`. Returns the prediction's index for {@link recordActual}. */
  recordPrediction(source: string, verdict: VerdictType, confidence: number): number {
    const state = this.stateFor(source);
    const record: PredictionRecord = {
      index: state.totalPredictions,
      verdict,
      confidence: clamp01(confidence),
      timestamp: this.now(),
    };
    state.totalPredictions += 1;
    state.recent.push(record);
    while (state.recent.length > this.recentCapacity) {
      state.recent.shift();
    }
    return record.index;
  }

  /**
   * Resolve a prediction against ground truth. Returns whether it was
   * correct; an unknown or already evicted index returns false. A prediction
   * resolved twice is only counted once.
   */
  recordActual(source: string, predictionIndex: number, actual: VerdictType): boolean {
    const state = this.sources.get(source);
    const record = state?.recent.find((entry) => entry.index === predictionIndex);
    if (!state || !record) {
      this.logger.debug(`No open prediction ${predictionIndex} for source "${source}"`);
      return false;
    }
    if (record.correct !== undefined) {
      return record.correct;
    }

    const correct = isPredictionCorrect(record.verdict, actual);
    record.actual = actual;
    record.correct = correct;
    if (correct) {
      state.correctPredictions += 1;
    }
    if (record.verdict === 'MALICIOUS' && actual === 'SAFE') {
      state.falsePositives += 1;
    } else if (record.verdict === 'SAFE' && actual === 'MALICIOUS') {
      state.falseNegatives += 1;
    }
    return correct;
  }

  accuracy(source: string): number {
    const state = this.sources.get(source);
    if (!state || state.totalPredictions === 0) return NEUTRAL_ACCURACY;
    return state.correctPredictions / state.totalPredictions;
  }

  /**
   * Share of correct predictions made within the recent window. Unresolved
   * predictions count as not correct. Falls back to overall accuracy when
   * the window is empty.
   */
  recentAccuracy(source: string): number {
    const state = this.sources.get(source);
    const cutoff = this.now() - this.recentWindowMs;
    const recent = state?.recent.filter((entry) => entry.timestamp > cutoff) ?? [];
    if (recent.length === 0) return this.accuracy(source);
    const correct = recent.filter((entry) => entry.correct === true).length;
    return correct / recent.length;
  }

  falseNegativeRate(source: string): number {
    const state = this.sources.get(source);
    if (!state || state.totalPredictions === 0) return 0;
    return state.falseNegatives / state.totalPredictions;
  }

  falsePositiveRate(source: string): number {
    const state = this.sources.get(source);
    if (!state || state.totalPredictions === 0) return 0;
    return state.falsePositives / state.totalPredictions;
  }

  /**
   * `0.6 × accuracy + 0.2 × recentFactor + 0.2 × fnPenalty`, clamped to [0, 1].
   */
  weightedReputation(source: string): number {
    const accuracy = this.accuracy(source);
    const recentFactor = Math.min(1, this.recentAccuracy(source) / (accuracy + 0.01));
    const fnPenalty = 1 - Math.min(1, this.falseNegativeRate(source) * 3);
    return clamp01(0.6 * accuracy + 0.2 * recentFactor + 0.2 * fnPenalty);
  }

  consensusWeight(source: string): number {
    const total = this.sources.get(source)?.totalPredictions ?? 0;
    return this.weightedReputation(source) * volumeBonus(total);
  }

  confidenceThreshold(source: string): number {
    return thresholdForReputation(this.weightedReputation(source));
  }

  getReputation(source: string): ReputationSummary {
    return {
      source,
      totalPredictions: this.sources.get(source)?.totalPredictions ?? 0,
      accuracy: this.accuracy(source),
      recentAccuracy: this.recentAccuracy(source),
      falsePositiveRate: this.falsePositiveRate(source),
      falseNegativeRate: this.falseNegativeRate(source),
      weightedReputation: this.weightedReputation(source),
      consensusWeight: this.consensusWeight(source),
      confidenceThreshold: this.confidenceThreshold(source),
    };
  }

  getAllReputations(): ReputationSummary[] {
    return [...this.sources.keys()].map((source) => this.getReputation(source));
  }

  /** Sources ordered by weighted reputation, best first. */
  rankSources(): ReputationSummary[] {
    return this.getAllReputations().sort(
      (a, b) => b.weightedReputation - a.weightedReputation || a.source.localeCompare(b.source),
    );
  }

  toSnapshot(): SourceReputationSnapshot[] {
    return [...this.sources.entries()].map(([source, state]) => ({
      source,
      totalPredictions: state.totalPredictions,
      correctPredictions: state.correctPredictions,
      falsePositives: state.falsePositives,
      falseNegatives: state.falseNegatives,
      recentPredictions: state.recent.map((entry) => ({ ...entry })),
    }));
  }

  /** Replace state for every source in `snapshots`; other sources are kept. */
  restore(snapshots: readonly SourceReputationSnapshot[]): void {
    for (const snapshot of snapshots) {
      this.sources.set(snapshot.source, {
        totalPredictions: snapshot.totalPredictions,
        correctPredictions: snapshot.correctPredictions,
        falsePositives: snapshot.falsePositives,
        falseNegatives: snapshot.falseNegatives,
        recent: snapshot.recentPredictions
          .slice(-this.recentCapacity)
          .map((entry) => ({ ...entry })),
      });
    }
    this.logger.debug(`Restored reputation for ${snapshots.length} source(s)`);
  }

  private stateFor(source: string): SourceState {
    let state = this.sources.get(source);
    if (!state) {
      state = emptyState();
      this.sources.set(source, state);
    }
    return state;
  }
}
