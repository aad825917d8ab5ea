/**
 * In-memory reputation store.
 *
 * @module
 */

import type { ReputationStore, SourceReputationSnapshot } from './types.js';

function copySnapshot(snapshot: SourceReputationSnapshot): SourceReputationSnapshot {
  return {
    ...snapshot,
    recentPredictions: snapshot.recentPredictions.map((entry) => ({ ...entry })),
  };
}

/** Keeps the last saved snapshots in process. Useful as a default and in tests. */
export class InMemoryReputationStore implements ReputationStore {
  private snapshots: SourceReputationSnapshot[] = [];
  private saves = 0;

  constructor(initial: readonly SourceReputationSnapshot[] = []) {
    this.snapshots = initial.map(copySnapshot);
  }

  get saveCount(): number {
    return this.saves;
  }

  async load(): Promise<SourceReputationSnapshot[]> {
    return this.snapshots.map(copySnapshot);
  }

  async save(snapshots: readonly SourceReputationSnapshot[]): Promise<void> {
    this.snapshots = snapshots.map(copySnapshot);
    this.saves += 1;
  }

  async close(): Promise<void> {}
}
