/**
 * SQLite persistence for source reputation.
 *
 * Uses `better-sqlite3` loaded lazily on first use. Each source is one row;
 * its bounded recent-prediction list is stored as JSON.
 *
 * @module
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';
import { ReputationStoreError } from './errors.js';
import type { ReputationStore, SourceReputationSnapshot } from './types.js';

export interface SqliteReputationStoreConfig {
  /** Default: ':memory:' */
  dbPath?: string;
  /** Enable WAL journaling for file databases. Default: true */
  walMode?: boolean;
  logger?: Logger;
  now?: () => number;
}

const STORE_NAME = 'sqlite-reputation';

const verdict = z.enum(['MALICIOUS', 'SAFE', 'SUSPICIOUS', 'UNKNOWN']);

const recentSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    verdict,
    confidence: z.number(),
    timestamp: z.number(),
    actual: verdict.optional(),
    correct: z.boolean().optional(),
  }),
);

const rowSchema = z.object({
  source: z.string(),
  total_predictions: z.number().int(),
  correct_predictions: z.number().int(),
  false_positives: z.number().int(),
  false_negatives: z.number().int(),
  recent_json: z.string(),
});

export class SqliteReputationStore implements ReputationStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly walMode: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;
  private closed = false;

  constructor(config: SqliteReputationStoreConfig = {}) {
    this.dbPath = config.dbPath ?? ':memory:';
    this.walMode = config.walMode ?? true;
    this.logger = config.logger ?? silentLogger;
    this.now = config.now ?? Date.now;
  }

  async load(): Promise<SourceReputationSnapshot[]> {
    const db = await this.ensureDb();
    const rows = db.prepare('SELECT * FROM source_reputation ORDER BY source ASC').all();
    const snapshots = rows.map((row) => this.rowToSnapshot(row));
    this.logger.debug(`Loaded ${snapshots.length} reputation row(s) from ${this.dbPath}`);
    return snapshots;
  }

  async save(snapshots: readonly SourceReputationSnapshot[]): Promise<void> {
    const db = await this.ensureDb();
    const upsert = db.prepare(
      `INSERT INTO source_reputation
         (source, total_predictions, correct_predictions, false_positives, false_negatives, recent_json, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(source) DO UPDATE SET
         total_predictions = excluded.total_predictions,
         correct_predictions = excluded.correct_predictions,
         false_positives = excluded.false_positives,
         false_negatives = excluded.false_negatives,
         recent_json = excluded.recent_json,
         updated_at = excluded.updated_at`,
    );
    const updatedAt = this.now();
    const writeAll = db.transaction((batch: readonly SourceReputationSnapshot[]) => {
      for (const snapshot of batch) {
        upsert.run(
          snapshot.source,
          snapshot.totalPredictions,
          snapshot.correctPredictions,
          snapshot.falsePositives,
          snapshot.falseNegatives,
          JSON.stringify(snapshot.recentPredictions),
          updatedAt,
        );
      }
    });
    writeAll(snapshots);
    this.logger.debug(`Saved ${snapshots.length} reputation row(s)`);
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private async ensureDb(): Promise<Database.Database> {
    if (this.closed) {
      throw new ReputationStoreError(STORE_NAME, 'Store is closed');
    }
    if (this.db) return this.db;

    let DatabaseConstructor: typeof Database;
    try {
      DatabaseConstructor = (await import('better-sqlite3')).default;
    } catch {
      throw new ReputationStoreError(
        STORE_NAME,
        'better-sqlite3 package not installed. Install it: npm install better-sqlite3',
      );
    }

    const db = new DatabaseConstructor(this.dbPath);
    if (this.walMode && this.dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(`
      CREATE TABLE IF NOT EXISTS source_reputation (
        source TEXT PRIMARY KEY,
        total_predictions INTEGER NOT NULL,
        correct_predictions INTEGER NOT NULL,
        false_positives INTEGER NOT NULL,
        false_negatives INTEGER NOT NULL,
        recent_json TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
    this.db = db;
    return db;
  }

  private rowToSnapshot(row: unknown): SourceReputationSnapshot {
    const parsed = rowSchema.safeParse(row);
    if (!parsed.success) {
      throw new ReputationStoreError(STORE_NAME, `Invalid row: ${parsed.error.message}`);
    }
    let recent: unknown;
    try {
      recent = JSON.parse(parsed.data.recent_json);
    } catch (err) {
      throw new ReputationStoreError(
        STORE_NAME,
        `Corrupt recent predictions for "${parsed.data.source}": ${toErrorMessage(err)}`,
      );
    }
    const recentParsed = recentSchema.safeParse(recent);
    if (!recentParsed.success) {
      throw new ReputationStoreError(
        STORE_NAME,
        `Invalid recent predictions for "${parsed.data.source}": ${recentParsed.error.message}`,
      );
    }
    return {
      source: parsed.data.source,
      totalPredictions: parsed.data.total_predictions,
      correctPredictions: parsed.data.correct_predictions,
      falsePositives: parsed.data.false_positives,
      falseNegatives: parsed.data.false_negatives,
      recentPredictions: recentParsed.data,
    };
  }
}
