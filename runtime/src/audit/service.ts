/**
 * Process-wide audit control surface: start, stream, result, feedback.
 *
 * @module
 */

import { randomUUID } from 'node:crypto';
import type { BrowserHandle, SharedBrowser } from '../browser/shared-browser.js';
import { normalizeUrl } from '../agents/pages.js';
import type { ReputationManager } from '../reputation/manager.js';
import type { ReputationStore, VerdictType } from '../reputation/types.js';
import { TELEMETRY_METRIC_NAMES } from '../telemetry/metric-names.js';
import type { MetricsProvider } from '../telemetry/types.js';
import { ValidationError } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import { AuditEventChannel } from './event-channel.js';
import { AuditNotFoundError, AuditUnavailableError } from './errors.js';
import type { AuditOrchestrator } from './orchestrator.js';
import { isAuditTier } from './tiers.js';
import type { AuditEvent, AuditReport, AuditRequest } from './types.js';

export const DEFAULT_MAX_CONCURRENT_AUDITS = 4;
/** How long a finished audit stays reachable by id. */
export const DEFAULT_FINISHED_AUDIT_RETENTION_MS = 60 * 60 * 1000;
/** Finished audits kept at most; the oldest go first. */
export const DEFAULT_MAX_FINISHED_AUDITS = 1_000;

export type AuditLifecycle = 'queued' | 'running' | 'finished';

export interface AuditServiceConfig {
  orchestrator: AuditOrchestrator;
  reputation: ReputationManager;
  /** Loaded by {@link AuditService.initialize}, saved after feedback and on shutdown */
  reputationStore?: ReputationStore;
  /** Closed on shutdown */
  browser?: Pick<SharedBrowser<BrowserHandle>, 'close'>;
  /** Default: 4 */
  maxConcurrentAudits?: number;
  /**
   * Finished audits older than this are forgotten; their ids then throw
   * {@link AuditNotFoundError}. Default: one hour
   */
  finishedAuditRetentionMs?: number;
  /** Default: 1_000 */
  maxFinishedAudits?: number;
  logger?: Logger;
  metrics?: MetricsProvider;
  createId?: () => string;
  now?: () => number;
}

export interface OutcomeSummary {
  auditId: string;
  actual: VerdictType;
  /** Predictions resolved by this call */
  resolved: number;
  correct: number;
}

interface AuditEntry {
  id: string;
  lifecycle: AuditLifecycle;
  channel: AuditEventChannel;
  controller: AbortController;
  done: Promise<AuditReport>;
  outcomeRecorded: boolean;
}

interface FinishedAudit {
  id: string;
  finishedAt: number;
}

export class AuditService {
  private readonly orchestrator: AuditOrchestrator;
  private readonly reputation: ReputationManager;
  private readonly store?: ReputationStore;
  private readonly browser?: Pick<SharedBrowser<BrowserHandle>, 'close'>;
  private readonly slots: Semaphore;
  private readonly logger: Logger;
  private readonly metrics?: MetricsProvider;
  private readonly createId: () => string;
  private readonly now: () => number;
  private readonly retentionMs: number;
  private readonly maxFinished: number;
  private readonly audits = new Map<string, AuditEntry>();
  /** Oldest first */
  private readonly finished: FinishedAudit[] = [];
  private running = 0;
  private shuttingDown = false;

  constructor(config: AuditServiceConfig) {
    this.orchestrator = config.orchestrator;
    this.reputation = config.reputation;
    this.store = config.reputationStore;
    this.browser = config.browser;
    this.slots = new Semaphore(config.maxConcurrentAudits ?? DEFAULT_MAX_CONCURRENT_AUDITS);
    this.logger = config.logger ?? silentLogger;
    this.metrics = config.metrics;
    this.createId = config.createId ?? randomUUID;
    this.now = config.now ?? Date.now;
    this.retentionMs = Math.max(0, config.finishedAuditRetentionMs ?? DEFAULT_FINISHED_AUDIT_RETENTION_MS);
    this.maxFinished = Math.max(0, config.maxFinishedAudits ?? DEFAULT_MAX_FINISHED_AUDITS);
  }

  /** Load persisted source reputation. */
  async initialize(): Promise<void> {
    if (!this.store) return;
    const snapshots = await this.store.load();
    this.reputation.restore(snapshots);
    this.logger.debug(`Loaded reputation for ${snapshots.length} source(s)`);
  }

  /**
   * Queue an audit and return its id. The audit runs in the background once
   * a concurrency slot is free.
   *
   * @throws ValidationError for a malformed request
   * @throws AuditUnavailableError after {@link shutdown} was called
   */
  start(request: AuditRequest): string {
    if (this.shuttingDown) {
      throw new AuditUnavailableError('Audit service is shutting down');
    }
    if (normalizeUrl(request.url) === null) {
      throw new ValidationError(`Audit URL must be an absolute http(s) URL, got "${request.url}"`);
    }
    if (request.tier !== undefined && !isAuditTier(request.tier)) {
      throw new ValidationError(`Unknown audit tier "${request.tier}"`);
    }
    this.evictFinished();

    const id = this.createId();
    const channel = new AuditEventChannel();
    const controller = new AbortController();
    const entry: AuditEntry = {
      id,
      lifecycle: 'queued',
      channel,
      controller,
      done: Promise.resolve().then(() => this.execute(entry, request)),
      outcomeRecorded: false,
    };
    this.audits.set(id, entry);
    this.logger.debug(`Queued audit ${id} for ${request.url}`);
    return id;
  }

  /**
   * Events of an audit from its first one, ending after `audit_complete` or
   * `audit_error`.
   *
   * @throws AuditNotFoundError
   */
  stream(auditId: string): AsyncIterable<AuditEvent> {
    return this.entry(auditId).channel.subscribe();
  }

  /** @throws AuditNotFoundError */
  result(auditId: string): Promise<AuditReport> {
    return this.entry(auditId).done;
  }

  /** @throws AuditNotFoundError */
  lifecycle(auditId: string): AuditLifecycle {
    return this.entry(auditId).lifecycle;
  }

  /** Abort a queued or running audit; it ends with status `ERROR`. */
  cancel(auditId: string): boolean {
    const entry = this.entry(auditId);
    if (entry.lifecycle === 'finished') return false;
    entry.controller.abort();
    return true;
  }

  /**
   * Resolve the source predictions made during an audit against the actual
   * verdict. Waits for the audit to finish. Only the first call per audit
   * counts.
   *
   * @throws AuditNotFoundError
   */
  async recordOutcome(auditId: string, actual: VerdictType): Promise<OutcomeSummary> {
    const entry = this.entry(auditId);
    const report = await entry.done;
    if (entry.outcomeRecorded) {
      return { auditId, actual, resolved: 0, correct: 0 };
    }
    entry.outcomeRecorded = true;

    let correct = 0;
    for (const prediction of report.predictions) {
      if (this.reputation.recordActual(prediction.source, prediction.predictionIndex, actual)) {
        correct += 1;
      }
    }
    await this.persistReputation();
    return { auditId, actual, resolved: report.predictions.length, correct };
  }

  /**
   * Refuse new audits, wait for queued and running ones, save reputation and
   * close the shared browser.
   */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    this.logger.info(`Shutting down; waiting for ${this.audits.size} audit(s)`);
    await Promise.all([...this.audits.values()].map((entry) => entry.done));
    await this.persistReputation();
    if (this.browser) {
      await this.browser.close();
    }
    if (this.store) {
      await this.store.close();
    }
  }

  private entry(auditId: string): AuditEntry {
    this.evictFinished();
    const entry = this.audits.get(auditId);
    if (!entry) throw new AuditNotFoundError(auditId);
    return entry;
  }

  private async execute(entry: AuditEntry, request: AuditRequest): Promise<AuditReport> {
    const release = await this.slots.acquire();
    entry.lifecycle = 'running';
    this.running += 1;
    this.metrics?.gauge(TELEMETRY_METRIC_NAMES.AUDITS_ACTIVE, this.running);
    try {
      return await this.orchestrator.run(entry.id, request, {
        signal: entry.controller.signal,
        sink: (event) => {
          entry.channel.push(event);
        },
      });
    } finally {
      this.running -= 1;
      this.metrics?.gauge(TELEMETRY_METRIC_NAMES.AUDITS_ACTIVE, this.running);
      entry.lifecycle = 'finished';
      this.finished.push({ id: entry.id, finishedAt: this.now() });
      this.evictFinished();
      release();
    }
  }

  /** Drop finished audits past the retention time or beyond the count limit. */
  private evictFinished(): void {
    const cutoff = this.now() - this.retentionMs;
    while (this.finished.length > 0) {
      const oldest = this.finished[0];
      if (this.finished.length <= this.maxFinished && oldest.finishedAt > cutoff) break;
      this.finished.shift();
      this.audits.delete(oldest.id);
      this.logger.debug(`Forgot finished audit ${oldest.id}`);
    }
  }

  private async persistReputation(): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.save(this.reputation.toSnapshot());
      this.logger.debug('Saved source reputation');
    } catch (error) {
      this.logger.error(`Saving source reputation failed: ${toErrorMessage(error)}`);
      throw error;
    }
  }
}
