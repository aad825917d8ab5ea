/**
 * TrustLensRuntime - composition root and process lifecycle for the audit engine
 *
 * Builds every process-wide component from one {@link EngineConfig}: the
 * scoring engine, circuit breakers, timeout manager, reputation tracker and
 * its store, the shared browser, the orchestrator and the audit service.
 *
 * @module
 */

import type { AuditAgents } from './agents/types.js';
import { AuditOrchestrator } from './audit/orchestrator.js';
import { AuditService } from './audit/service.js';
import type { BrowserHandle, BrowserLauncher } from './browser/shared-browser.js';
import { SharedBrowser } from './browser/shared-browser.js';
import { ComplexityAnalyzer } from './budget/complexity-analyzer.js';
import { TimeoutManager } from './budget/timeout-manager.js';
import type { EngineConfig } from './config/types.js';
import { ReputationManager } from './reputation/manager.js';
import { SqliteReputationStore } from './reputation/sqlite-store.js';
import { InMemoryReputationStore } from './reputation/store.js';
import type { ReputationStore } from './reputation/types.js';
import { CircuitBreakerRegistry } from './resilience/circuit-breaker.js';
import type { CircuitState, CircuitStateChange } from './resilience/types.js';
import { TrustScoreEngine } from './scoring/engine.js';
import { TELEMETRY_METRIC_NAMES } from './telemetry/metric-names.js';
import { NoopMetricsProvider } from './telemetry/noop.js';
import type { MetricsProvider } from './telemetry/types.js';
import type { Logger } from './utils/logger.js';
import { createLogger } from './utils/logger.js';

/** Gauge values for {@link TELEMETRY_METRIC_NAMES.CIRCUIT_STATE}. */
export const CIRCUIT_STATE_GAUGE: Readonly<Record<CircuitState, number>> = {
  CLOSED: 0,
  HALF_OPEN: 1,
  OPEN: 2,
};

/** What agent factories get to build the agents of one runtime. */
export interface AgentDependencies<B extends BrowserHandle> {
  browser: SharedBrowser<B>;
  engine: TrustScoreEngine;
  reputation: ReputationManager;
  logger: Logger;
}

export interface TrustLensRuntimeConfig<B extends BrowserHandle> {
  config: EngineConfig;
  /** Starts the browser the first time an agent asks for it */
  launchBrowser: BrowserLauncher<B>;
  createAgents: (deps: AgentDependencies<B>) => AuditAgents;
  /** Replaces the store chosen from `config.reputation` */
  reputationStore?: ReputationStore;
  metrics?: MetricsProvider;
  /** Default: a console logger at `config.logging.level` */
  logger?: Logger;
  now?: () => number;
  createId?: () => string;
}

/**
 * One engine per process.
 *
 * @example
 * ```typescript
 * const runtime = new TrustLensRuntime({
 *   config: await loadEngineConfig(),
 *   launchBrowser: () => chromium.launch(),
 *   createAgents: ({ browser, engine, reputation, logger }) => ({
 *     scout: new PageScout(browser),
 *     vision: createModelVisionAgent(classifier, { logger }),
 *     graph: new RegistryInvestigator(registry),
 *     judge: new EvidenceJudge({ engine, reputation }),
 *   }),
 * });
 * runtime.registerShutdownHandlers();
 * await runtime.start();
 *
 * const auditId = runtime.getAuditService().start({ url: 'https://shop.example' });
 * for await (const event of runtime.getAuditService().stream(auditId)) {
 *   console.log(event.type);
 * }
 * ```
 */
export class TrustLensRuntime<B extends BrowserHandle = BrowserHandle> {
  private readonly logger: Logger;
  private readonly metrics: MetricsProvider;
  private readonly engine: TrustScoreEngine;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly timeouts: TimeoutManager;
  private readonly reputation: ReputationManager;
  private readonly reputationStore: ReputationStore;
  private readonly browser: SharedBrowser<B>;
  private readonly orchestrator: AuditOrchestrator;
  private readonly service: AuditService;

  private started = false;
  private stopping: Promise<void> | null = null;
  private shutdownHandlersRegistered = false;

  constructor(options: TrustLensRuntimeConfig<B>) {
    const { config } = options;
    this.logger = options.logger ?? createLogger(config.logging.level, '[TrustLens]');
    this.metrics = options.metrics ?? new NoopMetricsProvider();

    this.engine = new TrustScoreEngine({
      weightOverrides: config.scoring.weightOverrides,
      logger: this.logger.child('scoring'),
    });
    this.breakers = new CircuitBreakerRegistry({
      configs: config.circuitBreakers,
      now: options.now,
      logger: this.logger.child('breaker'),
      onStateChange: (change) => this.recordCircuitChange(change),
    });
    this.timeouts = new TimeoutManager({
      strategy: config.timeouts.strategy,
      minSamples: config.timeouts.minSamples,
      historyCapacity: config.timeouts.historyCapacity,
      minDeadlineMs: config.timeouts.minDeadlineMs,
      tiers: config.timeouts.tiers,
      logger: this.logger.child('timeouts'),
    });
    this.reputation = new ReputationManager({ now: options.now, logger: this.logger.child('reputation') });
    this.reputationStore = options.reputationStore ?? this.createReputationStore(config);

    this.browser = new SharedBrowser({ launch: options.launchBrowser, logger: this.logger.child('browser') });
    this.orchestrator = new AuditOrchestrator({
      agents: options.createAgents({
        browser: this.browser,
        engine: this.engine,
        reputation: this.reputation,
        logger: this.logger.child('agents'),
      }),
      engine: this.engine,
      breakers: this.breakers,
      timeouts: this.timeouts,
      reputation: this.reputation,
      complexity: new ComplexityAnalyzer(),
      tierBudgets: config.tiers,
      confidenceThreshold: config.audit.confidenceThreshold,
      maxPagesPerIteration: config.audit.maxPagesPerIteration,
      penaltyFloor: config.audit.penaltyFloor,
      sinkTimeoutMs: config.audit.sinkTimeoutMs,
      logger: this.logger,
      metrics: this.metrics,
      now: options.now,
    });
    this.service = new AuditService({
      orchestrator: this.orchestrator,
      reputation: this.reputation,
      reputationStore: this.reputationStore,
      browser: this.browser,
      maxConcurrentAudits: config.audit.maxConcurrentAudits,
      finishedAuditRetentionMs: config.audit.finishedAuditRetentionMs,
      maxFinishedAudits: config.audit.maxFinishedAudits,
      logger: this.logger.child('service'),
      metrics: this.metrics,
      createId: options.createId,
      now: options.now,
    });

    this.logger.debug('TrustLensRuntime created');
  }

  /**
   * Load persisted source reputation. Audits may be started before this
   * resolves; they then see default reputation.
   */
  async start(): Promise<void> {
    if (this.started) {
      this.logger.warn('TrustLensRuntime already started');
      return;
    }
    if (this.stopping) {
      throw new Error('TrustLensRuntime was stopped and cannot be restarted');
    }
    this.logger.info('Starting TrustLensRuntime');
    await this.service.initialize();
    this.started = true;
    this.logger.info('TrustLensRuntime started');
  }

  /**
   * Wait for queued and running audits, save reputation and close the
   * browser. Idempotent.
   */
  async stop(): Promise<void> {
    if (!this.stopping) {
      this.logger.info('Stopping TrustLensRuntime');
      this.stopping = this.service.shutdown().then(() => {
        this.started = false;
        this.logger.info('TrustLensRuntime stopped');
      });
    }
    return this.stopping;
  }

  /**
   * Stop, then exit the process. Exits with code 1 when stopping fails.
   */
  async gracefulShutdown(): Promise<never> {
    this.logger.info('Graceful shutdown initiated');
    try {
      await this.stop();
    } catch (err) {
      this.logger.error('Shutdown failed:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
    this.logger.info('Exiting process');
    process.exit(0);
  }

  /**
   * Run {@link gracefulShutdown} on SIGINT and SIGTERM. Idempotent.
   */
  registerShutdownHandlers(): void {
    if (this.shutdownHandlersRegistered) {
      this.logger.debug('Shutdown handlers already registered');
      return;
    }

    const handler = () => {
      void this.gracefulShutdown();
    };

    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);

    this.shutdownHandlersRegistered = true;
    this.logger.debug('Shutdown handlers registered for SIGINT and SIGTERM');
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  isStarted(): boolean {
    return this.started;
  }

  getAuditService(): AuditService {
    return this.service;
  }

  getOrchestrator(): AuditOrchestrator {
    return this.orchestrator;
  }

  getEngine(): TrustScoreEngine {
    return this.engine;
  }

  getBreakers(): CircuitBreakerRegistry {
    return this.breakers;
  }

  getTimeouts(): TimeoutManager {
    return this.timeouts;
  }

  getReputation(): ReputationManager {
    return this.reputation;
  }

  getBrowser(): SharedBrowser<B> {
    return this.browser;
  }

  private createReputationStore(config: EngineConfig): ReputationStore {
    const { dbPath } = config.reputation;
    if (dbPath === null) {
      return new InMemoryReputationStore();
    }
    return new SqliteReputationStore({ dbPath, logger: this.logger.child('reputation-store') });
  }

  private recordCircuitChange(change: CircuitStateChange): void {
    const labels = { agent: change.name };
    this.metrics.gauge(TELEMETRY_METRIC_NAMES.CIRCUIT_STATE, CIRCUIT_STATE_GAUGE[change.to], labels);
    if (change.to === 'OPEN') {
      this.metrics.counter(TELEMETRY_METRIC_NAMES.CIRCUIT_OPENED_TOTAL, 1, labels);
    }
  }
}
