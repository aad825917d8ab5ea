/**
 * Audit pipeline: a hand-rolled state loop over
 * `SCOUT → ANALYZE (vision ∥ graph ∥ security) → JUDGE → LOOP | DONE`.
 *
 * Every agent call goes through a per-run {@link DegradationManager}, so a
 * failing agent yields fallback data instead of an error. Only configuration
 * errors and cancellation end a run in `ERROR`.
 *
 * @module
 */

import { ComplexityAnalyzer } from '../budget/complexity-analyzer.js';
import type { TimeoutManager } from '../budget/timeout-manager.js';
import type { ComplexityMetrics } from '../budget/types.js';
import { createAgentFallbacks } from '../agents/fallbacks.js';
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_PAGES_PER_ITERATION,
  computeVerdict,
  type JudgeOptions,
} from '../agents/judge.js';
import { normalizeUrl, selectPriorityPages } from '../agents/pages.js';
import { taxonomySubset } from '../agents/taxonomy.js';
import type {
  AgentCallContext,
  AgentResults,
  AuditAgents,
  AuditEvidence,
  GraphResult,
  JudgeOutput,
  ScoutResult,
  SecurityResult,
  VerdictMode,
  ViewportOptions,
  VisionResult,
} from '../agents/types.js';
import type { ReputationManager } from '../reputation/manager.js';
import type { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { DegradationManager } from '../resilience/degradation.js';
import { linkAbortSignal } from '../resilience/timeout.js';
import type { DegradedResult, StageOutcome } from '../resilience/types.js';
import type { TrustScoreEngine } from '../scoring/engine.js';
import { classifySiteType } from '../scoring/site-classifier.js';
import { isSiteType, resolveSiteType } from '../scoring/site-profiles.js';
import type { SiteType } from '../scoring/types.js';
import { TELEMETRY_METRIC_NAMES } from '../telemetry/metric-names.js';
import type { MetricsProvider } from '../telemetry/types.js';
import type { AgentName } from '../types/agents.js';
import { ValidationError, isConfigurationError } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { AuditCancelledError } from './errors.js';
import { DEFAULT_PENALTY_FLOOR, applyQualityPenalty, totalPenalty } from './penalty.js';
import { DEFAULT_AUDIT_TIER, resolveBudget, resolveTier, type TierBudgetOverrides } from './tiers.js';
import { isTerminalEvent } from './types.js';
import type {
  AuditBudget,
  AuditEvent,
  AuditEventSink,
  AuditPhase,
  AuditReport,
  AuditRequest,
  AuditStatus,
  AuditTier,
  DegradationFlag,
  RecordedPrediction,
  StageSummary,
} from './types.js';

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_VIEWPORT: Readonly<ViewportOptions> = { width: 1280, height: 800, fullPage: true };

/** Longest wait for one event sink delivery. */
export const DEFAULT_SINK_TIMEOUT_MS = 1_000;

export interface AuditOrchestratorConfig {
  agents: AuditAgents;
  engine: TrustScoreEngine;
  /** Process-wide, shared by every audit */
  breakers: CircuitBreakerRegistry;
  /** Process-wide, shared by every audit */
  timeouts: TimeoutManager;
  /** Process-wide, shared by every audit */
  reputation: ReputationManager;
  complexity?: ComplexityAnalyzer;
  tierBudgets?: TierBudgetOverrides;
  /** Below this confidence another pass is attempted. Default: 0.6 */
  confidenceThreshold?: number;
  /** Default: 3 */
  maxPagesPerIteration?: number;
  /** Default: 1 */
  penaltyFloor?: number;
  viewport?: ViewportOptions;
  /**
   * Longest wait for one sink delivery. Stage events also wait no longer
   * than the run's remaining time. Default: 1_000
   */
  sinkTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsProvider;
  now?: () => number;
}

export interface AuditRunOptions {
  sink?: AuditEventSink;
  /** Aborting ends the run in `ERROR` */
  signal?: AbortSignal;
}

// ============================================================================
// Run state
// ============================================================================

/** Mutable state of one run. Never shared between runs. */
interface AuditState {
  auditId: string;
  url: string;
  tier: AuditTier;
  verdictMode: VerdictMode;
  securityModules: readonly string[];
  budget: AuditBudget;
  phase: AuditPhase;
  siteType: SiteType;
  /** Set from the request; classification never changes it */
  siteTypeFixed: boolean;
  iteration: number;
  startedAt: number;
  externalCalls: number;
  /** Pages to scout in the next SCOUT phase */
  targets: string[];
  /** Pages left to scout after the current one */
  pendingScouts: number;
  currentUrl: string;
  scoutResults: ScoutResult[];
  /** Scout results of the current iteration */
  pageResults: ScoutResult[];
  vision: VisionResult | null;
  graph: GraphResult | null;
  security: SecurityResult | null;
  /** Agents with at least one real result in this audit */
  realAgents: Set<AgentName>;
  /** Agents whose current evidence is fallback data */
  degradedAgents: Set<AgentName>;
  degradation: DegradationFlag[];
  complexityHistory: ComplexityMetrics[];
  predictions: RecordedPrediction[];
  investigatedUrls: string[];
  verdict: JudgeOutput | null;
  /** Bumped on every evidence change; compared against `judgedVersion` */
  evidenceVersion: number;
  judgedVersion: number;
  budgetExhausted: boolean;
  forcedVerdict: boolean;
}

interface AuditRun {
  state: AuditState;
  degradation: DegradationManager<AgentResults>;
  logger: Logger;
  sink?: AuditEventSink;
  signal?: AbortSignal;
}

interface StageResult<T> {
  value: T;
  degraded: boolean;
}

// ============================================================================
// Evidence merging
// ============================================================================

function mergeVision(previous: VisionResult, next: VisionResult): VisionResult {
  const temporalFindings =
    previous.temporalFindings || next.temporalFindings
      ? [...(previous.temporalFindings ?? []), ...(next.temporalFindings ?? [])]
      : undefined;
  const temporalScores = [previous.temporalScore, next.temporalScore].filter(
    (score): score is number => score !== undefined,
  );
  const trustBadges =
    previous.trustBadges || next.trustBadges
      ? {
          displayed: (previous.trustBadges?.displayed ?? 0) + (next.trustBadges?.displayed ?? 0),
          verified: (previous.trustBadges?.verified ?? 0) + (next.trustBadges?.verified ?? 0),
        }
      : undefined;
  return {
    findings: [...previous.findings, ...next.findings],
    // The worst page decides.
    visualScore: Math.min(previous.visualScore, next.visualScore),
    temporalFindings,
    temporalScore: temporalScores.length > 0 ? Math.min(...temporalScores) : undefined,
    trustBadges,
  };
}

function mergeGraph(previous: GraphResult, next: GraphResult): GraphResult {
  const seen = new Set<string>();
  const verifiedEntities = [...previous.verifiedEntities, ...next.verifiedEntities].filter((entry) => {
    const key = `${entry.entity}|${entry.source}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return {
    verifiedEntities,
    inconsistencies: [...previous.inconsistencies, ...next.inconsistencies],
    graphScore: next.graphScore,
    domainIntel: next.domainIntel ?? previous.domainIntel,
    sourceVerdicts: [...(previous.sourceVerdicts ?? []), ...(next.sourceVerdicts ?? [])],
  };
}

function summarizeScout(result: ScoutResult): StageSummary {
  return {
    url: result.url,
    screenshots: result.screenshotPaths.length,
    links: result.discoveredLinks.length,
  };
}

function summarizeVision(result: VisionResult): StageSummary {
  return { findings: result.findings.length, visualScore: result.visualScore };
}

function summarizeGraph(result: GraphResult): StageSummary {
  return {
    verifiedEntities: result.verifiedEntities.length,
    inconsistencies: result.inconsistencies.length,
    graphScore: result.graphScore,
  };
}

function summarizeSecurity(result: SecurityResult): StageSummary {
  return { modules: result.modules.length, overallScore: result.overallScore };
}

function summarizeJudge(result: JudgeOutput): StageSummary {
  return {
    finalScore: result.trustScore.finalScore,
    riskLevel: result.trustScore.riskLevel,
    confidence: result.trustScore.confidence,
    decision: result.decision,
  };
}

function toFlag(agent: AgentName, iteration: number, degraded: DegradedResult<unknown>): DegradationFlag {
  return {
    agent,
    iteration,
    reason: degraded.reason,
    fallbackMode: degraded.fallbackMode,
    qualityPenalty: degraded.qualityPenalty,
    missingData: degraded.missingData,
    errorMessage: degraded.errorMessage,
  };
}

// ============================================================================
// AuditOrchestrator
// ============================================================================

export class AuditOrchestrator {
  private readonly agents: AuditAgents;
  private readonly engine: TrustScoreEngine;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly timeouts: TimeoutManager;
  private readonly reputation: ReputationManager;
  private readonly complexity: ComplexityAnalyzer;
  private readonly tierBudgets: TierBudgetOverrides;
  private readonly confidenceThreshold: number;
  private readonly maxPagesPerIteration: number;
  private readonly penaltyFloor: number;
  private readonly viewport: ViewportOptions;
  private readonly sinkTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics?: MetricsProvider;
  private readonly now: () => number;
  private readonly judgeOptions: JudgeOptions;

  constructor(config: AuditOrchestratorConfig) {
    this.agents = config.agents;
    this.engine = config.engine;
    this.breakers = config.breakers;
    this.timeouts = config.timeouts;
    this.reputation = config.reputation;
    this.complexity = config.complexity ?? new ComplexityAnalyzer();
    this.tierBudgets = config.tierBudgets ?? {};
    this.confidenceThreshold = config.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.maxPagesPerIteration = config.maxPagesPerIteration ?? DEFAULT_PAGES_PER_ITERATION;
    this.penaltyFloor = config.penaltyFloor ?? DEFAULT_PENALTY_FLOOR;
    this.viewport = config.viewport ?? DEFAULT_VIEWPORT;
    this.sinkTimeoutMs = Math.max(0, config.sinkTimeoutMs ?? DEFAULT_SINK_TIMEOUT_MS);
    this.logger = config.logger ?? silentLogger;
    this.metrics = config.metrics;
    this.now = config.now ?? Date.now;
    this.judgeOptions = {
      engine: this.engine,
      reputation: this.reputation,
      confidenceThreshold: this.confidenceThreshold,
      maxPagesPerIteration: this.maxPagesPerIteration,
    };
  }

  /**
   * Run one audit to completion. Always resolves: failures of the run end
   * in a report with status `ERROR`, which is also sent as `audit_error`.
   */
  async run(auditId: string, request: AuditRequest, options: AuditRunOptions = {}): Promise<AuditReport> {
    const state = this.createState(auditId, request);
    const logger = this.logger.child(`audit:${auditId.slice(0, 8)}`);
    const run: AuditRun = {
      state,
      logger,
      sink: options.sink,
      signal: options.signal,
      degradation: new DegradationManager<AgentResults>({
        breakers: this.breakers,
        fallbacks: createAgentFallbacks({
          currentUrl: () => state.currentUrl,
          evidence: () => this.evidence(state),
          computeVerdict: (evidence) => computeVerdict(evidence, this.judgeOptions),
        }),
        recorder: this.timeouts,
        logger,
        metrics: this.metrics,
        now: this.now,
      }),
    };
    this.metrics?.counter(TELEMETRY_METRIC_NAMES.AUDITS_STARTED_TOTAL, 1, { tier: state.tier });

    try {
      this.prepare(state, request);
      logger.info(`Starting ${state.tier} audit of ${state.url}`);
      let phase: AuditPhase = 'SCOUT';
      while (phase !== 'DONE' && phase !== 'ERROR') {
        if (run.signal?.aborted) {
          throw new AuditCancelledError(auditId);
        }
        state.phase = phase;
        switch (phase) {
          case 'SCOUT':
            phase = await this.scoutPhase(run);
            break;
          case 'ANALYZE':
            phase = await this.analyzePhase(run);
            break;
          case 'JUDGE':
            phase = await this.judgePhase(run);
            break;
          case 'LOOP':
            phase = this.loopPhase(run);
            break;
        }
      }
      const report = this.finish(run);
      await this.emit(run, { type: 'audit_complete', auditId, timestamp: this.now(), report });
      return report;
    } catch (error) {
      const message = toErrorMessage(error);
      if (isConfigurationError(error)) {
        logger.error(`Audit failed on configuration: ${message}`);
      } else {
        logger.error(`Audit failed: ${message}`);
      }
      const report = this.buildReport(state, 'ERROR', message);
      await this.emit(run, { type: 'audit_error', auditId, timestamp: this.now(), message, report });
      return report;
    }
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async scoutPhase(run: AuditRun): Promise<AuditPhase> {
    const { state } = run;
    state.iteration += 1;
    state.pageResults = [];
    const targets = state.targets.splice(0);

    for (const [index, target] of targets.entries()) {
      if (state.investigatedUrls.length >= state.budget.maxPages) {
        state.budgetExhausted = true;
        break;
      }
      state.currentUrl = target;
      state.pendingScouts = targets.length - index - 1;
      const outcome = await this.runStage(
        run,
        'scout',
        (context) => this.agents.scout.scout(target, this.viewport, context),
        summarizeScout,
      );
      if (!outcome) break;
      state.investigatedUrls.push(normalizeUrl(target) ?? target);
      state.scoutResults.push(outcome.value);
      state.pageResults.push(outcome.value);
      this.markEvidence(state, 'scout', outcome.degraded);
    }
    state.pendingScouts = 0;

    if (state.pageResults.length === 0) {
      state.iteration -= 1;
      return this.exhaust(run, 'no page could be scouted');
    }

    if (!state.siteTypeFixed) {
      state.siteType = this.detectSiteType(state);
    }
    const metrics = this.complexity.analyze(
      state.pageResults[state.pageResults.length - 1],
      state.vision,
      state.security,
    );
    state.complexityHistory.push(metrics);
    return 'ANALYZE';
  }

  private async analyzePhase(run: AuditRun): Promise<AuditPhase> {
    const { state } = run;
    const screenshots = state.pageResults.flatMap((result) => result.screenshotPaths);
    const entities = state.pageResults.flatMap((result) => result.metadata.entities ?? []);
    const domain = new URL(state.url).hostname;
    const categories = taxonomySubset(this.engine.profileFor(state.siteType).priorityPatterns);

    const stages: Array<Promise<void>> = [
      this.runStage(
        run,
        'vision',
        (context) => this.agents.vision.analyze(screenshots, categories, context),
        summarizeVision,
      ).then((outcome) => {
        if (outcome) this.acceptVision(state, outcome);
      }),
      this.runStage(
        run,
        'graph',
        (context) => this.agents.graph.investigate(entities, domain, context),
        summarizeGraph,
      ).then((outcome) => {
        if (outcome) this.acceptGraph(state, outcome);
      }),
    ];

    const scanner = this.agents.security;
    if (scanner && this.wantsSecurity(state)) {
      stages.push(
        this.runStage(
          run,
          'security',
          (context) => scanner.scan(state.url, state.securityModules, context),
          summarizeSecurity,
        ).then((outcome) => {
          if (outcome && (!outcome.degraded || state.security === null)) {
            state.security = outcome.value;
            this.markEvidence(state, 'security', outcome.degraded);
          }
        }),
      );
    }

    // Every stage is deadline-bounded, so waiting for all of them is bounded too.
    const settled = await Promise.allSettled(stages);
    for (const result of settled) {
      if (result.status === 'rejected') throw result.reason;
    }

    if (!state.siteTypeFixed && state.graph?.domainIntel) {
      state.siteType = this.detectSiteType(state);
    }
    return 'JUDGE';
  }

  private async judgePhase(run: AuditRun): Promise<AuditPhase> {
    const { state } = run;
    const evidence = this.evidence(state);
    const version = state.evidenceVersion;
    const outcome = await this.runStage(
      run,
      'judge',
      (context) => this.agents.judge.deliberate(evidence, context),
      summarizeJudge,
    );
    if (!outcome) {
      return this.exhaust(run, 'judge could not run');
    }
    state.verdict = outcome.value;
    state.judgedVersion = version;
    return 'LOOP';
  }

  private loopPhase(run: AuditRun): AuditPhase {
    const { state } = run;
    const verdict = state.verdict;
    if (!verdict) return 'DONE';

    const wantsMore =
      verdict.decision === 'REQUEST_MORE_INVESTIGATION' ||
      verdict.trustScore.confidence < this.confidenceThreshold;
    if (!wantsMore) return 'DONE';

    const targets = this.nextTargets(state, verdict);
    if (targets.length === 0) {
      run.logger.debug('No unvisited pages left to investigate');
      return 'DONE';
    }
    if (state.iteration >= state.budget.maxIterations) {
      return this.exhaust(run, `iteration limit ${state.budget.maxIterations} reached`);
    }
    if (state.investigatedUrls.length >= state.budget.maxPages) {
      return this.exhaust(run, `page limit ${state.budget.maxPages} reached`);
    }
    if (!this.hasBudget(state)) {
      return this.exhaust(run, 'time or call budget spent');
    }
    state.targets = targets;
    return 'SCOUT';
  }

  // ==========================================================================
  // Stage execution
  // ==========================================================================

  /**
   * Run one agent stage under the run's budget. Returns null without calling
   * the agent when no budget is left.
   */
  private async runStage<K extends AgentName>(
    run: AuditRun,
    agent: K,
    operation: (context: AgentCallContext) => Promise<AgentResults[K]>,
    summarize: (result: AgentResults[K]) => StageSummary,
  ): Promise<StageResult<AgentResults[K]> | null> {
    const { state } = run;
    if (!this.reserveCall(state)) {
      state.budgetExhausted = true;
      return null;
    }
    const iteration = state.iteration;
    const metrics = this.latestMetrics(state);
    await this.emit(run, {
      type: 'stage_started',
      auditId: state.auditId,
      timestamp: this.now(),
      stage: agent,
      iteration,
      estimatedRemainingMs: this.timeouts.estimateRemaining([agent, ...this.stagesAfter(state, agent)], metrics),
    });
    // After the event, so sink time comes out of this stage's deadline.
    const deadlineMs = Math.min(this.timeouts.deadlineFor(agent, metrics), this.remainingMs(state));

    const controller = new AbortController();
    const unlink = linkAbortSignal(run.signal, controller);
    let outcome: StageOutcome<AgentResults[K]>;
    try {
      outcome = await run.degradation.execute(
        agent,
        (signal) => operation({ signal, auditId: state.auditId, iteration }),
        { deadlineMs, signal: controller.signal },
      );
    } finally {
      unlink();
      controller.abort();
    }

    if (!outcome.invoked) {
      state.externalCalls -= 1;
    }
    this.metrics?.histogram(TELEMETRY_METRIC_NAMES.STAGE_DURATION, outcome.durationMs, { agent });
    const flag = outcome.degraded ? toFlag(agent, iteration, outcome.degraded) : null;
    if (flag) state.degradation.push(flag);

    await this.emit(run, {
      type: 'stage_completed',
      auditId: state.auditId,
      timestamp: this.now(),
      stage: agent,
      iteration,
      durationMs: outcome.durationMs,
      summary: summarize(outcome.result),
      degraded: flag,
      estimatedRemainingMs: this.timeouts.estimateRemaining(this.stagesAfter(state, agent), this.latestMetrics(state)),
    });
    return { value: outcome.result, degraded: flag !== null };
  }

  /** Stages of the current iteration that run after `agent`, in pipeline order. */
  private stagesAfter(state: AuditState, agent: AgentName): AgentName[] {
    const analyze: AgentName[] = ['vision', 'graph'];
    if (this.agents.security && this.wantsSecurity(state)) analyze.push('security');
    switch (agent) {
      case 'scout':
        return [...Array.from({ length: state.pendingScouts }, (): AgentName => 'scout'), ...analyze, 'judge'];
      case 'judge':
        return [];
      default: {
        const position = analyze.indexOf(agent);
        return [...(position >= 0 ? analyze.slice(position + 1) : []), 'judge'];
      }
    }
  }

  private wantsSecurity(state: AuditState): boolean {
    return state.securityModules.length > 0 && !state.realAgents.has('security');
  }

  private reserveCall(state: AuditState): boolean {
    if (!this.hasBudget(state)) return false;
    state.externalCalls += 1;
    return true;
  }

  private hasBudget(state: AuditState): boolean {
    return state.externalCalls < state.budget.maxExternalCalls && this.remainingMs(state) > 0;
  }

  private remainingMs(state: AuditState): number {
    return state.budget.maxElapsedMs - (this.now() - state.startedAt);
  }

  private latestMetrics(state: AuditState): ComplexityMetrics | null {
    return state.complexityHistory[state.complexityHistory.length - 1] ?? null;
  }

  // ==========================================================================
  // Evidence
  // ==========================================================================

  private acceptVision(state: AuditState, outcome: StageResult<VisionResult>): void {
    if (outcome.degraded) {
      if (state.realAgents.has('vision')) return;
      state.vision = outcome.value;
    } else {
      state.vision =
        state.vision && state.realAgents.has('vision') ? mergeVision(state.vision, outcome.value) : outcome.value;
    }
    this.markEvidence(state, 'vision', outcome.degraded);
  }

  private acceptGraph(state: AuditState, outcome: StageResult<GraphResult>): void {
    if (outcome.degraded) {
      if (state.realAgents.has('graph')) return;
      state.graph = outcome.value;
    } else {
      this.recordPredictions(state, outcome.value);
      state.graph =
        state.graph && state.realAgents.has('graph') ? mergeGraph(state.graph, outcome.value) : outcome.value;
    }
    this.markEvidence(state, 'graph', outcome.degraded);
  }

  private markEvidence(state: AuditState, agent: AgentName, degraded: boolean): void {
    if (degraded) {
      if (!state.realAgents.has(agent)) state.degradedAgents.add(agent);
    } else {
      state.realAgents.add(agent);
      state.degradedAgents.delete(agent);
    }
    state.evidenceVersion += 1;
  }

  private recordPredictions(state: AuditState, graph: GraphResult): void {
    for (const claim of graph.sourceVerdicts ?? []) {
      if (claim.verdict === 'UNKNOWN') continue;
      const predictionIndex = this.reputation.recordPrediction(claim.source, claim.verdict, claim.confidence);
      state.predictions.push({
        source: claim.source,
        verdict: claim.verdict,
        confidence: claim.confidence,
        predictionIndex,
      });
    }
  }

  private evidence(state: AuditState): AuditEvidence {
    return {
      url: state.url,
      siteType: state.siteType,
      verdictMode: state.verdictMode,
      iteration: state.iteration,
      scoutResults: [...state.scoutResults],
      vision: state.vision,
      graph: state.graph,
      security: state.security,
      degradedAgents: [...state.degradedAgents],
      investigatedUrls: [...state.investigatedUrls],
    };
  }

  /** Agent hint when it names a known type, otherwise page heuristics. */
  private detectSiteType(state: AuditState): SiteType {
    const landing =
      state.scoutResults.find((result) => Object.keys(result.metadata).length > 0) ?? state.scoutResults[0];
    const hint = landing?.siteTypeHint?.trim().toLowerCase();
    if (hint && hint !== 'general' && isSiteType(hint)) {
      return hint;
    }
    return classifySiteType({
      url: state.url,
      metadata: landing?.metadata,
      domainIntel: state.graph?.domainIntel,
    }).siteType;
  }

  private nextTargets(state: AuditState, verdict: JudgeOutput): string[] {
    const limit = Math.min(this.maxPagesPerIteration, state.budget.maxPages - state.investigatedUrls.length);
    if (limit <= 0) return [];
    const investigated = new Set(state.investigatedUrls);
    const requested: string[] = [];
    for (const raw of verdict.investigateUrls) {
      const url = normalizeUrl(raw, state.url);
      if (url === null || investigated.has(url) || requested.includes(url)) continue;
      if (new URL(url).host !== new URL(state.url).host) continue;
      requested.push(url);
    }
    if (requested.length > 0) return requested.slice(0, limit);
    return selectPriorityPages(
      state.url,
      state.scoutResults.flatMap((result) => result.discoveredLinks),
      state.investigatedUrls,
      limit,
    );
  }

  // ==========================================================================
  // Completion
  // ==========================================================================

  /** Stop on budget. The verdict is computed locally when the judge has not seen the latest evidence. */
  private exhaust(run: AuditRun, reason: string): AuditPhase {
    run.state.budgetExhausted = true;
    run.logger.info(`Budget exhausted (${reason}); rendering verdict`);
    return 'DONE';
  }

  private finish(run: AuditRun): AuditReport {
    const { state } = run;
    if (!state.verdict || state.judgedVersion !== state.evidenceVersion) {
      const local = computeVerdict(this.evidence(state), this.judgeOptions);
      state.verdict = { ...local, decision: 'RENDER_VERDICT', investigateUrls: [] };
      state.forcedVerdict = true;
      run.logger.info('Verdict computed locally from the evidence gathered so far');
    }
    const report = this.buildReport(state, 'DONE');
    this.metrics?.counter(TELEMETRY_METRIC_NAMES.AUDITS_COMPLETED_TOTAL, 1, {
      status: report.status,
      riskLevel: report.trustScore?.riskLevel ?? 'NONE',
    });
    this.metrics?.histogram(TELEMETRY_METRIC_NAMES.AUDIT_ITERATIONS, report.iterations);
    if (report.trustScore) {
      this.metrics?.histogram(TELEMETRY_METRIC_NAMES.AUDIT_TRUST_SCORE, report.trustScore.finalScore);
    }
    run.logger.info(
      `Audit done: ${report.trustScore?.finalScore ?? '-'}/100 after ${report.iterations} iteration(s), ${report.externalCalls} call(s)`,
    );
    return report;
  }

  private buildReport(state: AuditState, status: AuditStatus, error?: string): AuditReport {
    state.phase = status;
    const penalties = state.degradation.map((flag) => flag.qualityPenalty);
    const verdict = state.verdict;
    const trustScore = verdict ? applyQualityPenalty(verdict.trustScore, penalties, this.penaltyFloor) : null;

    let narrative = verdict?.narrative ?? '';
    if (verdict && state.forcedVerdict) {
      narrative = `Budget exhausted; verdict based on partial evidence. ${narrative}`;
    }
    if (verdict && trustScore && trustScore.finalScore !== verdict.trustScore.finalScore) {
      narrative = `${narrative} Score reduced to ${trustScore.finalScore}/100 for degraded evidence.`;
    }

    return {
      auditId: state.auditId,
      url: state.url,
      tier: state.tier,
      verdictMode: state.verdictMode,
      status,
      siteType: state.siteType,
      iterations: state.iteration,
      trustScore,
      narrative,
      degradation: [...state.degradation],
      totalPenalty: totalPenalty(penalties),
      externalCalls: state.externalCalls,
      elapsedMs: this.now() - state.startedAt,
      investigatedUrls: [...state.investigatedUrls],
      complexityHistory: [...state.complexityHistory],
      predictions: [...state.predictions],
      budgetExhausted: state.budgetExhausted,
      forcedVerdict: state.forcedVerdict,
      ...(error !== undefined ? { error } : {}),
    };
  }

  // ==========================================================================
  // Setup and events
  // ==========================================================================

  private createState(auditId: string, request: AuditRequest): AuditState {
    return {
      auditId,
      url: request.url,
      tier: DEFAULT_AUDIT_TIER,
      verdictMode: request.verdictMode ?? 'expert',
      securityModules: [...(request.securityModules ?? [])],
      budget: resolveBudget(DEFAULT_AUDIT_TIER, this.tierBudgets),
      phase: 'SCOUT',
      siteType: 'general',
      siteTypeFixed: false,
      iteration: 0,
      startedAt: this.now(),
      externalCalls: 0,
      targets: [],
      currentUrl: request.url,
      scoutResults: [],
      pendingScouts: 0,
      pageResults: [],
      vision: null,
      graph: null,
      security: null,
      realAgents: new Set(),
      degradedAgents: new Set(),
      degradation: [],
      complexityHistory: [],
      predictions: [],
      investigatedUrls: [],
      verdict: null,
      evidenceVersion: 0,
      judgedVersion: -1,
      budgetExhausted: false,
      forcedVerdict: false,
    };
  }

  /**
   * Validate the request into `state`.
   *
   * @throws ValidationError for a URL that is not http(s)
   * @throws ConfigurationError for an unknown tier or site type
   */
  private prepare(state: AuditState, request: AuditRequest): void {
    const url = normalizeUrl(request.url);
    if (url === null) {
      throw new ValidationError(`Audit URL must be an absolute http(s) URL, got "${request.url}"`);
    }
    state.url = url;
    state.currentUrl = url;
    state.targets = [url];
    const tier = resolveTier(request.tier);
    state.budget = resolveBudget(tier, this.tierBudgets);
    state.tier = tier;
    if (request.siteType !== undefined) {
      state.siteType = resolveSiteType(request.siteType);
      state.siteTypeFixed = true;
    }
  }

  /**
   * Deliver `event` to the run's sink. Waits at most the sink timeout, and for
   * stage events no longer than the run's remaining time; a late delivery is
   * logged and the run moves on without it.
   */
  private async emit(run: AuditRun, event: AuditEvent): Promise<void> {
    const sink = run.sink;
    if (!sink) return;
    const waitMs = isTerminalEvent(event)
      ? this.sinkTimeoutMs
      : Math.min(this.sinkTimeoutMs, Math.max(0, this.remainingMs(run.state)));

    const delivered = Promise.resolve()
      .then(() => sink(event))
      .then(
        () => true,
        (error: unknown) => {
          run.logger.warn(`Event sink rejected ${event.type}: ${toErrorMessage(error)}`);
          return true;
        },
      );
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), waitMs);
    });
    try {
      if (!(await Promise.race([delivered, expired]))) {
        run.logger.warn(`Event sink did not take ${event.type} within ${waitMs}ms; continuing`);
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
