import { describe, it, expect, vi } from 'vitest';
import { AuditOrchestrator, DEFAULT_VIEWPORT, type AuditOrchestratorConfig } from './orchestrator.js';
import { EvidenceJudge, computeVerdict } from '../agents/judge.js';
import type {
  AuditAgents,
  AuditEvidence,
  GraphInvestigator,
  GraphResult,
  JudgeAgent,
  JudgeOutput,
  ScoutAgent,
  ScoutResult,
  SecurityScanner,
  VisionAgent,
  VisionResult,
} from '../agents/types.js';
import { TimeoutManager } from '../budget/timeout-manager.js';
import { ReputationManager } from '../reputation/manager.js';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { TrustScoreEngine } from '../scoring/engine.js';
import { ConfigurationError } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import type { AuditEvent } from './types.js';

const engine = new TrustScoreEngine();

function scoutResult(url: string): ScoutResult {
  return {
    url,
    metadata: { hasSsl: true, entities: [{ name: 'Example Ltd', type: 'company' }] },
    screenshotPaths: [`/shots/${new URL(url).pathname.replace(/\//g, '_')}.png`],
    discoveredLinks: ['https://example.test/about'],
  };
}

const CLEAN_GRAPH: GraphResult = {
  verifiedEntities: [
    { entity: 'Example Ltd', entityType: 'company', status: 'confirmed', source: 'registry', confidence: 0.9 },
    { entity: 'example.test', entityType: 'domain', status: 'confirmed', source: 'whois', confidence: 0.9 },
  ],
  inconsistencies: [],
  graphScore: 0.9,
  domainIntel: { domainAgeDays: 400, sslValid: true },
  sourceVerdicts: [{ source: 'dns', verdict: 'SAFE', confidence: 0.9 }],
};

function cleanScout(): ScoutAgent {
  return { scout: vi.fn(async (url: string) => scoutResult(url)) };
}

function cleanVision(): VisionAgent {
  return { analyze: vi.fn(async () => ({ findings: [], visualScore: 0.95 })) };
}

function cleanGraph(): GraphInvestigator {
  return { investigate: vi.fn(async () => CLEAN_GRAPH) };
}

function hanging<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

function recordingLogger(lines: string[]): Logger {
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message) => {
      lines.push(message);
    },
    error: (message) => {
      lines.push(message);
    },
    setLevel: () => {},
    child: () => logger,
  };
  return logger;
}

function setup(agents: Partial<AuditAgents> = {}, config: Partial<AuditOrchestratorConfig> = {}) {
  const reputation = config.reputation ?? new ReputationManager();
  const orchestrator = new AuditOrchestrator({
    agents: {
      scout: cleanScout(),
      vision: cleanVision(),
      graph: cleanGraph(),
      judge: new EvidenceJudge({ engine, reputation }),
      ...agents,
    },
    engine,
    breakers: new CircuitBreakerRegistry(),
    timeouts: new TimeoutManager({ strategy: 'FAST' }),
    ...config,
    reputation,
  });
  return { orchestrator, reputation };
}

describe('AuditOrchestrator', () => {
  it('audits a clean site in one pass', async () => {
    const events: AuditEvent[] = [];
    const { orchestrator, reputation } = setup();

    const report = await orchestrator.run(
      'audit-clean',
      { url: 'https://example.test', tier: 'quick_scan' },
      { sink: (event) => void events.push(event) },
    );

    expect(report.status).toBe('DONE');
    expect(report.url).toBe('https://example.test/');
    expect(report.siteType).toBe('general');
    expect(report.iterations).toBe(1);
    expect(report.trustScore?.finalScore).toBe(95);
    expect(report.trustScore?.riskLevel).toBe('TRUSTED');
    expect(report.trustScore?.overridesApplied).toEqual([]);
    expect(report.externalCalls).toBe(4);
    expect(report.degradation).toEqual([]);
    expect(report.totalPenalty).toBe(0);
    expect(report.investigatedUrls).toEqual(['https://example.test/']);
    expect(report.complexityHistory).toHaveLength(1);
    expect(report.budgetExhausted).toBe(false);
    expect(report.forcedVerdict).toBe(false);
    expect(report.predictions).toEqual([{ source: 'dns', verdict: 'SAFE', confidence: 0.9, predictionIndex: 0 }]);
    expect(reputation.getReputation('dns').totalPredictions).toBe(1);

    expect(events.slice(0, 2).map((event) => event.type)).toEqual(['stage_started', 'stage_completed']);
    expect(events.filter((event) => event.type === 'stage_started')).toHaveLength(4);
    expect(events.filter((event) => event.type === 'stage_completed')).toHaveLength(4);
    const remaining = Object.fromEntries(
      events.flatMap((event) =>
        event.type === 'stage_started' || event.type === 'stage_completed'
          ? [[`${event.type}:${event.stage}`, event.estimatedRemainingMs]]
          : [],
      ),
    );
    expect(remaining).toEqual({
      'stage_started:scout': 35_000,
      'stage_completed:scout': 25_000,
      'stage_started:vision': 25_000,
      'stage_completed:vision': 10_000,
      'stage_started:graph': 10_000,
      'stage_completed:graph': 5_000,
      'stage_started:judge': 5_000,
      'stage_completed:judge': 0,
    });
    const last = events[events.length - 1];
    expect(last.type).toBe('audit_complete');
    if (last.type === 'audit_complete') {
      expect(last.report).toBe(report);
    }
  });

  it('passes the page and viewport to the scout', async () => {
    const scout = cleanScout();
    const { orchestrator } = setup({ scout });

    await orchestrator.run('audit-viewport', { url: 'https://example.test', tier: 'quick_scan' });

    expect(scout.scout).toHaveBeenCalledWith(
      'https://example.test/',
      DEFAULT_VIEWPORT,
      expect.objectContaining({ auditId: 'audit-viewport', iteration: 1 }),
    );
  });

  it('caps a clean-looking site when the graph contradicts it', async () => {
    const graph: GraphInvestigator = {
      investigate: vi.fn(async (): Promise<GraphResult> => ({
        verifiedEntities: [
          { entity: 'Example Ltd', entityType: 'company', status: 'contradicted', source: 'registry', confidence: 0.9 },
        ],
        inconsistencies: [],
        graphScore: 0.1,
        domainIntel: { domainAgeDays: 400, sslValid: true },
      })),
    };
    const { orchestrator } = setup({ graph });

    const report = await orchestrator.run('audit-contradicted', { url: 'https://example.test', tier: 'quick_scan' });

    expect(report.status).toBe('DONE');
    expect(report.trustScore?.overridesApplied).toContain('graph_overrides_vision');
    expect(report.trustScore?.finalScore).toBeLessThanOrEqual(69);
    // The judge wants /about, but a quick scan allows one iteration.
    expect(report.iterations).toBe(1);
    expect(report.budgetExhausted).toBe(true);
    expect(report.forcedVerdict).toBe(false);
  });

  it('finishes with fallback data when every agent fails', async () => {
    const events: AuditEvent[] = [];
    const { orchestrator } = setup(
      {
        scout: { scout: vi.fn(async () => Promise.reject(new Error('browser crashed'))) },
        vision: { analyze: vi.fn(async () => Promise.reject(new Error('model overloaded'))) },
        graph: { investigate: vi.fn(() => hanging<GraphResult>()) },
        judge: { deliberate: vi.fn(async () => Promise.reject(new Error('judge unavailable'))) },
      },
      {
        timeouts: new TimeoutManager({
          strategy: 'FAST',
          tiers: { FAST: { scout: 50, vision: 50, graph: 50, security: 50, judge: 50 } },
        }),
      },
    );

    const report = await orchestrator.run(
      'audit-failing',
      { url: 'https://example.test' },
      { sink: (event) => void events.push(event) },
    );

    expect(report.status).toBe('DONE');
    expect(report.degradation.map((flag) => [flag.agent, flag.reason])).toEqual([
      ['scout', 'error'],
      ['vision', 'error'],
      ['graph', 'timeout'],
      ['judge', 'error'],
    ]);
    expect(report.degradation[0].errorMessage).toBe('browser crashed');
    expect(report.degradation[3].fallbackMode).toBe('ALTERNATIVE');
    expect(report.totalPenalty).toBe(0.8);
    expect(report.trustScore?.rawScore).toBe(50);
    expect(report.trustScore?.finalScore).toBe(10);
    expect(report.trustScore?.riskLevel).toBe('DANGEROUS');
    expect(report.narrative.endsWith(' Score reduced to 10/100 for degraded evidence.')).toBe(true);
    expect(report.forcedVerdict).toBe(false);

    const completed = events.filter((event) => event.type === 'stage_completed');
    expect(completed.map((event) => (event.type === 'stage_completed' ? event.degraded?.reason : null))).toEqual([
      'error',
      'error',
      'timeout',
      'error',
    ]);
    expect(events[events.length - 1].type).toBe('audit_complete');
  });

  it('stays within the time budget when agents hang', async () => {
    const { orchestrator } = setup(
      {
        scout: { scout: vi.fn(() => hanging<ScoutResult>()) },
        vision: { analyze: vi.fn(() => hanging<VisionResult>()) },
        graph: { investigate: vi.fn(() => hanging<GraphResult>()) },
        judge: { deliberate: vi.fn(() => hanging<JudgeOutput>()) },
      },
      { tierBudgets: { standard_audit: { maxElapsedMs: 300 } } },
    );

    const report = await orchestrator.run('audit-hanging', { url: 'https://example.test' });

    expect(report.status).toBe('DONE');
    expect(report.elapsedMs).toBeLessThan(1_000);
    expect(report.trustScore).not.toBeNull();
    expect(report.degradation[0]).toMatchObject({ agent: 'scout', reason: 'timeout' });
  });

  it('renders a local verdict when the call budget runs out before the judge', async () => {
    const security: SecurityScanner = {
      scan: vi.fn(async () => ({
        modules: [
          { module: 'security_headers', score: 0.9, findings: [] },
          { module: 'phishing_db', score: 1, findings: [] },
        ],
        overallScore: 0.95,
      })),
    };
    const judge: JudgeAgent = { deliberate: vi.fn(async (evidence: AuditEvidence) => computeVerdict(evidence, { engine })) };
    const { orchestrator } = setup({ security, judge });

    const report = await orchestrator.run('audit-calls', {
      url: 'https://example.test',
      tier: 'quick_scan',
      securityModules: ['security_headers', 'phishing_db'],
    });

    expect(security.scan).toHaveBeenCalledWith(
      'https://example.test/',
      ['security_headers', 'phishing_db'],
      expect.objectContaining({ auditId: 'audit-calls' }),
    );
    expect(judge.deliberate).not.toHaveBeenCalled();
    expect(report.externalCalls).toBe(4);
    expect(report.budgetExhausted).toBe(true);
    expect(report.forcedVerdict).toBe(true);
    expect(report.trustScore).not.toBeNull();
    expect(report.narrative.startsWith('Budget exhausted; verdict based on partial evidence. ')).toBe(true);
  });

  it('scouts the pages the judge asks for', async () => {
    const scout = cleanScout();
    let deliberations = 0;
    const judge: JudgeAgent = {
      deliberate: vi.fn(async (evidence: AuditEvidence): Promise<JudgeOutput> => {
        deliberations += 1;
        const verdict = computeVerdict(evidence, { engine });
        return deliberations === 1
          ? { ...verdict, decision: 'REQUEST_MORE_INVESTIGATION', investigateUrls: ['/about'] }
          : verdict;
      }),
    };
    const { orchestrator } = setup({ scout, judge });

    const report = await orchestrator.run('audit-loop', { url: 'https://example.test' });

    expect(report.status).toBe('DONE');
    expect(report.iterations).toBe(2);
    expect(report.externalCalls).toBe(8);
    expect(report.investigatedUrls).toEqual(['https://example.test/', 'https://example.test/about']);
    expect(report.complexityHistory).toHaveLength(2);
    expect(report.budgetExhausted).toBe(false);
    expect(scout.scout).toHaveBeenNthCalledWith(
      2,
      'https://example.test/about',
      DEFAULT_VIEWPORT,
      expect.objectContaining({ iteration: 2 }),
    );
  });

  it('skips an agent whose circuit opened in an earlier audit', async () => {
    const vision: VisionAgent = { analyze: vi.fn(async () => Promise.reject(new Error('model overloaded'))) };
    const { orchestrator } = setup(
      { vision },
      { breakers: new CircuitBreakerRegistry({ configs: { vision: { failureThreshold: 1, baseBackoffMs: 60_000 } } }) },
    );

    const first = await orchestrator.run('audit-first', { url: 'https://example.test', tier: 'quick_scan' });
    const second = await orchestrator.run('audit-second', { url: 'https://example.test', tier: 'quick_scan' });

    expect(first.degradation).toMatchObject([{ agent: 'vision', reason: 'error' }]);
    expect(second.degradation).toMatchObject([
      { agent: 'vision', reason: 'circuit_open', fallbackMode: 'SIMPLIFIED', qualityPenalty: 0.2 },
    ]);
    expect(vision.analyze).toHaveBeenCalledTimes(1);
    expect(first.externalCalls).toBe(4);
    expect(second.externalCalls).toBe(3);
  });

  it('ends in ERROR for an unknown site type', async () => {
    const events: AuditEvent[] = [];
    const scout = cleanScout();
    const { orchestrator } = setup({ scout });

    const report = await orchestrator.run(
      'audit-config',
      { url: 'https://example.test', siteType: 'casino' },
      { sink: (event) => void events.push(event) },
    );

    expect(report.status).toBe('ERROR');
    expect(report.error).toBe('Unknown site type "casino"');
    expect(report.trustScore).toBeNull();
    expect(report.externalCalls).toBe(0);
    expect(scout.scout).not.toHaveBeenCalled();
    expect(events.map((event) => event.type)).toEqual(['audit_error']);
  });

  it('ends in ERROR when an agent reports a configuration problem', async () => {
    const events: AuditEvent[] = [];
    const judge: JudgeAgent = {
      deliberate: vi.fn(async () => Promise.reject(new ConfigurationError('weights.graph: missing'))),
    };
    const { orchestrator } = setup({ judge });

    const report = await orchestrator.run(
      'audit-judge-config',
      { url: 'https://example.test', tier: 'quick_scan' },
      { sink: (event) => void events.push(event) },
    );

    expect(report.status).toBe('ERROR');
    expect(report.error).toBe('weights.graph: missing');
    expect(events[events.length - 1].type).toBe('audit_error');
  });

  it('rejects a URL that is not http(s)', async () => {
    const { orchestrator } = setup();

    const report = await orchestrator.run('audit-url', { url: 'ftp://example.test' });

    expect(report.status).toBe('ERROR');
    expect(report.error).toBe('Audit URL must be an absolute http(s) URL, got "ftp://example.test"');
  });

  it('ends in ERROR when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const { orchestrator } = setup();

    const report = await orchestrator.run(
      'audit-cancelled',
      { url: 'https://example.test' },
      { signal: controller.signal },
    );

    expect(report.status).toBe('ERROR');
    expect(report.error).toBe('Audit "audit-cancelled" was cancelled');
    expect(report.externalCalls).toBe(0);
  });

  it('keeps running when the event sink throws', async () => {
    const lines: string[] = [];
    const { orchestrator } = setup({}, { logger: recordingLogger(lines) });

    const report = await orchestrator.run(
      'audit-sink',
      { url: 'https://example.test', tier: 'quick_scan' },
      {
        sink: () => {
          throw new Error('sink down');
        },
      },
    );

    expect(report.status).toBe('DONE');
    expect(report.trustScore?.finalScore).toBe(95);
    expect(lines[0]).toBe('Event sink rejected stage_started: sink down');
  });

  it('includes the security stage in remaining-time estimates when it will run', async () => {
    const events: AuditEvent[] = [];
    const security: SecurityScanner = {
      scan: vi.fn(async () => ({ modules: [], overallScore: 0.9 })),
    };
    const { orchestrator } = setup({ security });

    await orchestrator.run(
      'audit-estimate',
      { url: 'https://example.test', tier: 'quick_scan', securityModules: ['headers'] },
      { sink: (event) => void events.push(event) },
    );

    const scoutStarted = events.find((event) => event.type === 'stage_started' && event.stage === 'scout');
    expect(scoutStarted?.type === 'stage_started' ? scoutStarted.estimatedRemainingMs : null).toBe(43_000);
  });

  it('keeps a slow event sink inside the time budget', async () => {
    const lines: string[] = [];
    const { orchestrator } = setup(
      {},
      { tierBudgets: { quick_scan: { maxElapsedMs: 200 } }, logger: recordingLogger(lines) },
    );

    const report = await orchestrator.run(
      'audit-slow-sink',
      { url: 'https://example.test', tier: 'quick_scan' },
      { sink: () => new Promise<void>((resolve) => setTimeout(resolve, 150)) },
    );

    expect(report.status).toBe('DONE');
    expect(report.elapsedMs).toBeLessThan(300);
    expect(report.budgetExhausted).toBe(true);
    expect(lines.some((line) => line.startsWith('Event sink did not take stage_completed within'))).toBe(true);
  });

  it('finishes when the event sink never settles', async () => {
    const lines: string[] = [];
    const { orchestrator } = setup({}, { sinkTimeoutMs: 20, logger: recordingLogger(lines) });

    const report = await orchestrator.run(
      'audit-stuck-sink',
      { url: 'https://example.test', tier: 'quick_scan' },
      { sink: () => hanging<void>() },
    );

    expect(report.status).toBe('DONE');
    expect(report.trustScore?.finalScore).toBe(95);
    expect(lines[0]).toBe('Event sink did not take stage_started within 20ms; continuing');
    expect(lines[lines.length - 1]).toBe('Event sink did not take audit_complete within 20ms; continuing');
  });
});
