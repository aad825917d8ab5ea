import { describe, it, expect, vi } from 'vitest';
import { AuditService } from './service.js';
import { AuditOrchestrator } from './orchestrator.js';
import { AuditNotFoundError, AuditUnavailableError } from './errors.js';
import { EvidenceJudge } from '../agents/judge.js';
import type { GraphResult, ScoutAgent, ScoutResult } from '../agents/types.js';
import { TimeoutManager } from '../budget/timeout-manager.js';
import { ReputationManager } from '../reputation/manager.js';
import { InMemoryReputationStore } from '../reputation/store.js';
import { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';
import { TrustScoreEngine } from '../scoring/engine.js';
import { ValidationError } from '../types/errors.js';
import { createDeferred } from '../utils/async.js';
import type { AuditEvent } from './types.js';

const engine = new TrustScoreEngine();

function scoutResult(url: string): ScoutResult {
  return {
    url,
    metadata: { hasSsl: true, entities: [{ name: 'Example Ltd', type: 'company' }] },
    screenshotPaths: ['/shots/home.png'],
    discoveredLinks: [],
  };
}

async function collect(stream: AsyncIterable<AuditEvent>): Promise<AuditEvent[]> {
  const events: AuditEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

interface SetupOptions {
  scout?: ScoutAgent;
  maxConcurrentAudits?: number;
  finishedAuditRetentionMs?: number;
  maxFinishedAudits?: number;
  now?: () => number;
}

function setup(options: SetupOptions = {}) {
  const reputation = new ReputationManager();
  const store = new InMemoryReputationStore();
  const browser = { close: vi.fn(async () => undefined) };
  let next = 0;
  const orchestrator = new AuditOrchestrator({
    agents: {
      scout: options.scout ?? { scout: vi.fn(async (url: string) => scoutResult(url)) },
      vision: { analyze: vi.fn(async () => ({ findings: [], visualScore: 0.95 })) },
      graph: {
        investigate: vi.fn(async (): Promise<GraphResult> => ({
          verifiedEntities: [
            { entity: 'Example Ltd', entityType: 'company', status: 'confirmed', source: 'registry', confidence: 0.9 },
          ],
          inconsistencies: [],
          graphScore: 0.9,
          domainIntel: { domainAgeDays: 400, sslValid: true },
          sourceVerdicts: [{ source: 'dns', verdict: 'SAFE', confidence: 0.9 }],
        })),
      },
      judge: new EvidenceJudge({ engine, reputation }),
    },
    engine,
    breakers: new CircuitBreakerRegistry(),
    timeouts: new TimeoutManager({ strategy: 'FAST' }),
    reputation,
  });
  const service = new AuditService({
    orchestrator,
    reputation,
    reputationStore: store,
    browser,
    maxConcurrentAudits: options.maxConcurrentAudits,
    finishedAuditRetentionMs: options.finishedAuditRetentionMs,
    maxFinishedAudits: options.maxFinishedAudits,
    now: options.now,
    createId: () => {
      next += 1;
      return `audit-${next}`;
    },
  });
  return { service, reputation, store, browser };
}

describe('AuditService', () => {
  it('streams an audit from start to completion', async () => {
    const { service } = setup();

    const id = service.start({ url: 'https://example.test', tier: 'quick_scan' });
    const events = await collect(service.stream(id));
    const report = await service.result(id);

    expect(id).toBe('audit-1');
    expect(events[0]).toMatchObject({ type: 'stage_started', auditId: 'audit-1', stage: 'scout', iteration: 1 });
    expect(events[events.length - 1]).toMatchObject({ type: 'audit_complete', auditId: 'audit-1' });
    expect(report.status).toBe('DONE');
    expect(report.auditId).toBe('audit-1');
    expect(service.lifecycle(id)).toBe('finished');
  });

  it('replays the full stream to a late subscriber', async () => {
    const { service } = setup();
    const id = service.start({ url: 'https://example.test', tier: 'quick_scan' });

    const first = await collect(service.stream(id));
    const second = await collect(service.stream(id));

    expect(second).toEqual(first);
  });

  it('resolves source predictions once and saves reputation', async () => {
    const { service, reputation, store } = setup();
    const id = service.start({ url: 'https://example.test', tier: 'quick_scan' });

    const summary = await service.recordOutcome(id, 'SAFE');
    const again = await service.recordOutcome(id, 'MALICIOUS');

    expect(summary).toEqual({ auditId: id, actual: 'SAFE', resolved: 1, correct: 1 });
    expect(again).toEqual({ auditId: id, actual: 'MALICIOUS', resolved: 0, correct: 0 });
    expect(reputation.accuracy('dns')).toBe(1);
    expect(store.saveCount).toBe(1);
  });

  it('restores reputation on initialize', async () => {
    const seeded = new ReputationManager();
    seeded.recordPrediction('dns', 'SAFE', 0.9);
    seeded.recordActual('dns', 0, 'SAFE');
    const reputation = new ReputationManager();
    const service = new AuditService({
      orchestrator: new AuditOrchestrator({
        agents: {
          scout: { scout: vi.fn(async (url: string) => scoutResult(url)) },
          vision: { analyze: vi.fn(async () => ({ findings: [], visualScore: 0.95 })) },
          graph: { investigate: vi.fn(async () => ({ verifiedEntities: [], inconsistencies: [], graphScore: 0.5 })) },
          judge: new EvidenceJudge({ engine, reputation }),
        },
        engine,
        breakers: new CircuitBreakerRegistry(),
        timeouts: new TimeoutManager(),
        reputation,
      }),
      reputation,
      reputationStore: new InMemoryReputationStore(seeded.toSnapshot()),
    });

    await service.initialize();

    expect(reputation.getReputation('dns').totalPredictions).toBe(1);
    expect(reputation.accuracy('dns')).toBe(1);
  });

  it('rejects malformed requests', () => {
    const { service } = setup();

    expect(() => service.start({ url: 'not a url' })).toThrow(ValidationError);
    expect(() => service.start({ url: 'https://example.test', tier: 'deep_forensic' })).toThrow(
      'Unknown audit tier "deep_forensic"',
    );
  });

  it('reports unknown audit ids', () => {
    const { service } = setup();

    expect(() => service.result('missing')).toThrow(AuditNotFoundError);
    expect(() => service.stream('missing')).toThrow('No audit with id "missing"');
    expect(() => service.lifecycle('missing')).toThrow(AuditNotFoundError);
  });

  it('forgets finished audits after the retention time', async () => {
    let clock = 1_000;
    const { service } = setup({ finishedAuditRetentionMs: 5_000, now: () => clock });
    const id = service.start({ url: 'https://example.test', tier: 'quick_scan' });
    await service.result(id);

    clock = 5_999;
    expect(service.lifecycle(id)).toBe('finished');

    clock = 6_000;
    expect(() => service.stream(id)).toThrow(AuditNotFoundError);
    expect(() => service.result(id)).toThrow(AuditNotFoundError);
    await expect(service.recordOutcome(id, 'SAFE')).rejects.toThrow(AuditNotFoundError);
  });

  it('keeps at most maxFinishedAudits finished audits', async () => {
    const { service } = setup({ maxFinishedAudits: 1 });
    const first = service.start({ url: 'https://example.test', tier: 'quick_scan' });
    await service.result(first);
    const second = service.start({ url: 'https://example.test', tier: 'quick_scan' });
    await service.result(second);

    expect(() => service.result(first)).toThrow('No audit with id "audit-1"');
    expect(service.lifecycle(second)).toBe('finished');
  });

  it('queues audits beyond the concurrency limit', async () => {
    const entered = createDeferred<void>();
    const gate = createDeferred<void>();
    const scout: ScoutAgent = {
      scout: vi.fn(async (url: string) => {
        entered.resolve();
        await gate.promise;
        return scoutResult(url);
      }),
    };
    const { service } = setup({ scout, maxConcurrentAudits: 1 });

    const first = service.start({ url: 'https://example.test', tier: 'quick_scan' });
    const second = service.start({ url: 'https://example.test', tier: 'quick_scan' });
    await entered.promise;

    expect(service.lifecycle(first)).toBe('running');
    expect(service.lifecycle(second)).toBe('queued');

    gate.resolve();
    const reports = await Promise.all([service.result(first), service.result(second)]);
    expect(reports.map((report) => report.status)).toEqual(['DONE', 'DONE']);
  });

  it('cancels a queued audit', async () => {
    const { service } = setup();
    const id = service.start({ url: 'https://example.test' });

    expect(service.cancel(id)).toBe(true);
    const report = await service.result(id);

    expect(report.status).toBe('ERROR');
    expect(report.error).toBe(`Audit "${id}" was cancelled`);
    expect(service.cancel(id)).toBe(false);
  });

  it('drains audits, saves reputation and closes the browser on shutdown', async () => {
    const { service, store, browser } = setup();
    const id = service.start({ url: 'https://example.test', tier: 'quick_scan' });

    await service.shutdown();

    expect(service.lifecycle(id)).toBe('finished');
    expect(store.saveCount).toBe(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(() => service.start({ url: 'https://example.test' })).toThrow(AuditUnavailableError);
  });
});
