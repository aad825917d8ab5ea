import { describe, it, expect, vi } from 'vitest';
import { baselineVerdict, createAgentFallbacks } from './fallbacks.js';
import { computeVerdict } from './judge.js';
import { TrustScoreEngine } from '../scoring/engine.js';
import { MalformedResultError } from '../resilience/errors.js';
import type { AuditEvidence } from './types.js';

const engine = new TrustScoreEngine();

function evidence(): AuditEvidence {
  return {
    url: 'https://example.test',
    siteType: 'saas_subscription',
    verdictMode: 'expert',
    iteration: 1,
    scoutResults: [
      {
        url: 'https://example.test',
        metadata: { hasSsl: true },
        screenshotPaths: [],
        discoveredLinks: ['https://example.test/pricing'],
      },
    ],
    vision: null,
    graph: null,
    security: null,
    degradedAgents: [],
    investigatedUrls: ['https://example.test/'],
  };
}

function sources() {
  return {
    currentUrl: () => 'https://example.test/pricing',
    evidence,
    computeVerdict: vi.fn((current: AuditEvidence) => computeVerdict(current, { engine })),
  };
}

const context = { agent: 'test', reason: 'error' as const };

describe('baselineVerdict', () => {
  it('is a neutral verdict with no confidence', () => {
    const verdict = baselineVerdict('financial');
    expect(verdict.trustScore.finalScore).toBe(50);
    expect(verdict.trustScore.riskLevel).toBe('SUSPICIOUS');
    expect(verdict.trustScore.confidence).toBe(0);
    expect(verdict.trustScore.siteType).toBe('financial');
    expect(verdict.decision).toBe('RENDER_VERDICT');
  });

  it('falls back to the general profile for unknown site types', () => {
    expect(baselineVerdict('casino').trustScore.siteType).toBe('general');
  });
});

describe('createAgentFallbacks', () => {
  it('produces an empty scout result for the current page', async () => {
    const fallbacks = createAgentFallbacks(sources());
    expect(await fallbacks.scout.produce(context)).toEqual({
      url: 'https://example.test/pricing',
      metadata: {},
      screenshotPaths: [],
      discoveredLinks: [],
    });
    expect(fallbacks.scout.mode).toBe('PARTIAL');
  });

  it('produces neutral analysis results', async () => {
    const fallbacks = createAgentFallbacks(sources());
    expect(await fallbacks.vision.produce(context)).toEqual({ findings: [], visualScore: 0.5 });
    expect(await fallbacks.graph.produce(context)).toEqual({
      verifiedEntities: [],
      inconsistencies: [],
      graphScore: 0.5,
    });
    expect(fallbacks.security.baseline()).toEqual({ modules: [], overallScore: 0.5 });
  });

  it('computes the judge fallback locally and never asks for more pages', async () => {
    const source = sources();
    const fallbacks = createAgentFallbacks(source);
    const verdict = await fallbacks.judge.produce(context);
    expect(source.computeVerdict).toHaveBeenCalledTimes(1);
    expect(verdict.decision).toBe('RENDER_VERDICT');
    expect(verdict.investigateUrls).toEqual([]);
    expect(verdict.trustScore.siteType).toBe('saas_subscription');
  });

  it('uses the evidence site type for the judge baseline', () => {
    const fallbacks = createAgentFallbacks(sources());
    expect(fallbacks.judge.baseline().trustScore.siteType).toBe('saas_subscription');
  });

  it('rejects malformed agent results', () => {
    const fallbacks = createAgentFallbacks(sources());
    expect(() => fallbacks.scout.validate?.({ url: '', metadata: {}, screenshotPaths: [], discoveredLinks: [] })).toThrow(
      MalformedResultError,
    );
    expect(() => fallbacks.vision.validate?.({ findings: [], visualScore: 1.5 })).toThrow(
      'vision returned a malformed result: visualScore: Number must be less than or equal to 1',
    );
    expect(() =>
      fallbacks.judge.validate?.({
        trustScore: { finalScore: 90 },
        narrative: '',
        decision: 'RENDER_VERDICT',
        investigateUrls: [],
      }),
    ).toThrow('trustScore: trustScore must be a TrustScoreResult');
  });

  it('accepts a well-formed judge output', () => {
    const fallbacks = createAgentFallbacks(sources());
    const output = computeVerdict(evidence(), { engine });
    expect(fallbacks.judge.validate?.(output)?.trustScore).toBe(output.trustScore);
  });
});
