import { describe, it, expect } from 'vitest';
import { ComplexityAnalyzer, COMPLEXITY_WEIGHTS } from './complexity-analyzer.js';
import type { ScoutResult } from '../agents/types.js';

const analyzer = new ComplexityAnalyzer();

function scout(overrides: Partial<ScoutResult['metadata']> = {}, screenshots = 2): ScoutResult {
  return {
    url: 'https://shop.example.test/',
    metadata: overrides,
    screenshotPaths: Array.from({ length: screenshots }, (_, i) => `/tmp/shot-${i}.png`),
    discoveredLinks: [],
  };
}

describe('ComplexityAnalyzer', () => {
  it('weights sum to 1', () => {
    const total = Object.values(COMPLEXITY_WEIGHTS).reduce((a, b) => a + b, 0);
    expect(total).toBeCloseTo(1, 10);
  });

  it('returns neutral zero metrics for missing input', () => {
    const metrics = analyzer.analyze(undefined, null, null);
    expect(metrics).toMatchObject({
      url: '',
      domNodeCount: 0,
      redirectHops: 0,
      screenshotCount: 0,
      hasLazyLoad: false,
      hasCountdown: false,
      score: 0,
      subScores: { structural: 0, network: 0, dynamic: 0 },
    });
  });

  it('combines structural, network and dynamic factors', () => {
    const metrics = analyzer.analyze(
      scout({
        domNodeCount: 2500,
        scriptCount: 25,
        hasLazyLoad: true,
        iframeCount: 5,
        loadTimeMs: 5000,
        redirectChain: ['http://a.test', 'https://a.test', 'https://www.a.test'],
        externalResourceCount: 50,
      }),
      {
        findings: [],
        visualScore: 0.9,
        temporalFindings: [{ kind: 'countdown', suspicious: true }],
      },
      null,
    );

    expect(metrics.redirectHops).toBe(2);
    expect(metrics.hasCountdown).toBe(true);
    expect(metrics.hasAnimation).toBe(false);
    expect(metrics.score).toBe(0.605);
    expect(metrics.subScores.network).toBe(0.4667);
  });

  it('saturates each factor at its ceiling', () => {
    const metrics = analyzer.analyze(
      scout(
        {
          domNodeCount: 50_000,
          scriptCount: 500,
          hasLazyLoad: true,
          iframeCount: 40,
          loadTimeMs: 60_000,
          redirectChain: ['1', '2', '3', '4', '5', '6', '7'],
          externalResourceCount: 900,
          hasAnimation: true,
        },
        30,
      ),
    );
    expect(metrics.score).toBe(1);
  });

  it('counts requested security modules without scoring them', () => {
    const metrics = analyzer.analyze(scout(), null, {
      modules: [
        { module: 'headers', score: 0.8, findings: [] },
        { module: 'forms', score: 0.6, findings: [] },
      ],
      overallScore: 0.7,
    });
    expect(metrics.securityModuleCount).toBe(2);
    expect(metrics.score).toBe(0.01);
  });
});
