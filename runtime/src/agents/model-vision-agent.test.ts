import { describe, it, expect, vi } from 'vitest';
import { createModelVisionAgent, computeVisualScore, type ScreenshotClassifier } from './model-vision-agent.js';
import { AgentFailureError } from '../resilience/errors.js';
import type { AgentCallContext } from './types.js';

function context(signal = new AbortController().signal): AgentCallContext {
  return { signal, auditId: 'audit-1', iteration: 1 };
}

type ClassifyRequest = Parameters<ScreenshotClassifier['classify']>[0];

function classifierFrom(answers: Record<string, string>) {
  const classify = vi.fn(async ({ category }: ClassifyRequest) => answers[category.id] ?? '');
  return { classify };
}

describe('computeVisualScore', () => {
  it('is 1 without findings and saturates at 0', () => {
    expect(computeVisualScore([])).toBe(1);
    const critical = { category: 'sneaking', patternType: 'hidden_costs', severity: 'critical' as const, confidence: 1 };
    expect(computeVisualScore(Array.from({ length: 6 }, () => critical))).toBe(0);
  });
});

describe('createModelVisionAgent', () => {
  it('turns model answers into findings and a visual score', async () => {
    const classifier = classifierFrom({
      false_urgency: '{"patternType":"fake_countdown","confidence":0.9,"evidence":"timer resets on reload"}',
      sneaking: 'No dark patterns found.',
    });
    const agent = createModelVisionAgent(classifier);

    const result = await agent.analyze(['/shots/home.png'], ['false_urgency', 'sneaking', 'not_a_category'], context());

    expect(classifier.classify).toHaveBeenCalledTimes(2);
    expect(result.findings).toEqual([
      {
        category: 'false_urgency',
        patternType: 'fake_countdown',
        severity: 'critical',
        confidence: 0.9,
        evidence: 'timer resets on reload',
        screenshotPath: '/shots/home.png',
      },
    ]);
    expect(result.visualScore).toBe(0.82);
    expect(result.temporalFindings).toEqual([
      { kind: 'countdown', suspicious: true, detail: 'timer resets on reload' },
    ]);
  });

  it('drops low-confidence findings', async () => {
    const agent = createModelVisionAgent(
      classifierFrom({ social_engineering: '[{"patternType":"fake_reviews","confidence":0.2}]' }),
    );
    const result = await agent.analyze(['/shots/home.png'], ['social_engineering'], context());
    expect(result.findings).toEqual([]);
    expect(result.visualScore).toBe(1);
    expect(result.temporalFindings).toBeUndefined();
  });

  it('fails when no answer can be parsed', async () => {
    const agent = createModelVisionAgent(classifierFrom({ sneaking: 'The header is blue.' }));
    const run = agent.analyze(['/a.png', '/b.png'], ['sneaking'], context());
    await expect(run).rejects.toBeInstanceOf(AgentFailureError);
    await expect(run).rejects.toThrow('vision failed: All 2 model responses were unparseable');
  });

  it('stops when the call is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('deadline'));
    const classifier = classifierFrom({});
    const agent = createModelVisionAgent(classifier);
    await expect(agent.analyze(['/a.png'], ['sneaking'], context(controller.signal))).rejects.toThrow('deadline');
    expect(classifier.classify).not.toHaveBeenCalled();
  });
});
