/**
 * Vision agent over a black-box screenshot classifier.
 *
 * The classifier receives one screenshot and one taxonomy category per call
 * and answers in free text; {@link parseModelResponse} turns each answer into
 * findings.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { clamp01, roundTo } from '../utils/numeric.js';
import { isOneOf } from '../utils/type-guards.js';
import { AgentFailureError } from '../resilience/errors.js';
import { parseModelResponse } from './model-response.js';
import {
  DARK_PATTERN_TAXONOMY,
  SEVERITY_WEIGHTS,
  findCategory,
  severityOf,
  type DarkPatternCategory,
} from './taxonomy.js';
import type { AgentCallContext, DarkPatternFinding, TemporalFinding, VisionAgent, VisionResult } from './types.js';

/** A model that looks at a screenshot and answers a question about it. */
export interface ScreenshotClassifier {
  classify(request: {
    screenshotPath: string;
    category: DarkPatternCategory;
    signal: AbortSignal;
  }): Promise<string>;
}

export interface ModelVisionAgentOptions {
  taxonomy?: readonly DarkPatternCategory[];
  /** Findings below this confidence are dropped. Default: 0.3 */
  minConfidence?: number;
  logger?: Logger;
}

/** Weighted severity total that drives the visual score to zero. */
const MAX_EXPECTED_DEDUCTION = 5;
const DEFAULT_MIN_CONFIDENCE = 0.3;
const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

/** `1 − min(1, Σ severityWeight × confidence / 5)`, rounded to 3 places. */
export function computeVisualScore(findings: readonly DarkPatternFinding[]): number {
  let deduction = 0;
  for (const finding of findings) {
    deduction += SEVERITY_WEIGHTS[finding.severity] * finding.confidence;
  }
  return roundTo(1 - Math.min(1, deduction / MAX_EXPECTED_DEDUCTION), 3);
}

function toFinding(
  fields: Record<string, unknown>,
  category: DarkPatternCategory,
  screenshotPath: string,
  taxonomy: readonly DarkPatternCategory[],
): DarkPatternFinding {
  const patternType =
    typeof fields.patternType === 'string'
      ? fields.patternType
      : typeof fields.pattern_type === 'string'
        ? fields.pattern_type
        : category.id;
  const confidence = typeof fields.confidence === 'number' ? clamp01(fields.confidence) : 0.5;
  const severity = isOneOf(fields.severity, SEVERITIES) ? fields.severity : severityOf(patternType, taxonomy);
  const evidence =
    typeof fields.evidence === 'string'
      ? fields.evidence
      : typeof fields.description === 'string'
        ? fields.description
        : undefined;
  return { category: category.id, patternType, severity, confidence, evidence, screenshotPath };
}

function temporalFrom(findings: readonly DarkPatternFinding[]): TemporalFinding[] {
  return findings
    .filter((finding) => finding.category === 'false_urgency')
    .map((finding): TemporalFinding => ({
      kind: finding.patternType === 'fake_countdown' ? 'countdown' : 'stock_counter',
      suspicious: true,
      detail: finding.evidence,
    }));
}

export function createModelVisionAgent(
  classifier: ScreenshotClassifier,
  options: ModelVisionAgentOptions = {},
): VisionAgent {
  const taxonomy = options.taxonomy ?? DARK_PATTERN_TAXONOMY;
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const logger = options.logger ?? silentLogger;

  return {
    async analyze(
      screenshotPaths: readonly string[],
      taxonomySubset: readonly string[],
      context: AgentCallContext,
    ): Promise<VisionResult> {
      const categories = taxonomySubset
        .map((id) => findCategory(id, taxonomy))
        .filter((category): category is DarkPatternCategory => category !== undefined);

      const findings: DarkPatternFinding[] = [];
      let answered = 0;
      let unparseable = 0;
      for (const screenshotPath of screenshotPaths) {
        for (const category of categories) {
          context.signal.throwIfAborted();
          const text = await classifier.classify({ screenshotPath, category, signal: context.signal });
          const response = parseModelResponse(text);
          answered += 1;
          if (response.kind === 'unparseable') {
            unparseable += 1;
            logger.debug(`Unparseable response for ${category.id} on ${screenshotPath}`);
            continue;
          }
          if (response.kind === 'detected') {
            for (const fields of response.fields) {
              const finding = toFinding(fields, category, screenshotPath, taxonomy);
              if (finding.confidence >= minConfidence) findings.push(finding);
            }
          }
        }
      }

      if (answered > 0 && unparseable === answered) {
        throw new AgentFailureError('vision', `All ${answered} model responses were unparseable`);
      }

      const temporalFindings = temporalFrom(findings);
      return {
        findings,
        visualScore: computeVisualScore(findings),
        ...(temporalFindings.length > 0 ? { temporalFindings } : {}),
      };
    },
  };
}
