/**
 * Page complexity scoring used to budget agent deadlines.
 *
 * @module
 */

import type { ScoutResult, SecurityResult, VisionResult } from '../agents/types.js';
import { mean, roundTo, saturate } from '../utils/numeric.js';
import type { ComplexityMetrics } from './types.js';

/** Counts at which a normalized field saturates to 1. */
export const COMPLEXITY_CEILINGS = {
  domNodeCount: 5000,
  domDepth: 32,
  scriptCount: 50,
  formCount: 10,
  iframeCount: 5,
  stylesheetCount: 20,
  redirectHops: 5,
  externalResourceCount: 100,
  loadTimeMs: 10_000,
  screenshotCount: 10,
  viewportChanges: 5,
} as const;

/** Composite weights; they sum to 1. */
export const COMPLEXITY_WEIGHTS = {
  domNodes: 0.3,
  scripts: 0.2,
  lazyLoad: 0.15,
  iframes: 0.05,
  loadTime: 0.1,
  redirects: 0.05,
  externalResources: 0.05,
  motion: 0.05,
  screenshots: 0.05,
} as const;

function flag(value: boolean): number {
  return value ? 1 : 0;
}

/**
 * Derives {@link ComplexityMetrics} from whatever agent output exists.
 * Absent inputs count as zero, so a failed scout yields the minimum score
 * rather than an error.
 */
export class ComplexityAnalyzer {
  analyze(
    scoutResult: ScoutResult | null | undefined,
    visionResult?: VisionResult | null,
    securityResults?: SecurityResult | null,
  ): ComplexityMetrics {
    const meta = scoutResult?.metadata ?? {};
    const temporal = visionResult?.temporalFindings ?? [];

    const domNodeCount = meta.domNodeCount ?? 0;
    const domDepth = meta.domDepth ?? 0;
    const scriptCount = meta.scriptCount ?? 0;
    const formCount = meta.formCount ?? 0;
    const iframeCount = meta.iframeCount ?? 0;
    const stylesheetCount = meta.stylesheetCount ?? 0;
    const redirectHops = Math.max(0, (meta.redirectChain?.length ?? 1) - 1);
    const externalResourceCount = meta.externalResourceCount ?? 0;
    const loadTimeMs = meta.loadTimeMs ?? 0;
    const screenshotCount = scoutResult?.screenshotPaths.length ?? 0;
    const hasLazyLoad = meta.hasLazyLoad ?? false;
    const hasAnimation =
      (meta.hasAnimation ?? false) || temporal.some((finding) => finding.kind === 'animation');
    const hasCountdown = temporal.some(
      (finding) => finding.kind === 'countdown' || finding.kind === 'timer',
    );
    const viewportChanges = meta.viewportChanges ?? 0;
    const securityModuleCount = securityResults?.modules.length ?? 0;

    const c = COMPLEXITY_CEILINGS;
    const normalized = {
      domNodes: saturate(domNodeCount, c.domNodeCount),
      domDepth: saturate(domDepth, c.domDepth),
      scripts: saturate(scriptCount, c.scriptCount),
      forms: saturate(formCount, c.formCount),
      iframes: saturate(iframeCount, c.iframeCount),
      stylesheets: saturate(stylesheetCount, c.stylesheetCount),
      redirects: saturate(redirectHops, c.redirectHops),
      externalResources: saturate(externalResourceCount, c.externalResourceCount),
      loadTime: saturate(loadTimeMs, c.loadTimeMs),
      screenshots: saturate(screenshotCount, c.screenshotCount),
      viewportChanges: saturate(viewportChanges, c.viewportChanges),
      lazyLoad: flag(hasLazyLoad),
      motion: flag(hasAnimation || hasCountdown),
    };

    const w = COMPLEXITY_WEIGHTS;
    const score =
      normalized.domNodes * w.domNodes +
      normalized.scripts * w.scripts +
      normalized.lazyLoad * w.lazyLoad +
      normalized.iframes * w.iframes +
      normalized.loadTime * w.loadTime +
      normalized.redirects * w.redirects +
      normalized.externalResources * w.externalResources +
      normalized.motion * w.motion +
      normalized.screenshots * w.screenshots;

    return {
      url: scoutResult?.url ?? '',
      domNodeCount,
      domDepth,
      scriptCount,
      formCount,
      iframeCount,
      stylesheetCount,
      redirectHops,
      externalResourceCount,
      loadTimeMs,
      screenshotCount,
      hasLazyLoad,
      hasAnimation,
      hasCountdown,
      viewportChanges,
      securityModuleCount,
      subScores: {
        structural: roundTo(
          mean([
            normalized.domNodes,
            normalized.domDepth,
            normalized.scripts,
            normalized.forms,
            normalized.iframes,
            normalized.stylesheets,
          ]),
          4,
        ),
        network: roundTo(
          mean([normalized.redirects, normalized.externalResources, normalized.loadTime]),
          4,
        ),
        dynamic: roundTo(
          mean([
            normalized.screenshots,
            normalized.lazyLoad,
            normalized.motion,
            normalized.viewportChanges,
          ]),
          4,
        ),
      },
      score: roundTo(Math.min(1, score), 4),
    };
  }
}
