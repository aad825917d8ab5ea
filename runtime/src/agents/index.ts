/**
 * Agent contracts, result schemas, fallbacks and the default judge.
 *
 * @module
 */

export type {
  AgentName,
  AgentCallContext,
  Severity,
  ViewportOptions,
  EntityType,
  EntityMention,
  PageMetadata,
  ScoutResult,
  ScoutAgent,
  DarkPatternFinding,
  TemporalKind,
  TemporalFinding,
  TrustBadgeSummary,
  VisionResult,
  VisionAgent,
  VerificationStatus,
  EntityVerification,
  Inconsistency,
  DomainIntel,
  SourceVerdict,
  GraphResult,
  GraphInvestigator,
  SecurityModuleResult,
  SecurityResult,
  SecurityScanner,
  JudgeDecision,
  VerdictMode,
  AuditEvidence,
  JudgeOutput,
  JudgeAgent,
  AgentResults,
  AuditAgents,
} from './types.js';

export {
  scoutResultSchema,
  visionResultSchema,
  graphResultSchema,
  securityResultSchema,
  judgeOutputSchema,
  resultValidator,
} from './schemas.js';

export {
  DARK_PATTERN_TAXONOMY,
  SEVERITY_WEIGHTS,
  findCategory,
  severityOf,
  taxonomySubset,
  type DarkPatternCategory,
  type DarkPatternSubType,
  type DetectionMethod,
} from './taxonomy.js';

export { parseModelResponse, type ModelResponse } from './model-response.js';
export {
  createModelVisionAgent,
  computeVisualScore,
  type ScreenshotClassifier,
  type ModelVisionAgentOptions,
} from './model-vision-agent.js';
export { PRIORITY_PATHS, normalizeUrl, selectPriorityPages } from './pages.js';
export {
  EvidenceJudge,
  computeVerdict,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_DISAGREEMENT_THRESHOLD,
  DEFAULT_PAGES_PER_ITERATION,
  type JudgeOptions,
} from './judge.js';
export { createAgentFallbacks, baselineVerdict, type FallbackSources } from './fallbacks.js';
