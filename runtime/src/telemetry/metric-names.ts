/**
 * Telemetry metric name constants, `trustlens.*` namespace.
 *
 * @module
 */

export const TELEMETRY_METRIC_NAMES = {
  // Pipeline stages
  STAGE_DURATION: "trustlens.stage.duration_ms",
  STAGE_DEGRADED_TOTAL: "trustlens.stage.degraded.total",
  // Circuit breakers
  CIRCUIT_OPENED_TOTAL: "trustlens.circuit.opened.total",
  CIRCUIT_STATE: "trustlens.circuit.state",
  // Audits
  AUDITS_STARTED_TOTAL: "trustlens.audit.started.total",
  AUDITS_COMPLETED_TOTAL: "trustlens.audit.completed.total",
  AUDIT_ITERATIONS: "trustlens.audit.iterations",
  AUDIT_TRUST_SCORE: "trustlens.audit.trust_score",
  AUDITS_ACTIVE: "trustlens.audit.active",
} as const;
