/**
 * Hard-stop override rules evaluated after the weighted score.
 *
 * Every rule computes its candidate from the same pre-override score, so the
 * outcome does not depend on evaluation order: the lowest candidate wins and
 * all fired rules are reported.
 *
 * @module
 */

import type {
  AppliedOverride,
  HardStopConditions,
  OverrideAction,
  SignalName,
} from './types.js';

export interface OverrideContext {
  conditions: HardStopConditions;
  /** Sub-signal scores in [0, 1]; missing signals are absent */
  signals: Partial<Record<SignalName, number>>;
}

export interface OverrideRule {
  id: string;
  name: string;
  description: string;
  action: OverrideAction;
  value: number;
  /** Lower is reported first */
  priority: number;
  fires(context: OverrideContext): boolean;
}

export interface OverrideOutcome {
  finalScore: number;
  applied: AppliedOverride[];
  decisive: string | null;
}

function isYoungerThan(conditions: HardStopConditions, days: number): boolean {
  return conditions.domainAgeDays !== undefined && conditions.domainAgeDays < days;
}

export const OVERRIDE_RULES: readonly OverrideRule[] = [
  {
    id: 'domain_blacklisted',
    name: 'Domain is blacklisted',
    description: 'Domain appears in scam or phishing databases',
    action: 'force_below',
    value: 15,
    priority: 1,
    fires: ({ conditions }) => conditions.isBlacklisted === true,
  },
  {
    id: 'critical_indicator',
    name: 'Confirmed critical indicator',
    description: 'A critical dark pattern or security finding was confirmed',
    action: 'force_below',
    value: 39,
    priority: 1,
    fires: ({ conditions }) => conditions.criticalIndicator === true,
  },
  {
    id: 'invalid_ssl',
    name: 'Invalid certificate',
    description: 'TLS certificate is invalid or self-signed',
    action: 'cap_at',
    value: 50,
    priority: 2,
    fires: ({ conditions }) => conditions.hasSsl !== false && conditions.sslValid === false,
  },
  {
    id: 'no_ssl',
    name: 'No TLS',
    description: 'Sites served without HTTPS cannot score above 50',
    action: 'cap_at',
    value: 50,
    priority: 2,
    fires: ({ conditions }) => conditions.hasSsl === false,
  },
  {
    id: 'new_domain_low_graph',
    name: 'New domain with weak entity verification',
    description: 'Domain younger than 7 days and graph score below 0.3',
    action: 'force_below',
    value: 30,
    priority: 2,
    fires: ({ conditions, signals }) => isYoungerThan(conditions, 7) && (signals.graph ?? 0) < 0.3,
  },
  {
    id: 'graph_overrides_vision',
    name: 'Graph evidence overrides a clean visual impression',
    description: 'Visual signal looks trusted but entity verification found contradictions',
    action: 'cap_at',
    value: 69,
    priority: 3,
    fires: ({ conditions, signals }) =>
      (signals.visual ?? 0) >= 0.7 &&
      ((signals.graph !== undefined && signals.graph <= 0.3) || conditions.graphContradiction === true),
  },
  {
    id: 'fake_timer_detected',
    name: 'Fake countdown timer',
    description: 'A countdown or timer resets or lies about urgency',
    action: 'deduct',
    value: 25,
    priority: 3,
    fires: ({ conditions }) => conditions.fakeTimerDetected === true,
  },
  {
    id: 'all_fake_badges',
    name: 'No trust badge verifiable',
    description: 'Trust badges are displayed but none can be verified',
    action: 'deduct',
    value: 15,
    priority: 4,
    fires: ({ conditions }) =>
      (conditions.badgesDisplayed ?? 0) > 0 && (conditions.badgesVerified ?? 0) === 0,
  },
  {
    id: 'captcha_only',
    name: 'Analysis blocked by CAPTCHA',
    description: 'Only partial analysis was possible',
    action: 'cap_at',
    value: 65,
    priority: 5,
    fires: ({ conditions }) => conditions.captchaBlocked === true,
  },
];

/** Stricter rules for the high-risk site profile. */
export const PARANOIA_RULES: readonly OverrideRule[] = [
  {
    id: 'paranoia_phishing_hit',
    name: 'Phishing database hit',
    description: 'Any phishing match forces the score below 5',
    action: 'force_below',
    value: 5,
    priority: 1,
    fires: ({ conditions }) => conditions.phishingDetected === true,
  },
  {
    id: 'paranoia_no_ssl',
    name: 'No TLS',
    description: 'No HTTPS caps the score at 25',
    action: 'cap_at',
    value: 25,
    priority: 1,
    fires: ({ conditions }) => conditions.hasSsl === false,
  },
  {
    id: 'paranoia_new_domain',
    name: 'New domain',
    description: 'Domains younger than 30 days cap at 40',
    action: 'cap_at',
    value: 40,
    priority: 2,
    fires: ({ conditions }) => isYoungerThan(conditions, 30),
  },
  {
    id: 'paranoia_hidden_whois_new',
    name: 'Hidden WHOIS on a young domain',
    description: 'Privacy-protected WHOIS on a domain younger than 90 days caps at 35',
    action: 'cap_at',
    value: 35,
    priority: 3,
    fires: ({ conditions }) => conditions.whoisPrivate === true && isYoungerThan(conditions, 90),
  },
  {
    id: 'paranoia_cross_domain_forms',
    name: 'Cross-domain sensitive forms',
    description: 'Password or card forms submit to another domain',
    action: 'deduct',
    value: 25,
    priority: 3,
    fires: ({ conditions }) => conditions.crossDomainSensitiveForms === true,
  },
  {
    id: 'paranoia_js_obfuscation',
    name: 'Obfuscated scripts',
    description: 'Script risk above 0.7 deducts 30 points',
    action: 'deduct',
    value: 30,
    priority: 4,
    fires: ({ conditions }) => (conditions.jsRiskScore ?? 0) > 0.7,
  },
];

export function candidateScore(action: OverrideAction, value: number, preOverrideScore: number): number {
  if (action === 'deduct') {
    return Math.max(0, preOverrideScore - value);
  }
  return Math.min(preOverrideScore, value);
}

/**
 * Evaluate `rules` against the pre-override score. Rules are reported in
 * priority order (stable for equal priorities); the lowest candidate wins,
 * ties going to the earlier rule.
 */
export function applyOverrides(
  preOverrideScore: number,
  context: OverrideContext,
  rules: readonly OverrideRule[],
): OverrideOutcome {
  const ordered = rules
    .map((rule, position) => ({ rule, position }))
    .sort((a, b) => a.rule.priority - b.rule.priority || a.position - b.position)
    .map(({ rule }) => rule);

  const applied: AppliedOverride[] = [];
  let finalScore = preOverrideScore;
  let decisive: string | null = null;
  for (const rule of ordered) {
    if (!rule.fires(context)) continue;
    const candidate = candidateScore(rule.action, rule.value, preOverrideScore);
    applied.push({
      id: rule.id,
      name: rule.name,
      action: rule.action,
      value: rule.value,
      candidateScore: candidate,
    });
    if (decisive === null || candidate < finalScore) {
      finalScore = candidate;
      decisive = rule.id;
    }
  }
  return { finalScore, applied, decisive };
}
