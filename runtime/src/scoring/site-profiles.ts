/**
 * Per-site-type audit profiles: signal weights, priority dark patterns and
 * what the verdict narrative should emphasize.
 *
 * @module
 */

import { ConfigurationError } from '../types/errors.js';
import { isOneOf } from '../utils/type-guards.js';
import { SIGNAL_NAMES, SITE_TYPES, type SignalWeights, type SiteType } from './types.js';

export interface SiteTypeProfile {
  siteType: SiteType;
  name: string;
  description: string;
  weights: SignalWeights;
  /** Dark pattern sub-types that matter most for this kind of site */
  priorityPatterns: readonly string[];
  /** Expert narrative emphasis */
  narrativeFocus: string;
  /** Plain-language emphasis for simple verdicts */
  simpleFocus: string;
  /** Security modules worth running by default */
  defaultSecurityModules: readonly string[];
  /** Enables the stricter paranoia override rules */
  paranoia: boolean;
}

export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = Object.freeze({
  visual: 0.2,
  structural: 0.15,
  temporal: 0.1,
  graph: 0.25,
  meta: 0.1,
  security: 0.2,
});

export const SITE_TYPE_PROFILES: Readonly<Record<SiteType, SiteTypeProfile>> = {
  ecommerce: {
    siteType: 'ecommerce',
    name: 'E-commerce / Product',
    description: 'Online stores, marketplaces, product listings',
    weights: { visual: 0.25, structural: 0.15, temporal: 0.15, graph: 0.2, meta: 0.05, security: 0.2 },
    priorityPatterns: [
      'hidden_costs',
      'pre_selected_options',
      'fake_scarcity',
      'fake_countdown',
      'bait_and_switch',
      'hidden_subscription',
      'fake_reviews',
      'fake_badges',
    ],
    narrativeFocus:
      'Pricing transparency, checkout fairness, return policy visibility, pre-selected add-ons, scarcity claims and review authenticity.',
    simpleFocus: 'Is it safe to buy here? Are there hidden fees or charges you did not ask for?',
    defaultSecurityModules: ['security_headers', 'phishing_db', 'form_validation'],
    paranoia: false,
  },
  company_portfolio: {
    siteType: 'company_portfolio',
    name: 'Company / Portfolio',
    description: 'Business websites, corporate portals, agency sites',
    weights: { visual: 0.15, structural: 0.1, temporal: 0.05, graph: 0.35, meta: 0.15, security: 0.2 },
    priorityPatterns: ['fake_badges', 'fake_authority', 'fake_reviews', 'fake_counters', 'fake_social_proof'],
    narrativeFocus:
      'Entity verification, claimed certifications and awards, team authenticity, address and business registration.',
    simpleFocus: 'Is this a real company, and are its claims backed by anything?',
    defaultSecurityModules: ['security_headers', 'phishing_db'],
    paranoia: false,
  },
  financial: {
    siteType: 'financial',
    name: 'Financial / Banking',
    description: 'Banks, fintech, payment processors, investment platforms',
    weights: { visual: 0.1, structural: 0.25, temporal: 0.05, graph: 0.2, meta: 0.1, security: 0.3 },
    priorityPatterns: [
      'hidden_costs',
      'hidden_subscription',
      'pre_selected_options',
      'roach_motel',
      'hidden_cancel',
      'fake_badges',
    ],
    narrativeFocus:
      'Missing TLS, cross-domain form submissions and unverified financial claims are not tolerated. Emphasize encryption and form security.',
    simpleFocus: 'Is it safe to enter financial details here, or could this be phishing?',
    defaultSecurityModules: ['security_headers', 'phishing_db', 'form_validation', 'redirect_chain', 'js_analysis'],
    paranoia: false,
  },
  saas_subscription: {
    siteType: 'saas_subscription',
    name: 'SaaS / Subscription',
    description: 'Software services, subscriptions, online tools',
    weights: { visual: 0.2, structural: 0.15, temporal: 0.15, graph: 0.2, meta: 0.1, security: 0.2 },
    priorityPatterns: [
      'forced_registration',
      'hidden_cancel',
      'roach_motel',
      'guilt_tripping',
      'hidden_subscription',
      'fake_countdown',
      'expiring_offer',
    ],
    narrativeFocus:
      'Cancellation transparency, trial-to-paid conversion, pricing page honesty and subscription traps.',
    simpleFocus: 'Can you cancel easily, and will a free trial turn into a charge?',
    defaultSecurityModules: ['security_headers', 'phishing_db', 'form_validation'],
    paranoia: false,
  },
  darknet_suspicious: {
    siteType: 'darknet_suspicious',
    name: 'Darknet / High-Risk',
    description: 'Suspicious domains, very new sites, known risky patterns',
    weights: { visual: 0.15, structural: 0.15, temporal: 0.1, graph: 0.2, meta: 0.1, security: 0.3 },
    priorityPatterns: [
      'fake_badges',
      'fake_authority',
      'hidden_costs',
      'bait_and_switch',
      'hidden_subscription',
      'fake_reviews',
      'fake_countdown',
      'fake_scarcity',
    ],
    narrativeFocus:
      'Every claim must be externally verified. Treat absence of evidence as negative evidence; check hosting, WHOIS privacy and obfuscated code.',
    simpleFocus: 'This site shows several red flags. Do not enter personal information or pay here.',
    defaultSecurityModules: ['security_headers', 'phishing_db', 'form_validation', 'redirect_chain', 'js_analysis'],
    paranoia: true,
  },
  general: {
    siteType: 'general',
    name: 'General',
    description: 'Sites that match no specific profile',
    weights: { ...DEFAULT_SIGNAL_WEIGHTS },
    priorityPatterns: [],
    narrativeFocus: 'Overall trustworthiness across visual, structural, entity and security evidence.',
    simpleFocus: 'Is this site what it claims to be?',
    defaultSecurityModules: ['security_headers', 'phishing_db'],
    paranoia: false,
  },
};

export function isSiteType(value: unknown): value is SiteType {
  return isOneOf(value, SITE_TYPES);
}

/** Map an agent-supplied hint to a site type; empty and `unknown` become `general`. */
export function resolveSiteType(hint: string | undefined): SiteType {
  if (hint === undefined || hint === '' || hint === 'unknown') return 'general';
  const normalized = hint.trim().toLowerCase();
  if (!isSiteType(normalized)) {
    throw new ConfigurationError(`Unknown site type "${hint}"`, [`siteType: ${hint}`]);
  }
  return normalized;
}

/**
 * Look up a profile and merge config weight overrides onto it.
 *
 * @throws ConfigurationError for an unknown site type or a weight that is
 * missing, negative or non-finite after the merge
 */
export function getSiteProfile(
  siteType: string,
  weightOverrides?: Partial<SignalWeights>,
  profiles: Readonly<Record<string, SiteTypeProfile | undefined>> = SITE_TYPE_PROFILES,
): SiteTypeProfile {
  const profile = profiles[siteType];
  if (!profile) {
    throw new ConfigurationError(`Unknown site type "${siteType}"`, [`siteType: ${siteType}`]);
  }
  const merged: Partial<SignalWeights> = { ...profile.weights, ...weightOverrides };
  const problems: string[] = [];
  const weights: SignalWeights = { ...DEFAULT_SIGNAL_WEIGHTS };
  for (const name of SIGNAL_NAMES) {
    const weight = merged[name];
    if (weight === undefined || !Number.isFinite(weight) || weight < 0) {
      problems.push(`weights.${name}: missing or invalid for "${siteType}"`);
      continue;
    }
    weights[name] = weight;
  }
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid weight profile for "${siteType}"`, problems);
  }
  return { ...profile, weights };
}
