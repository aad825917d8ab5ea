/**
 * Heuristic site type classification from captured page facts.
 *
 * Used when the browser agent gives no usable site type hint.
 *
 * @module
 */

import type { DomainIntel, PageMetadata } from '../agents/types.js';
import { roundTo } from '../utils/numeric.js';
import type { SiteType } from './types.js';

type ScoredType = Exclude<SiteType, 'general' | 'darknet_suspicious'>;

const SCORED_TYPES: readonly ScoredType[] = ['ecommerce', 'financial', 'saas_subscription', 'company_portfolio'];

const URL_PATTERNS: Readonly<Record<ScoredType, readonly string[]>> = {
  ecommerce: ['shop', 'store', 'product', 'buy', 'cart', 'checkout', 'marketplace'],
  financial: ['bank', 'finance', 'pay', 'invest', 'crypto', 'trading', 'loan', 'credit'],
  saas_subscription: ['app', 'dashboard', 'pricing', 'subscribe', 'trial', 'saas'],
  company_portfolio: ['about', 'team', 'services', 'portfolio', 'contact', 'careers'],
};

/** Minimum score for a non-suspicious type to beat the `general` fallback. */
const MIN_TYPE_SCORE = 2;
/** Suspicion needed before a site is treated as high-risk. */
const SUSPICION_THRESHOLD = 4;

export interface SiteClassificationInput {
  url: string;
  metadata?: PageMetadata;
  domainIntel?: DomainIntel;
}

export interface SiteClassification {
  siteType: SiteType;
  confidence: number;
}

function suspicionScore(metadata: PageMetadata | undefined, intel: DomainIntel | undefined): number {
  let suspicion = 0;
  if (metadata?.hasSsl === false) suspicion += 3;
  const age = intel?.domainAgeDays;
  if (age !== undefined && age < 30) suspicion += 3;
  if (age !== undefined && age < 7) suspicion += 4;
  if (intel?.whoisPrivate === true && age !== undefined && age < 90) suspicion += 2;
  if ((metadata?.scriptCount ?? 0) > 30) suspicion += 1.5;
  if (intel?.isBlacklisted === true) suspicion += 5;
  return suspicion;
}

export function classifySiteType(input: SiteClassificationInput): SiteClassification {
  const url = input.url.toLowerCase();
  const scores: Record<ScoredType, number> = {
    ecommerce: 0,
    financial: 0,
    saas_subscription: 0,
    company_portfolio: 0,
  };
  for (const type of SCORED_TYPES) {
    for (const pattern of URL_PATTERNS[type]) {
      if (url.includes(pattern)) scores[type] += 2;
    }
  }
  if (input.metadata?.hasCardForm) {
    scores.financial += 4;
    scores.ecommerce += 3;
  }
  if (input.metadata?.hasPasswordForm) {
    scores.financial += 2;
    scores.saas_subscription += 2;
  }

  const suspicion = suspicionScore(input.metadata, input.domainIntel);
  const ranked = [...SCORED_TYPES].sort((a, b) => scores[b] - scores[a]);
  const best = ranked[0];
  const total = suspicion + ranked.reduce((sum, type) => sum + scores[type], 0);

  if (suspicion >= SUSPICION_THRESHOLD && suspicion >= scores[best]) {
    return { siteType: 'darknet_suspicious', confidence: roundTo(suspicion / total, 2) };
  }
  if (scores[best] < MIN_TYPE_SCORE) {
    return { siteType: 'general', confidence: 0.3 };
  }
  return { siteType: best, confidence: roundTo(scores[best] / total, 2) };
}
