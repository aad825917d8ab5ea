/**
 * Budget per audit tier.
 *
 * @module
 */

import { isOneOf } from '../utils/type-guards.js';
import { ConfigurationError } from '../types/errors.js';
import { AUDIT_TIERS, type AuditBudget, type AuditTier } from './types.js';

export const DEFAULT_AUDIT_TIER: AuditTier = 'standard_audit';

export const DEFAULT_TIER_BUDGETS: Readonly<Record<AuditTier, Readonly<AuditBudget>>> = {
  quick_scan: { maxIterations: 1, maxElapsedMs: 60_000, maxExternalCalls: 4, maxPages: 1 },
  standard_audit: { maxIterations: 3, maxElapsedMs: 180_000, maxExternalCalls: 16, maxPages: 5 },
  deep: { maxIterations: 5, maxElapsedMs: 420_000, maxExternalCalls: 40, maxPages: 10 },
};

export type TierBudgetOverrides = Partial<Record<AuditTier, Partial<AuditBudget>>>;

export function isAuditTier(value: unknown): value is AuditTier {
  return isOneOf(value, AUDIT_TIERS);
}

/**
 * Tier named by a request; a missing tier is the default one.
 *
 * @throws ConfigurationError for an unknown tier
 */
export function resolveTier(tier: string | undefined): AuditTier {
  if (tier === undefined) return DEFAULT_AUDIT_TIER;
  if (!isAuditTier(tier)) {
    throw new ConfigurationError(`Unknown audit tier "${tier}"`);
  }
  return tier;
}

/**
 * Budget for `tier`, with overrides merged over the defaults.
 *
 * @throws ConfigurationError for an unknown tier
 */
export function resolveBudget(tier: string, overrides: TierBudgetOverrides = {}): AuditBudget {
  if (!isAuditTier(tier)) {
    throw new ConfigurationError(`Unknown audit tier "${tier}"`);
  }
  return { ...DEFAULT_TIER_BUDGETS[tier], ...overrides[tier] };
}
