/**
 * Dark pattern taxonomy: categories, their sub-types and severities.
 *
 * @module
 */

import type { Severity } from './types.js';

export interface DarkPatternSubType {
  id: string;
  name: string;
  severity: Severity;
}

export type DetectionMethod = 'visual' | 'temporal' | 'combined';

export interface DarkPatternCategory {
  id: string;
  name: string;
  description: string;
  detection: DetectionMethod;
  subTypes: readonly DarkPatternSubType[];
}

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  low: 0.25,
  medium: 0.5,
  high: 0.75,
  critical: 1,
};

export const DARK_PATTERN_TAXONOMY: readonly DarkPatternCategory[] = [
  {
    id: 'visual_interference',
    name: 'Visual Interference',
    description: 'Visual hierarchy that makes wanted actions prominent and unwanted ones hard to find',
    detection: 'visual',
    subTypes: [
      { id: 'hidden_unsubscribe', name: 'Hidden unsubscribe or cancel', severity: 'high' },
      { id: 'misdirected_click', name: 'Misdirected click target', severity: 'medium' },
      { id: 'disguised_ads', name: 'Ads disguised as content', severity: 'medium' },
      { id: 'trick_questions', name: 'Confusing opt-out wording', severity: 'high' },
    ],
  },
  {
    id: 'false_urgency',
    name: 'False Urgency',
    description: 'Invented time pressure or scarcity',
    detection: 'temporal',
    subTypes: [
      { id: 'fake_countdown', name: 'Resetting countdown timer', severity: 'critical' },
      { id: 'fake_scarcity', name: 'Invented low stock', severity: 'high' },
      { id: 'fake_social_proof', name: 'Fabricated activity notices', severity: 'medium' },
      { id: 'expiring_offer', name: 'Perpetually expiring offer', severity: 'medium' },
    ],
  },
  {
    id: 'forced_continuity',
    name: 'Forced Continuity',
    description: 'Subscriptions that are easy to enter and hard to leave',
    detection: 'visual',
    subTypes: [
      { id: 'hidden_cancel', name: 'Hidden cancellation', severity: 'critical' },
      { id: 'guilt_tripping', name: 'Confirmshaming', severity: 'medium' },
      { id: 'roach_motel', name: 'Roach motel', severity: 'high' },
      { id: 'forced_registration', name: 'Forced account creation', severity: 'medium' },
    ],
  },
  {
    id: 'sneaking',
    name: 'Sneaking',
    description: 'Costs, items or commitments added without clear consent',
    detection: 'combined',
    subTypes: [
      { id: 'hidden_costs', name: 'Hidden costs at checkout', severity: 'critical' },
      { id: 'pre_selected_options', name: 'Pre-selected add-ons', severity: 'high' },
      { id: 'bait_and_switch', name: 'Bait and switch', severity: 'critical' },
      { id: 'hidden_subscription', name: 'Hidden subscription', severity: 'critical' },
    ],
  },
  {
    id: 'social_engineering',
    name: 'Social Engineering',
    description: 'Fabricated trust signals',
    detection: 'visual',
    subTypes: [
      { id: 'fake_reviews', name: 'Fabricated reviews', severity: 'high' },
      { id: 'fake_badges', name: 'Unverifiable trust badges', severity: 'high' },
      { id: 'fake_authority', name: 'False authority claims', severity: 'high' },
      { id: 'fake_counters', name: 'Inflated counters', severity: 'medium' },
    ],
  },
];

export function findCategory(
  categoryId: string,
  taxonomy: readonly DarkPatternCategory[] = DARK_PATTERN_TAXONOMY,
): DarkPatternCategory | undefined {
  return taxonomy.find((category) => category.id === categoryId);
}

/** Severity of a sub-type, or `medium` when it is not in the taxonomy. */
export function severityOf(
  patternType: string,
  taxonomy: readonly DarkPatternCategory[] = DARK_PATTERN_TAXONOMY,
): Severity {
  for (const category of taxonomy) {
    const subType = category.subTypes.find((entry) => entry.id === patternType);
    if (subType) return subType.severity;
  }
  return 'medium';
}

/**
 * Category ids to analyze, with categories holding a priority pattern first.
 * An empty priority list keeps taxonomy order.
 */
export function taxonomySubset(
  priorityPatterns: readonly string[],
  taxonomy: readonly DarkPatternCategory[] = DARK_PATTERN_TAXONOMY,
): string[] {
  const hasPriority = (category: DarkPatternCategory): boolean =>
    category.subTypes.some((subType) => priorityPatterns.includes(subType.id));
  const first = taxonomy.filter(hasPriority);
  const rest = taxonomy.filter((category) => !hasPriority(category));
  return [...first, ...rest].map((category) => category.id);
}
