/**
 * IMPACT RULES: ordered classification table
 *
 * net > 0 → positive rules, net < 0 → negative rules, first match wins.
 * The last rule of each side always matches.
 *
 *   strongly   : share(strongly) > 0.30  OR (weighted > 1.5 AND |net| > 1.0)   cap 0.95
 *   moderately : share(moderately) > 0.30 OR (weighted > 1.0 AND |net| > 0.5)  cap 0.90
 *   slightly   : otherwise                                                     cap 0.85
 */

import type { SentimentDistribution, SixLevelSentiment } from './impact.types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type Direction = 'positive' | 'negative';

export interface ClassificationContext {
  distribution: SentimentDistribution;
  weightedPositive: number;
  weightedNegative: number;
  netWeighted: number;
}

export interface ClassificationRule {
  id: string;
  direction: Direction;
  label: SixLevelSentiment;
  confidenceCap: number;
  when: (ctx: ClassificationContext) => boolean;
}

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const THRESHOLDS = {
  STRONG_SHARE: 0.3,
  STRONG_WEIGHTED: 1.5,
  STRONG_NET: 1.0,
  MODERATE_SHARE: 0.3,
  MODERATE_WEIGHTED: 1.0,
  MODERATE_NET: 0.5,
};

export const CONFIDENCE_CAPS = {
  STRONGLY: 0.95,
  MODERATELY: 0.9,
  SLIGHTLY: 0.85,
};

export const TIE_CONFIDENCE = 0.5;

// ═══════════════════════════════════════════════════════════════
// RULE TABLE
// ═══════════════════════════════════════════════════════════════

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    id: 'POS_STRONG',
    direction: 'positive',
    label: 'strongly_positive',
    confidenceCap: CONFIDENCE_CAPS.STRONGLY,
    when: (ctx) =>
      ctx.distribution.strongly_positive > THRESHOLDS.STRONG_SHARE ||
      (ctx.weightedPositive > THRESHOLDS.STRONG_WEIGHTED && ctx.netWeighted > THRESHOLDS.STRONG_NET),
  },
  {
    id: 'POS_MODERATE',
    direction: 'positive',
    label: 'moderately_positive',
    confidenceCap: CONFIDENCE_CAPS.MODERATELY,
    when: (ctx) =>
      ctx.distribution.moderately_positive > THRESHOLDS.MODERATE_SHARE ||
      (ctx.weightedPositive > THRESHOLDS.MODERATE_WEIGHTED && ctx.netWeighted > THRESHOLDS.MODERATE_NET),
  },
  {
    id: 'POS_SLIGHT',
    direction: 'positive',
    label: 'slightly_positive',
    confidenceCap: CONFIDENCE_CAPS.SLIGHTLY,
    when: () => true,
  },
  {
    id: 'NEG_STRONG',
    direction: 'negative',
    label: 'strongly_negative',
    confidenceCap: CONFIDENCE_CAPS.STRONGLY,
    when: (ctx) =>
      ctx.distribution.strongly_negative > THRESHOLDS.STRONG_SHARE ||
      (ctx.weightedNegative > THRESHOLDS.STRONG_WEIGHTED && Math.abs(ctx.netWeighted) > THRESHOLDS.STRONG_NET),
  },
  {
    id: 'NEG_MODERATE',
    direction: 'negative',
    label: 'moderately_negative',
    confidenceCap: CONFIDENCE_CAPS.MODERATELY,
    when: (ctx) =>
      ctx.distribution.moderately_negative > THRESHOLDS.MODERATE_SHARE ||
      (ctx.weightedNegative > THRESHOLDS.MODERATE_WEIGHTED && Math.abs(ctx.netWeighted) > THRESHOLDS.MODERATE_NET),
  },
  {
    id: 'NEG_SLIGHT',
    direction: 'negative',
    label: 'slightly_negative',
    confidenceCap: CONFIDENCE_CAPS.SLIGHTLY,
    when: () => true,
  },
];

/**
 * Pick the first matching rule for the side of `netWeighted`.
 * Returns null on an exact tie; the caller resolves it by item counts.
 */
export function selectRule(
  ctx: ClassificationContext,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): ClassificationRule | null {
  if (ctx.netWeighted === 0) return null;

  const direction: Direction = ctx.netWeighted > 0 ? 'positive' : 'negative';
  return rules.find((rule) => rule.direction === direction && rule.when(ctx)) ?? null;
}
