/**
 * RULE-BASED IMPACT SCORER
 * ========================
 *
 * Aggregates per-article sentiment into one six-level verdict.
 *
 * FORMULA:
 * --------
 * weight(item)     = score × intensityMultiplier   (strongly 1.2, moderately 1.0, slightly 0.8)
 * share(label)     = count(label) / itemCount
 * weightedPositive = 3·share(sp) + 2·share(mp) + 1·share(slp)
 * weightedNegative = 3·share(sn) + 2·share(mn) + 1·share(sln)
 * netWeighted      = weightedPositive − weightedNegative
 * confidence       = min(cap, dominant / (weightedPositive + weightedNegative))
 *
 * Never throws. Empty or zero-weight input resolves to the default verdict.
 */

import { formatFixed } from '../../common/format.js';
import {
  CLASSIFICATION_RULES,
  TIE_CONFIDENCE,
  selectRule,
  type ClassificationContext,
} from './impact.rules.js';
import {
  SIX_LEVEL_SENTIMENTS,
  isSixLevelSentiment,
  toNumericScore,
  type ImpactBreakdown,
  type Intensity,
  type Polarity,
  type RuleBasedVerdict,
  type SentimentDistribution,
  type SentimentItem,
  type SentimentLabel,
  type SixLevelSentiment,
} from './impact.types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

const INTENSITY_MULTIPLIERS: Record<Intensity, number> = {
  strongly: 1.2,
  moderately: 1.0,
  slightly: 0.8,
};

const UNPREFIXED_MULTIPLIER = 1.0;

const INTENSITY_WEIGHTS: Record<Intensity, number> = {
  strongly: 3,
  moderately: 2,
  slightly: 1,
};

const DEFAULT_CLASSIFICATION: SixLevelSentiment = 'slightly_positive';
const DEFAULT_CONFIDENCE = 0.5;

export const NO_DATA_RATIONALE = 'No articles available for prediction.';
export const ZERO_WEIGHT_RATIONALE = 'Insufficient data for prediction.';

const OUTLOOK_SENTENCES: Record<SixLevelSentiment, string> = {
  strongly_positive:
    'Strong positive sentiment with clear upward momentum suggests significant potential for price appreciation.',
  moderately_positive:
    'Moderate positive sentiment indicates favorable conditions with potential for modest upward movement.',
  slightly_positive:
    'Slight positive bias suggests minimal upward pressure, but sentiment is not strongly bullish.',
  slightly_negative:
    'Slight negative bias suggests minimal downward pressure, but sentiment is not strongly bearish.',
  moderately_negative:
    'Moderate negative sentiment indicates unfavorable conditions with potential for modest downward movement.',
  strongly_negative:
    'Strong negative sentiment with clear downward momentum suggests significant potential for price decline.',
};

// ═══════════════════════════════════════════════════════════════
// LABEL HELPERS
// ═══════════════════════════════════════════════════════════════

function isIntensity(value: string): value is Intensity {
  return Object.hasOwn(INTENSITY_MULTIPLIERS, value);
}

export function polarityOf(label: SentimentLabel): Polarity {
  if (label.endsWith('_positive')) return 'positive';
  if (label.endsWith('_negative')) return 'negative';
  return 'neutral';
}

export function intensityOf(label: SentimentLabel): Intensity | null {
  const prefix = label.split('_')[0];
  return isIntensity(prefix) ? prefix : null;
}

export function intensityMultiplier(label: SentimentLabel): number {
  const intensity = intensityOf(label);
  return intensity ? INTENSITY_MULTIPLIERS[intensity] : UNPREFIXED_MULTIPLIER;
}

function emptyDistribution(): SentimentDistribution {
  return {
    strongly_positive: 0,
    moderately_positive: 0,
    slightly_positive: 0,
    slightly_negative: 0,
    moderately_negative: 0,
    strongly_negative: 0,
  };
}

/**
 * Item count per six-level label. `mixed` / `neutral` items are not counted.
 */
export function countByLabel(items: readonly SentimentItem[]): SentimentDistribution {
  const counts = emptyDistribution();
  for (const item of items) {
    if (isSixLevelSentiment(item.label)) counts[item.label] += 1;
  }
  return counts;
}

// ═══════════════════════════════════════════════════════════════
// AGGREGATION
// ═══════════════════════════════════════════════════════════════

function bucketShares(items: readonly SentimentItem[]): { shares: Record<Polarity, number>; totalWeight: number } {
  const sums: Record<Polarity, number> = { positive: 0, negative: 0, neutral: 0 };
  let totalWeight = 0;

  for (const item of items) {
    const weight = item.score * intensityMultiplier(item.label);
    sums[polarityOf(item.label)] += weight;
    totalWeight += weight;
  }

  if (!(totalWeight > 0)) {
    return { shares: { positive: 0, negative: 0, neutral: 0 }, totalWeight: 0 };
  }

  return {
    shares: {
      positive: sums.positive / totalWeight,
      negative: sums.negative / totalWeight,
      neutral: sums.neutral / totalWeight,
    },
    totalWeight,
  };
}

/**
 * Both sides sum strongest first, so mirrored batches cancel to exactly 0.
 */
function weightedSide(d: SentimentDistribution, polarity: 'positive' | 'negative'): number {
  return polarity === 'positive'
    ? d.strongly_positive * INTENSITY_WEIGHTS.strongly +
        d.moderately_positive * INTENSITY_WEIGHTS.moderately +
        d.slightly_positive * INTENSITY_WEIGHTS.slightly
    : d.strongly_negative * INTENSITY_WEIGHTS.strongly +
        d.moderately_negative * INTENSITY_WEIGHTS.moderately +
        d.slightly_negative * INTENSITY_WEIGHTS.slightly;
}

function buildBreakdown(items: readonly SentimentItem[], shares: Record<Polarity, number>): ImpactBreakdown {
  const counts = countByLabel(items);
  const distribution = emptyDistribution();
  for (const label of SIX_LEVEL_SENTIMENTS) {
    distribution[label] = counts[label] / items.length;
  }

  const weightedPositive = weightedSide(distribution, 'positive');
  const weightedNegative = weightedSide(distribution, 'negative');

  return {
    itemCount: items.length,
    bucketShares: shares,
    distribution,
    weightedPositive,
    weightedNegative,
    netWeighted: weightedPositive - weightedNegative,
  };
}

// ═══════════════════════════════════════════════════════════════
// RATIONALE
// ═══════════════════════════════════════════════════════════════

function pct(share: number): string {
  return `${formatFixed(share * 100, 1)}%`;
}

export function buildRationale(breakdown: ImpactBreakdown, classification: SixLevelSentiment): string {
  const d = breakdown.distribution;
  return (
    `Based on ${breakdown.itemCount} articles analyzed: ` +
    `${pct(d.strongly_positive)} strongly positive, ${pct(d.moderately_positive)} moderately positive, ` +
    `${pct(d.slightly_positive)} slightly positive, ${pct(d.slightly_negative)} slightly negative, ` +
    `${pct(d.moderately_negative)} moderately negative, ${pct(d.strongly_negative)} strongly negative. ` +
    OUTLOOK_SENTENCES[classification]
  );
}

// ═══════════════════════════════════════════════════════════════
// MAIN ENTRY
// ═══════════════════════════════════════════════════════════════

function defaultVerdict(itemCount: number, rationale: string): RuleBasedVerdict {
  return {
    classification: DEFAULT_CLASSIFICATION,
    confidence: DEFAULT_CONFIDENCE,
    rationale,
    numericScore: toNumericScore(DEFAULT_CLASSIFICATION),
    breakdown: {
      itemCount,
      bucketShares: { positive: 0, negative: 0, neutral: 0 },
      distribution: emptyDistribution(),
      weightedPositive: 0,
      weightedNegative: 0,
      netWeighted: 0,
    },
  };
}

/**
 * Exact tie on the weighted scale: more directional items wins, positive on equal counts.
 */
function resolveTie(items: readonly SentimentItem[]): SixLevelSentiment {
  let positives = 0;
  let negatives = 0;
  for (const item of items) {
    if (!isSixLevelSentiment(item.label)) continue;
    if (polarityOf(item.label) === 'positive') positives += 1;
    else negatives += 1;
  }
  return positives >= negatives ? 'slightly_positive' : 'slightly_negative';
}

export function computeRuleBasedVerdict(items: readonly SentimentItem[]): RuleBasedVerdict {
  if (items.length === 0) {
    return defaultVerdict(0, NO_DATA_RATIONALE);
  }

  const { shares, totalWeight } = bucketShares(items);
  if (totalWeight === 0) {
    return defaultVerdict(items.length, ZERO_WEIGHT_RATIONALE);
  }

  const breakdown = buildBreakdown(items, shares);
  const ctx: ClassificationContext = {
    distribution: breakdown.distribution,
    weightedPositive: breakdown.weightedPositive,
    weightedNegative: breakdown.weightedNegative,
    netWeighted: breakdown.netWeighted,
  };

  const rule = selectRule(ctx, CLASSIFICATION_RULES);

  let classification: SixLevelSentiment;
  let confidence: number;

  if (rule) {
    const totalWeighted = ctx.weightedPositive + ctx.weightedNegative;
    const dominant = rule.direction === 'positive' ? ctx.weightedPositive : ctx.weightedNegative;
    classification = rule.label;
    confidence = Math.min(rule.confidenceCap, dominant / totalWeighted);
  } else {
    classification = resolveTie(items);
    confidence = TIE_CONFIDENCE;
  }

  return {
    classification,
    confidence,
    rationale: buildRationale(breakdown, classification),
    numericScore: toNumericScore(classification),
    breakdown,
  };
}
