/**
 * IMPACT ENGINE: Types
 *
 * Six-level directional sentiment, verdicts produced by the rule-based and
 * learned scorers, and the combined verdict that drives forecasting.
 */

// ═══════════════════════════════════════════════════════════════
// SIX-LEVEL SENTIMENT
// ═══════════════════════════════════════════════════════════════

export const SIX_LEVEL_SENTIMENTS = [
  'strongly_positive',
  'moderately_positive',
  'slightly_positive',
  'slightly_negative',
  'moderately_negative',
  'strongly_negative',
] as const;

export type SixLevelSentiment = (typeof SIX_LEVEL_SENTIMENTS)[number];

// Labels the upstream sentiment service may emit besides the six levels.
// They take no side and land in the neutral bucket.
export type UndirectedSentiment = 'mixed' | 'neutral';

export type SentimentLabel = SixLevelSentiment | UndirectedSentiment;

export type Polarity = 'positive' | 'negative' | 'neutral';

export type Intensity = 'strongly' | 'moderately' | 'slightly';

/**
 * Linear encoding used by the combiner and the forecaster.
 * There is no zero: every verdict takes a side.
 */
export const SENTIMENT_SCORES: Record<SixLevelSentiment, number> = {
  strongly_positive: 3,
  moderately_positive: 2,
  slightly_positive: 1,
  slightly_negative: -1,
  moderately_negative: -2,
  strongly_negative: -3,
};

export function isSixLevelSentiment(value: unknown): value is SixLevelSentiment {
  return typeof value === 'string' && (SIX_LEVEL_SENTIMENTS as readonly string[]).includes(value);
}

export function toNumericScore(label: SixLevelSentiment): number {
  return SENTIMENT_SCORES[label];
}

/**
 * "strongly_positive" -> "strongly positive"
 */
export function humanizeSentiment(label: SentimentLabel): string {
  return label.replace(/_/g, ' ');
}

// ═══════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════

export interface SentimentItem {
  textSourceId: string;
  label: SentimentLabel;
  score: number;          // 0..1, classifier confidence for the label
  text?: string;          // headline or summary the label was computed from
}

// ═══════════════════════════════════════════════════════════════
// VERDICTS
// ═══════════════════════════════════════════════════════════════

export interface ImpactVerdict {
  classification: SixLevelSentiment;
  confidence: number;     // 0..1
  rationale: string;
  numericScore: number;   // -3..3, SENTIMENT_SCORES[classification]
}

export type SentimentDistribution = Record<SixLevelSentiment, number>;

export interface ImpactBreakdown {
  itemCount: number;
  bucketShares: Record<Polarity, number>;   // weight share per polarity
  distribution: SentimentDistribution;      // population share per label
  weightedPositive: number;
  weightedNegative: number;
  netWeighted: number;
}

export interface RuleBasedVerdict extends ImpactVerdict {
  breakdown: ImpactBreakdown;
}

export type CombinationMethod = 'rule_based_only' | 'combined';

export interface CombinedVerdict extends ImpactVerdict {
  method: CombinationMethod;
  combinedScore?: number;  // only when both sources were combined
}
