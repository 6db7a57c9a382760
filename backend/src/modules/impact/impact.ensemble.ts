/**
 * IMPACT ENSEMBLE: rule-based + learned verdict
 * ==============================================
 *
 * FORMULA:
 * --------
 * learnedWeight = learned.confidence > 0.6 ? 0.7 : 0.5
 * ruleWeight    = 1 − learnedWeight
 * combinedScore = learned.score·learnedWeight·learned.confidence
 *               + rule.score·ruleWeight·rule.confidence
 * confidence    = min(0.95, learned.confidence·learnedWeight + rule.confidence·ruleWeight)
 *
 * |combinedScore| < 0.3 → label of the more confident source (rule on equal confidence).
 */

import { formatFixed } from '../../common/format.js';
import {
  humanizeSentiment,
  toNumericScore,
  type CombinedVerdict,
  type ImpactVerdict,
  type SixLevelSentiment,
} from './impact.types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const ENSEMBLE_WEIGHTS = {
  CONFIDENT_LEARNED: 0.7,
  DEFAULT_LEARNED: 0.5,
  LEARNED_CONFIDENCE_GATE: 0.6,
};

export const MAX_COMBINED_CONFIDENCE = 0.95;

export const NO_LEARNED_MODEL_NOTE = ' (Learned model not available or not trained)';

// Evaluated in order; the first bound that matches wins.
const SCORE_BANDS: ReadonlyArray<{ label: SixLevelSentiment; matches: (score: number) => boolean }> = [
  { label: 'strongly_positive', matches: (s) => s >= 2.0 },
  { label: 'moderately_positive', matches: (s) => s >= 1.0 },
  { label: 'slightly_positive', matches: (s) => s >= 0.3 },
  { label: 'strongly_negative', matches: (s) => s <= -2.0 },
  { label: 'moderately_negative', matches: (s) => s <= -1.0 },
  { label: 'slightly_negative', matches: (s) => s <= -0.3 },
];

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function learnedWeightFor(learnedConfidence: number): number {
  return learnedConfidence > ENSEMBLE_WEIGHTS.LEARNED_CONFIDENCE_GATE
    ? ENSEMBLE_WEIGHTS.CONFIDENT_LEARNED
    : ENSEMBLE_WEIGHTS.DEFAULT_LEARNED;
}

/**
 * Band lookup for a combined score. Null inside the near-zero band.
 */
export function classifyCombinedScore(score: number): SixLevelSentiment | null {
  return SCORE_BANDS.find((band) => band.matches(score))?.label ?? null;
}

function wholePct(value: number): string {
  return `${formatFixed(value * 100, 0)}%`;
}

// ═══════════════════════════════════════════════════════════════
// MAIN ENTRY
// ═══════════════════════════════════════════════════════════════

export function combineVerdicts(rule: ImpactVerdict, learned: ImpactVerdict | null): CombinedVerdict {
  if (!learned) {
    return {
      classification: rule.classification,
      confidence: rule.confidence,
      rationale: rule.rationale + NO_LEARNED_MODEL_NOTE,
      numericScore: rule.numericScore,
      method: 'rule_based_only',
    };
  }

  const learnedWeight = learnedWeightFor(learned.confidence);
  const ruleWeight = 1 - learnedWeight;

  const combinedScore =
    toNumericScore(learned.classification) * learnedWeight * learned.confidence +
    toNumericScore(rule.classification) * ruleWeight * rule.confidence;

  const classification =
    classifyCombinedScore(combinedScore) ??
    (rule.confidence >= learned.confidence ? rule.classification : learned.classification);

  const confidence = Math.min(
    MAX_COMBINED_CONFIDENCE,
    learned.confidence * learnedWeight + rule.confidence * ruleWeight
  );

  const rationale =
    `Enhanced prediction combining rule-based analysis (${wholePct(rule.confidence)} confidence) ` +
    `with learned model insights (${wholePct(learned.confidence)} confidence). ` +
    `Rule-based: ${humanizeSentiment(rule.classification)}. ` +
    `Learned: ${humanizeSentiment(learned.classification)}. ` +
    `Combined result: ${humanizeSentiment(classification)}.`;

  return {
    classification,
    confidence,
    rationale,
    numericScore: toNumericScore(classification),
    method: 'combined',
    combinedScore,
  };
}
