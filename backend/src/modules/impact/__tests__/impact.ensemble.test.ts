/**
 * Impact ensemble tests
 *
 * 1. Rule-based passthrough when the learned model is missing
 * 2. Confidence-gated weighting
 * 3. Near-zero band tie-break
 * 4. Confidence cap and rationale
 */

import { describe, it, expect } from 'vitest';
import {
  NO_LEARNED_MODEL_NOTE,
  classifyCombinedScore,
  combineVerdicts,
  learnedWeightFor,
} from '../impact.ensemble.js';
import { toNumericScore, type ImpactVerdict, type SixLevelSentiment } from '../impact.types.js';

function verdict(classification: SixLevelSentiment, confidence: number): ImpactVerdict {
  return {
    classification,
    confidence,
    rationale: `${classification} source`,
    numericScore: toNumericScore(classification),
  };
}

describe('Impact ensemble', () => {

  describe('without a learned verdict', () => {

    it('should pass the rule verdict through as rule_based_only', () => {
      const rule = verdict('moderately_negative', 0.72);
      const result = combineVerdicts(rule, null);

      expect(result.method).toBe('rule_based_only');
      expect(result.classification).toBe('moderately_negative');
      expect(result.confidence).toBe(0.72);
      expect(result.numericScore).toBe(-2);
      expect(result.rationale).toBe(`moderately_negative source${NO_LEARNED_MODEL_NOTE}`);
      expect(result.combinedScore).toBeUndefined();
    });
  });

  describe('weighting', () => {

    it('should give the learned model 0.7 only above 0.6 confidence', () => {
      expect(learnedWeightFor(0.6)).toBe(0.5);
      expect(learnedWeightFor(0.61)).toBe(0.7);
    });

    it('should let a confident learned model outvote an equally confident rule verdict', () => {
      const result = combineVerdicts(verdict('strongly_positive', 0.9), verdict('strongly_negative', 0.9));

      expect(result.method).toBe('combined');
      expect(result.combinedScore).toBeCloseTo(-1.08, 10);
      expect(result.classification).toBe('moderately_negative');
      expect(result.confidence).toBeCloseTo(0.9, 10);
    });

    it('should reinforce agreeing sources', () => {
      const result = combineVerdicts(verdict('moderately_positive', 0.8), verdict('strongly_positive', 0.9));

      expect(result.combinedScore).toBeCloseTo(2.37, 10);
      expect(result.classification).toBe('strongly_positive');
      expect(result.confidence).toBeCloseTo(0.87, 10);
    });

    it('should cap combined confidence at 0.95', () => {
      const result = combineVerdicts(verdict('strongly_positive', 1), verdict('strongly_positive', 1));

      expect(result.classification).toBe('strongly_positive');
      expect(result.confidence).toBe(0.95);
    });
  });

  describe('near-zero band', () => {

    it('should keep the rule label when opposite sources have equal confidence', () => {
      const result = combineVerdicts(verdict('strongly_positive', 0.6), verdict('strongly_negative', 0.6));

      expect(result.combinedScore).toBe(0);
      expect(result.classification).toBe('strongly_positive');
      expect(result.numericScore).toBe(3);
      expect(result.confidence).toBeCloseTo(0.6, 10);
    });

    it('should take the learned label when it is more confident', () => {
      const result = combineVerdicts(verdict('slightly_positive', 0.5), verdict('slightly_negative', 0.55));

      expect(result.combinedScore).toBeCloseTo(-0.025, 10);
      expect(result.classification).toBe('slightly_negative');
    });

    it('should map score bounds onto labels', () => {
      expect(classifyCombinedScore(2.0)).toBe('strongly_positive');
      expect(classifyCombinedScore(1.0)).toBe('moderately_positive');
      expect(classifyCombinedScore(0.3)).toBe('slightly_positive');
      expect(classifyCombinedScore(0.29)).toBeNull();
      expect(classifyCombinedScore(-0.29)).toBeNull();
      expect(classifyCombinedScore(-0.3)).toBe('slightly_negative');
      expect(classifyCombinedScore(-1.0)).toBe('moderately_negative');
      expect(classifyCombinedScore(-2.5)).toBe('strongly_negative');
    });
  });

  describe('rationale', () => {

    it('should name both confidences, both labels and the result', () => {
      const result = combineVerdicts(verdict('moderately_positive', 0.8), verdict('strongly_positive', 0.9));

      expect(result.rationale).toBe(
        'Enhanced prediction combining rule-based analysis (80% confidence) ' +
          'with learned model insights (90% confidence). ' +
          'Rule-based: moderately positive. Learned: strongly positive. Combined result: strongly positive.'
      );
    });

    it('should round an exact half confidence to the even percent', () => {
      const result = combineVerdicts(verdict('moderately_positive', 0.125), verdict('strongly_positive', 0.9));

      expect(result.combinedScore).toBeCloseTo(1.965, 10);
      expect(result.rationale).toBe(
        'Enhanced prediction combining rule-based analysis (12% confidence) ' +
          'with learned model insights (90% confidence). ' +
          'Rule-based: moderately positive. Learned: strongly positive. Combined result: moderately positive.'
      );
    });
  });
});
