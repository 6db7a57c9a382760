/**
 * IMPACT SCHEMAS: request / reply validation
 */

import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import { SIX_LEVEL_SENTIMENTS, toNumericScore } from './impact.types.js';

export const sixLevelSentimentSchema = z.enum(SIX_LEVEL_SENTIMENTS);

export const sentimentLabelSchema = z.union([sixLevelSentimentSchema, z.enum(['mixed', 'neutral'])]);

export const sentimentItemSchema = z.object({
  textSourceId: z.string().min(1),
  label: sentimentLabelSchema,
  score: z.number().min(0).max(1),
  text: z.string().optional(),
});

// numericScore is optional on the wire; it is always re-derived from the label.
export const impactVerdictSchema = z
  .object({
    classification: sixLevelSentimentSchema,
    confidence: z.number().min(0).max(1),
    rationale: z.string().default(''),
    numericScore: z.number().min(-3).max(3).optional(),
  })
  .transform((v) => ({
    classification: v.classification,
    confidence: v.confidence,
    rationale: v.rationale,
    numericScore: toNumericScore(v.classification),
  }));

export const combinedVerdictSchema = z
  .object({
    classification: sixLevelSentimentSchema,
    confidence: z.number().min(0).max(1),
    rationale: z.string().default(''),
    numericScore: z.number().min(-3).max(3).optional(),
    method: z.enum(['rule_based_only', 'combined']).default('rule_based_only'),
    combinedScore: z.number().optional(),
  })
  .transform((v) => ({
    ...v,
    numericScore: toNumericScore(v.classification),
  }));

const horizonDaysSchema = z.number().int().min(1).max(90);

export const ruleBasedRequestSchema = z.object({
  items: z.array(sentimentItemSchema).max(1000),
});

export const combineRequestSchema = z.object({
  rule: impactVerdictSchema,
  learned: impactVerdictSchema.nullable().optional(),
});

export const forecastRequestSchema = z.object({
  currentPrice: z.number().positive(),
  verdict: combinedVerdictSchema,
  horizonDays: horizonDaysSchema.optional(),
});

export const predictRequestSchema = z.object({
  items: z.array(sentimentItemSchema).max(1000),
  currentPrice: z.number().positive().optional(),
  horizonDays: horizonDaysSchema.optional(),
});

/**
 * Reply of the learned impact model service.
 */
export const learnedModelReplySchema = z.object({
  prediction: sixLevelSentimentSchema,
  confidence: z.number().min(0).max(1),
  reasoning: z.string().optional(),
});

export type LearnedModelReply = z.infer<typeof learnedModelReplySchema>;

/**
 * Parse or throw a ValidationError carrying every issue as `path: message`.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
    throw new ValidationError(issues.join('; '), issues);
  }
  return result.data;
}
