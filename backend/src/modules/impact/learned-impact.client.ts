/**
 * Learned Impact Client
 * =====================
 *
 * HTTP wrapper around the external learned impact model.
 *
 * - The model is OPTIONAL: disabled, unreachable or malformed → null
 * - null means "rule-based only" downstream, never an error
 * - Reply is validated before it becomes a verdict
 */

import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../../common/errors.js';
import { formatFixed } from '../../common/format.js';
import { learnedModelReplySchema, type LearnedModelReply } from './impact.schemas.js';
import { toNumericScore, type ImpactVerdict, type SentimentItem } from './impact.types.js';

// ============================================================
// Types
// ============================================================

export interface LearnedImpactClientOptions {
  enabled: boolean;
  baseURL: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

export interface LearnedImpactScorer {
  isEnabled(): boolean;
  score(items: readonly SentimentItem[]): Promise<ImpactVerdict | null>;
}

// ============================================================
// Client
// ============================================================

export class LearnedImpactClient implements LearnedImpactScorer {
  private readonly client: AxiosInstance;
  private readonly enabled: boolean;

  constructor(options: LearnedImpactClientOptions) {
    this.enabled = options.enabled;
    this.client =
      options.http ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });

    console.log(`[Learned Model] Initialized: enabled=${this.enabled}, url=${options.baseURL}`);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Ask the learned model for a verdict on the batch.
   */
  async score(items: readonly SentimentItem[]): Promise<ImpactVerdict | null> {
    if (!this.enabled || items.length === 0) {
      return null;
    }

    const startTime = Date.now();

    let payload: unknown;
    try {
      const response = await this.client.post('/predict', {
        items: items.map((item) => ({
          textSourceId: item.textSourceId,
          label: item.label,
          score: item.score,
          text: item.text ?? '',
        })),
      });
      payload = response.data;
    } catch (error) {
      console.warn(`[Learned Model] Request failed after ${Date.now() - startTime}ms: ${errorMessage(error)}`);
      return null;
    }

    const parsed = learnedModelReplySchema.safeParse(payload);
    if (!parsed.success) {
      console.warn(`[Learned Model] Malformed reply: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      return null;
    }

    return toVerdict(parsed.data, items.length);
  }
}

function toVerdict(reply: LearnedModelReply, itemCount: number): ImpactVerdict {
  const { prediction, confidence, reasoning } = reply;
  return {
    classification: prediction,
    confidence,
    rationale:
      reasoning ??
      `Learned model prediction based on ${itemCount} articles. Model confidence: ${formatFixed(confidence * 100, 2)}%`,
    numericScore: toNumericScore(prediction),
  };
}
