/**
 * IMPACT SERVICE: one prediction call
 *
 * items → rule-based → learned (optional) → combined → forecast (when priced)
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../../common/errors.js';
import { env } from '../../config/env.js';
import { generateForecast } from '../forecast/forecast.simulator.js';
import type { ForecastPath } from '../forecast/forecast.types.js';
import { combineVerdicts } from './impact.ensemble.js';
import { computeRuleBasedVerdict, countByLabel } from './impact.scorer.js';
import type {
  CombinedVerdict,
  ImpactVerdict,
  RuleBasedVerdict,
  SentimentDistribution,
  SentimentItem,
} from './impact.types.js';
import { LearnedImpactClient, type LearnedImpactScorer } from './learned-impact.client.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface PredictOptions {
  currentPrice?: number;
  horizonDays?: number;
}

export interface ImpactPrediction {
  predictionId: string;
  generatedAt: string;
  itemCount: number;
  distribution: SentimentDistribution;
  ruleBased: RuleBasedVerdict;
  learned: ImpactVerdict | null;
  combined: CombinedVerdict;
  forecast: ForecastPath | null;
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class ImpactService {
  constructor(
    private readonly learned: LearnedImpactScorer,
    private readonly defaultHorizonDays: number = env.FORECAST_HORIZON_DAYS
  ) {}

  describeDistribution(items: readonly SentimentItem[]): SentimentDistribution {
    return countByLabel(items);
  }

  /**
   * A disabled or failing learned scorer degrades to rule-based only.
   */
  private async scoreLearned(items: readonly SentimentItem[]): Promise<ImpactVerdict | null> {
    if (!this.learned.isEnabled()) return null;

    try {
      return await this.learned.score(items);
    } catch (err) {
      console.warn(`[Impact] Learned scorer failed, using rule-based only: ${errorMessage(err)}`);
      return null;
    }
  }

  async predict(items: readonly SentimentItem[], options: PredictOptions = {}): Promise<ImpactPrediction> {
    const ruleBased = computeRuleBasedVerdict(items);
    const learned = await this.scoreLearned(items);
    const combined = combineVerdicts(ruleBased, learned);

    const forecast =
      options.currentPrice === undefined
        ? null
        : generateForecast(options.currentPrice, combined, options.horizonDays ?? this.defaultHorizonDays);

    console.log(
      `[Impact] items=${items.length} rule=${ruleBased.classification} ` +
        `learned=${learned?.classification ?? 'none'} final=${combined.classification} (${combined.method})`
    );

    return {
      predictionId: uuidv4(),
      generatedAt: new Date().toISOString(),
      itemCount: items.length,
      distribution: this.describeDistribution(items),
      ruleBased,
      learned,
      combined,
      forecast,
    };
  }
}

export function createImpactService(): ImpactService {
  const learned = new LearnedImpactClient({
    enabled: env.LEARNED_MODEL_ENABLED,
    baseURL: env.LEARNED_MODEL_URL,
    timeoutMs: env.LEARNED_MODEL_TIMEOUT_MS,
  });
  return new ImpactService(learned);
}
