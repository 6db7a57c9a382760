/**
 * FORECAST: Types
 */

import type { SixLevelSentiment } from '../impact/impact.types.js';

export interface ForecastPath {
  dates: string[];            // YYYY-MM-DD, starting tomorrow
  prices: number[];           // cents, never below PRICE_FLOOR
  targetChangePct: number;    // % over the whole horizon
  confidence: number;
  classification: SixLevelSentiment;
  numericScore: number;
  error?: string;             // set on the flat fallback path only
}

export interface ForecastOptions {
  seed?: number;              // reproducible path; fresh entropy when omitted
  now?: Date;                 // calendar origin, dates start the day after
}

/**
 * Accumulator of the daily walk.
 * lastPrice is the previous recorded (rounded) price, current price on day 0.
 */
export interface SimulationState {
  day: number;
  simPrice: number;
  lastPrice: number;
  lastDelta: number;
}

export interface SimulationParams {
  currentPrice: number;
  targetPrice: number;
  horizonDays: number;
  confidence: number;
}
