/**
 * FORECAST SIMULATOR
 * ==================
 *
 * Turns a combined impact verdict into a short daily price path:
 * - Target move scales with the verdict score (±3 → ±6% over the horizon)
 * - Drift re-targets every day, so noise never derails the endpoint
 * - Gaussian shock + light momentum for a market-like walk
 * - Final price always agrees with the verdict direction
 *
 * Simulation failures degrade to a flat path and are never thrown.
 */

import { AppError, errorMessage } from '../../common/errors.js';
import { isSixLevelSentiment, type ImpactVerdict } from '../impact/impact.types.js';
import { createRng, randn, type Rng } from './forecast.random.js';
import type { ForecastOptions, ForecastPath, SimulationParams, SimulationState } from './forecast.types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const FORECAST_CONSTANTS = {
  DEFAULT_HORIZON_DAYS: 7,
  MAX_SCORE: 3,
  MAX_MOVE_PCT: 0.06,
  BASE_VOLATILITY: 0.015,
  STRONG_VOLATILITY: 0.025,
  STRONG_SCORE: 2,
  MOMENTUM: 0.2,
  PRICE_FLOOR: 0.01,
  PRICE_TICK: 0.01,
  DIRECTIONAL_SCORE: 0.5,
  DIRECTIONAL_UP: 1.005,
  DIRECTIONAL_DOWN: 0.995,
};

const DAY_MS = 24 * 60 * 60 * 1000;

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function targetReturnPct(numericScore: number): number {
  return (numericScore / FORECAST_CONSTANTS.MAX_SCORE) * FORECAST_CONSTANTS.MAX_MOVE_PCT;
}

export function baseVolatility(numericScore: number): number {
  return Math.abs(numericScore) > FORECAST_CONSTANTS.STRONG_SCORE
    ? FORECAST_CONSTANTS.STRONG_VOLATILITY
    : FORECAST_CONSTANTS.BASE_VOLATILITY;
}

/**
 * Calendar days after `now`, UTC, YYYY-MM-DD.
 */
export function forecastDates(horizonDays: number, now: Date = new Date()): string[] {
  const dates: string[] = [];
  for (let i = 1; i <= horizonDays; i++) {
    dates.push(new Date(now.getTime() + i * DAY_MS).toISOString().slice(0, 10));
  }
  return dates;
}

function assertForecastInput(currentPrice: number, verdict: ImpactVerdict, horizonDays: number): void {
  if (typeof currentPrice !== 'number' || !(currentPrice > 0)) {
    throw new AppError('INVALID_FORECAST_INPUT', `currentPrice must be a positive number, got ${currentPrice}`);
  }
  if (!Number.isInteger(horizonDays) || horizonDays < 1) {
    throw new AppError('INVALID_FORECAST_INPUT', `horizonDays must be a positive integer, got ${horizonDays}`);
  }
  if (!isSixLevelSentiment(verdict.classification)) {
    throw new AppError('INVALID_FORECAST_INPUT', `verdict.classification is not a six-level label`);
  }
  if (typeof verdict.confidence !== 'number' || typeof verdict.numericScore !== 'number') {
    throw new AppError('INVALID_FORECAST_INPUT', 'verdict.confidence and verdict.numericScore are required');
  }
}

// ═══════════════════════════════════════════════════════════════
// WALK
// ═══════════════════════════════════════════════════════════════

export function initialState(currentPrice: number): SimulationState {
  return { day: 0, simPrice: currentPrice, lastPrice: currentPrice, lastDelta: 0 };
}

/**
 * One simulated day. Pure: the shock is drawn by the caller.
 */
export function stepSimulation(state: SimulationState, params: SimulationParams, shock: number): SimulationState {
  const remainingDays = params.horizonDays - state.day;
  const dailyDrift = (params.targetPrice - state.simPrice) / remainingDays;
  const momentum = FORECAST_CONSTANTS.MOMENTUM * state.lastDelta;

  const simPrice = Math.max(
    FORECAST_CONSTANTS.PRICE_FLOOR,
    state.simPrice + dailyDrift * params.confidence + shock + momentum
  );
  const recorded = roundCents(simPrice);

  return {
    day: state.day + 1,
    simPrice,
    lastPrice: recorded,
    lastDelta: recorded - state.lastPrice,
  };
}

export function simulatePrices(params: SimulationParams, volatility: number, rng: Rng): number[] {
  const prices: number[] = [];
  let state = initialState(params.currentPrice);

  for (let i = 0; i < params.horizonDays; i++) {
    const shock = randn(rng) * volatility * params.currentPrice;
    state = stepSimulation(state, params, shock);
    prices.push(state.lastPrice);
  }

  return prices;
}

/**
 * Shift the path so its endpoint agrees with the verdict direction.
 * The correction grows linearly with the day index and lands one tick past the floor.
 */
export function applyDirectionalCorrection(prices: number[], currentPrice: number, numericScore: number): number[] {
  const n = prices.length;
  if (n === 0) return prices;

  const finalPrice = prices[n - 1];
  let target: number | null = null;

  if (numericScore > FORECAST_CONSTANTS.DIRECTIONAL_SCORE) {
    const floor = currentPrice * FORECAST_CONSTANTS.DIRECTIONAL_UP;
    if (!(finalPrice > floor)) target = floor + FORECAST_CONSTANTS.PRICE_TICK;
  } else if (numericScore < -FORECAST_CONSTANTS.DIRECTIONAL_SCORE) {
    const ceiling = currentPrice * FORECAST_CONSTANTS.DIRECTIONAL_DOWN;
    if (!(finalPrice < ceiling)) target = ceiling - FORECAST_CONSTANTS.PRICE_TICK;
  }

  if (target === null) return prices;

  const adjustment = target - finalPrice;
  return prices.map((price, i) =>
    Math.max(FORECAST_CONSTANTS.PRICE_FLOOR, roundCents(price + (adjustment * (i + 1)) / n))
  );
}

function flatPath(
  currentPrice: number,
  verdict: ImpactVerdict,
  dates: string[],
  error: string
): ForecastPath {
  return {
    dates,
    prices: dates.map(() => currentPrice),
    targetChangePct: 0,
    confidence: verdict.confidence,
    classification: verdict.classification,
    numericScore: verdict.numericScore,
    error,
  };
}

// ═══════════════════════════════════════════════════════════════
// MAIN ENTRY
// ═══════════════════════════════════════════════════════════════

export function generateForecast(
  currentPrice: number,
  verdict: ImpactVerdict,
  horizonDays: number = FORECAST_CONSTANTS.DEFAULT_HORIZON_DAYS,
  options: ForecastOptions = {}
): ForecastPath {
  assertForecastInput(currentPrice, verdict, horizonDays);

  const dates = forecastDates(horizonDays, options.now);

  try {
    const target = targetReturnPct(verdict.numericScore);
    const rng = createRng(options.seed);

    const raw = simulatePrices(
      {
        currentPrice,
        targetPrice: currentPrice * (1 + target),
        horizonDays,
        confidence: verdict.confidence,
      },
      baseVolatility(verdict.numericScore),
      rng
    );

    if (raw.some((price) => !Number.isFinite(price))) {
      throw new Error('simulation produced a non-finite price');
    }

    return {
      dates,
      prices: applyDirectionalCorrection(raw, currentPrice, verdict.numericScore),
      targetChangePct: roundCents(target * 100),
      confidence: verdict.confidence,
      classification: verdict.classification,
      numericScore: verdict.numericScore,
    };
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[Forecast] Simulation failed, returning flat path: ${message}`);
    return flatPath(currentPrice, verdict, dates, message);
  }
}
