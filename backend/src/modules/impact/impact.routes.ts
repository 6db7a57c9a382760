/**
 * IMPACT ROUTES: HTTP Endpoints
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { generateForecast } from '../forecast/forecast.simulator.js';
import { combineVerdicts } from './impact.ensemble.js';
import {
  combineRequestSchema,
  forecastRequestSchema,
  parseBody,
  predictRequestSchema,
  ruleBasedRequestSchema,
} from './impact.schemas.js';
import { computeRuleBasedVerdict } from './impact.scorer.js';
import type { ImpactService } from './impact.service.js';

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerImpactRoutes(app: FastifyInstance, service: ImpactService): Promise<void> {
  const prefix = '/api/impact/v1';

  /**
   * POST /api/impact/v1/rule-based
   *
   * Rule-based verdict for a batch of scored items
   */
  app.post(`${prefix}/rule-based`, async (request: FastifyRequest) => {
    const { items } = parseBody(ruleBasedRequestSchema, request.body);
    return { ok: true, data: computeRuleBasedVerdict(items) };
  });

  /**
   * POST /api/impact/v1/combine
   *
   * Merge a rule-based verdict with an optional learned verdict
   */
  app.post(`${prefix}/combine`, async (request: FastifyRequest) => {
    const { rule, learned } = parseBody(combineRequestSchema, request.body);
    return { ok: true, data: combineVerdicts(rule, learned ?? null) };
  });

  /**
   * POST /api/impact/v1/forecast
   *
   * Simulated price path for a combined verdict
   */
  app.post(`${prefix}/forecast`, async (request: FastifyRequest) => {
    const { currentPrice, verdict, horizonDays } = parseBody(forecastRequestSchema, request.body);
    return { ok: true, data: generateForecast(currentPrice, verdict, horizonDays) };
  });

  /**
   * POST /api/impact/v1/predict
   *
   * Full pipeline: rule-based, learned, combined and (when priced) forecast
   */
  app.post(`${prefix}/predict`, async (request: FastifyRequest) => {
    const { items, currentPrice, horizonDays } = parseBody(predictRequestSchema, request.body);
    const prediction = await service.predict(items, { currentPrice, horizonDays });
    return { ok: true, data: prediction };
  });

  console.log('[Impact] Routes registered');
}
