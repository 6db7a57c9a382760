/**
 * IMPACT MODULE: Index
 */

export * from './impact.types.js';
export * from './impact.rules.js';
export * from './impact.scorer.js';
export * from './impact.ensemble.js';
export * from './impact.schemas.js';
export * from './learned-impact.client.js';
export * from './impact.service.js';
export * from './impact.routes.js';
