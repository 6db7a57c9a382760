/**
 * FORECAST MODULE: Index
 */

export * from './forecast.types.js';
export * from './forecast.random.js';
export * from './forecast.simulator.js';
