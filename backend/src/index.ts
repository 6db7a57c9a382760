/**
 * News Impact Engine: public API
 */

export * from './modules/impact/index.js';
export * from './modules/forecast/index.js';
export { AppError, ValidationError } from './common/errors.js';
export { buildApp, type BuildAppOptions } from './app.js';
