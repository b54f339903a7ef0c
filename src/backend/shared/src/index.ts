/**
 * Shared Package
 *
 * Exports all shared models, schemas, errors, configuration and logging
 * for the nanocarrier formulation evaluator.
 */

// Design models and schemas
export * from './models/design.js';

// Scoring models and schemas
export * from './models/scoring.js';

// Evaluation result models and schemas
export * from './models/evaluation.js';

// Validation errors
export * from './errors/design-errors.js';

// Logging
export * from './logging/logger.js';

// Configuration
export * from './config/engine-config.js';
