/**
 * Rule-Based Evaluation
 *
 * Exports the recommendation generator, parameter validator and regulatory checklist.
 */

export * from './recommendation-generator.js';
export * from './parameter-validator.js';
export * from './regulatory-checklist.js';
