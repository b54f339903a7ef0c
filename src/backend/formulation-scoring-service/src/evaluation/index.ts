/**
 * Evaluation Module Exports
 */

export * from './design-evaluator.js';
