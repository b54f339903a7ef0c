/**
 * Formulation Scoring Service
 *
 * Entry point for the nanocarrier formulation scoring engine.
 * Exports all scoring components for use by other modules.
 */

export const VERSION = '1.0.0';

// Export impact scoring and ranking components
export * from './scoring/index.js';

// Export rule-based evaluation components
export * from './rules/index.js';

// Export the design evaluator
export * from './evaluation/index.js';
