/**
 * Scoring Module Exports
 *
 * Exports impact scoring and composite ranking functionality.
 */

export * from './impact-scorer.js';
export * from './composite-ranker.js';
