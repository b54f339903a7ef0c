/**
 * Explainability Layer
 *
 * Human-readable narratives for design evaluations and comparisons
 * between ranked designs.
 */

export const VERSION = '1.0.0';

// Factor Analyzer
export {
  analyzeFactors,
  determineFactorSeverity,
  describeWeakFactor,
  WEAK_FACTOR_THRESHOLD,
  CRITICAL_FACTOR_THRESHOLD,
  MODERATE_FACTOR_THRESHOLD,
  DEFAULT_ANALYSIS_OPTIONS,
  type AnalyzedFactor,
  type ConcernSeverity,
  type WeakFactor,
  type FactorAnalysisResult,
  type FactorAnalysisOptions,
} from './factor-analyzer.js';

// Narrative Generator
export {
  generateEvaluationNarrative,
  generateEvaluationExplanation,
  generateSummary,
  generateChecklistNarrative,
  humanizeFactor,
  joinWithAnd,
  DEFAULT_NARRATIVE_OPTIONS,
  type EvaluationExplanation,
  type NarrativeOptions,
} from './narrative-generator.js';

// Comparison Engine
export {
  compareEvaluations,
  compareFactors,
  generatePairwiseComparisons,
  generateBriefComparison,
  SIGNIFICANT_DIFFERENCE_THRESHOLD,
  type FactorDifference,
  type DesignComparison,
} from './comparison-engine.js';
