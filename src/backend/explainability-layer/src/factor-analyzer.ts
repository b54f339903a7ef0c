/**
 * Factor Analyzer
 *
 * Analyzes a delivery breakdown to identify the top contributing factors and
 * the weak factors that drag a design's delivery score down.
 */

import type { ScoreFactor } from '@nanoeval/shared';

/**
 * Sub-score below which a factor is considered weak
 */
export const WEAK_FACTOR_THRESHOLD = 50;

/**
 * Sub-score below which a weak factor is a critical concern
 */
export const CRITICAL_FACTOR_THRESHOLD = 30;

/**
 * Sub-score below which a weak factor is a moderate concern
 */
export const MODERATE_FACTOR_THRESHOLD = 40;

export type ConcernSeverity = 'low' | 'medium' | 'high';

/**
 * Analyzed factor with ranking metadata
 */
export interface AnalyzedFactor {
  factor: ScoreFactor;
  rank: number;
  isTopContributor: boolean;
  isWeakFactor: boolean;
  severity: ConcernSeverity | null;
}

/**
 * Weak factor with severity and description
 */
export interface WeakFactor {
  factorName: string;
  value: number;
  severity: ConcernSeverity;
  description: string;
}

/**
 * Result of factor analysis
 */
export interface FactorAnalysisResult {
  topContributors: AnalyzedFactor[];
  weakFactors: WeakFactor[];
  allFactors: AnalyzedFactor[];
  overallConcernLevel: ConcernSeverity;
}

/**
 * Options for factor analysis
 */
export interface FactorAnalysisOptions {
  topN?: number;
  weakThreshold?: number;
}

/**
 * Default analysis options
 */
export const DEFAULT_ANALYSIS_OPTIONS: Required<FactorAnalysisOptions> = {
  topN: 3,
  weakThreshold: WEAK_FACTOR_THRESHOLD,
};

/**
 * Determines concern severity for a sub-score, null when the factor is not weak
 */
export function determineFactorSeverity(
  value: number,
  weakThreshold: number = WEAK_FACTOR_THRESHOLD
): ConcernSeverity | null {
  if (value >= weakThreshold) {
    return null;
  }
  if (value < CRITICAL_FACTOR_THRESHOLD) {
    return 'high';
  }
  if (value < MODERATE_FACTOR_THRESHOLD) {
    return 'medium';
  }
  return 'low';
}

/**
 * Generates a human-readable description for a weak factor
 */
export function describeWeakFactor(factorName: string, value: number): string {
  const score = value.toFixed(0);

  switch (factorName) {
    case 'size':
      return `Core size far from the 80-120 nm band (size score ${score})`;
    case 'charge':
      return `High surface charge (charge score ${score})`;
    case 'encapsulation':
      return `Low encapsulation efficiency (${score}%)`;
    case 'pdi':
      return `Broad size distribution (PDI score ${score})`;
    case 'hydrodynamic':
      return `Hydration layer out of proportion to core size (hydrodynamic score ${score})`;
    case 'stability':
      return `Poor colloidal stability (${score}%)`;
    default:
      return `Low ${factorName} score (${score})`;
  }
}

/**
 * Analyzes delivery factors
 *
 * Factors are ranked by contribution (highest first); the first `topN`
 * are top contributors.
 */
export function analyzeFactors(
  factors: ScoreFactor[],
  options: FactorAnalysisOptions = {}
): FactorAnalysisResult {
  const opts = { ...DEFAULT_ANALYSIS_OPTIONS, ...options };

  const sorted = [...factors].sort((a, b) => b.contribution - a.contribution);

  const allFactors: AnalyzedFactor[] = sorted.map((factor, index) => {
    const severity = determineFactorSeverity(factor.value, opts.weakThreshold);
    return {
      factor,
      rank: index + 1,
      isTopContributor: index < opts.topN,
      isWeakFactor: severity !== null,
      severity,
    };
  });

  const weakFactors: WeakFactor[] = [];
  for (const analyzed of allFactors) {
    if (analyzed.severity !== null) {
      weakFactors.push({
        factorName: analyzed.factor.name,
        value: analyzed.factor.value,
        severity: analyzed.severity,
        description: describeWeakFactor(analyzed.factor.name, analyzed.factor.value),
      });
    }
  }

  return {
    topContributors: allFactors.filter((af) => af.isTopContributor),
    weakFactors,
    allFactors,
    overallConcernLevel: overallConcernLevel(weakFactors),
  };
}

function overallConcernLevel(weakFactors: WeakFactor[]): ConcernSeverity {
  if (weakFactors.some((wf) => wf.severity === 'high')) {
    return 'high';
  }
  if (weakFactors.length > 1 || weakFactors.some((wf) => wf.severity === 'medium')) {
    return 'medium';
  }
  return 'low';
}
