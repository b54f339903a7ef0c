/**
 * Comparison Engine
 *
 * Generates comparative explanations between ranked designs, highlighting
 * the delivery factors that explain why one design outranks another.
 *
 * @tested tests/property/explainability.property.test.ts
 */

import type { DesignEvaluation, ImpactResult, ScoreFactor } from '@nanoeval/shared';

import { humanizeFactor, joinWithAnd } from './narrative-generator.js';

/**
 * Difference between two designs on one delivery factor
 */
export interface FactorDifference {
  factorName: string;
  higherRankedValue: number;
  lowerRankedValue: number;
  difference: number;
  favorsHigher: boolean;
  explanation: string;
}

/**
 * Comparison result between two designs
 */
export interface DesignComparison {
  higherRanked: {
    designId: string;
    overallScore: number;
  };
  lowerRanked: {
    designId: string;
    overallScore: number;
  };
  scoreDifference: number;
  impactDifferences: ImpactResult;
  keyDifferentiators: FactorDifference[];
  comparisonNarrative: string;
}

/**
 * Sub-score gap (0-100 scale) below which a factor difference is ignored
 */
export const SIGNIFICANT_DIFFERENCE_THRESHOLD = 5;

function generateDifferenceExplanation(
  factorName: string,
  higherId: string,
  lowerId: string,
  higherValue: number,
  lowerValue: number
): string {
  const humanName = humanizeFactor(factorName);
  const hv = higherValue.toFixed(0);
  const lv = lowerValue.toFixed(0);

  if (higherValue > lowerValue) {
    return `${higherId} has better ${humanName} (${hv} vs ${lv})`;
  }
  return `${lowerId} has better ${humanName} (${lv} vs ${hv}), but other factors outweigh this`;
}

/**
 * Compares delivery factors of two evaluations; the result is sorted by
 * absolute difference, largest first
 */
export function compareFactors(
  higher: DesignEvaluation,
  lower: DesignEvaluation
): FactorDifference[] {
  const lowerFactors = new Map<string, ScoreFactor>();
  for (const factor of lower.deliveryBreakdown) {
    lowerFactors.set(factor.name, factor);
  }

  const differences: FactorDifference[] = [];
  for (const higherFactor of higher.deliveryBreakdown) {
    const lowerFactor = lowerFactors.get(higherFactor.name);
    if (!lowerFactor) {
      continue;
    }

    const difference = higherFactor.value - lowerFactor.value;
    if (Math.abs(difference) < SIGNIFICANT_DIFFERENCE_THRESHOLD) {
      continue;
    }

    differences.push({
      factorName: higherFactor.name,
      higherRankedValue: higherFactor.value,
      lowerRankedValue: lowerFactor.value,
      difference,
      favorsHigher: difference > 0,
      explanation: generateDifferenceExplanation(
        higherFactor.name,
        higher.designId,
        lower.designId,
        higherFactor.value,
        lowerFactor.value
      ),
    });
  }

  return differences.sort((a, b) => Math.abs(b.difference) - Math.abs(a.difference));
}

function generateComparisonNarrative(
  higher: DesignEvaluation,
  lower: DesignEvaluation,
  scoreDifference: number,
  keyDifferentiators: FactorDifference[]
): string {
  const parts: string[] = [
    `${higher.designId} ranks above ${lower.designId} by ${scoreDifference.toFixed(1)} points.`,
  ];

  const advantages = keyDifferentiators.filter((d) => d.favorsHigher);
  if (advantages.length === 1) {
    parts.push(`The primary advantage is ${humanizeFactor(advantages[0].factorName)}.`);
  } else if (advantages.length > 1) {
    const names = advantages.slice(0, 3).map((d) => humanizeFactor(d.factorName));
    parts.push(`Key advantages include ${joinWithAnd(names)}.`);
  }

  const toxicityGap = lower.impact.Toxicity - higher.impact.Toxicity;
  if (toxicityGap > 0) {
    parts.push(`It is also less toxic (${higher.impact.Toxicity.toFixed(1)} vs ${lower.impact.Toxicity.toFixed(1)}).`);
  }

  const disadvantages = keyDifferentiators.filter((d) => !d.favorsHigher);
  if (disadvantages.length > 0) {
    const names = disadvantages.map((d) => humanizeFactor(d.factorName));
    parts.push(
      `${lower.designId} has better ${joinWithAnd(names)}, but the overall score favors ${higher.designId}.`
    );
  }

  if (keyDifferentiators.length === 0 && toxicityGap <= 0) {
    parts.push('The designs differ only marginally on individual delivery factors.');
  }

  return parts.join(' ');
}

/**
 * Compares two evaluated designs
 *
 * @param higher - Higher-ranked evaluation
 * @param lower - Lower-ranked evaluation
 */
export function compareEvaluations(
  higher: DesignEvaluation,
  lower: DesignEvaluation
): DesignComparison {
  const keyDifferentiators = compareFactors(higher, lower);
  const scoreDifference = higher.overallScore - lower.overallScore;

  return {
    higherRanked: { designId: higher.designId, overallScore: higher.overallScore },
    lowerRanked: { designId: lower.designId, overallScore: lower.overallScore },
    scoreDifference,
    impactDifferences: {
      Delivery: higher.impact.Delivery - lower.impact.Delivery,
      Toxicity: higher.impact.Toxicity - lower.impact.Toxicity,
      Cost: higher.impact.Cost - lower.impact.Cost,
    },
    keyDifferentiators,
    comparisonNarrative: generateComparisonNarrative(
      higher,
      lower,
      scoreDifference,
      keyDifferentiators
    ),
  };
}

/**
 * Generates comparisons for each adjacent pair of an already ranked list
 */
export function generatePairwiseComparisons(ranked: DesignEvaluation[]): DesignComparison[] {
  const comparisons: DesignComparison[] = [];
  for (let i = 0; i < ranked.length - 1; i++) {
    comparisons.push(compareEvaluations(ranked[i], ranked[i + 1]));
  }
  return comparisons;
}

/**
 * One-sentence comparison between two designs
 */
export function generateBriefComparison(
  higher: DesignEvaluation,
  lower: DesignEvaluation
): string {
  const comparison = compareEvaluations(higher, lower);
  const topAdvantage = comparison.keyDifferentiators.find((d) => d.favorsHigher);

  if (!topAdvantage) {
    return `${higher.designId} edges out ${lower.designId} by ${comparison.scoreDifference.toFixed(1)} points.`;
  }

  return `${higher.designId} outperforms ${lower.designId} primarily due to better ${humanizeFactor(topAdvantage.factorName)}.`;
}
