/**
 * Composite Ranker
 *
 * Folds delivery, toxicity and cost into a single 0-100 score so designs can
 * be compared on one scale, and ranks candidate designs by it.
 *
 * @tested tests/property/composite-ranking.property.test.ts
 */

import {
  COMPOSITE_WEIGHTS,
  DEFAULT_DELIVERY_WEIGHTS,
  MAX_SCORE,
  MAX_TOXICITY,
  type DeliveryWeights,
  type Design,
  type ImpactResult,
} from '@nanoeval/shared';

import { clamp, computeImpact } from './impact-scorer.js';

/**
 * Scores closer than this are treated as tied
 */
export const SCORE_TIE_TOLERANCE = 0.001;

/**
 * A design to be ranked
 */
export interface RankingCandidate {
  designId: string;
  design: Design;
}

/**
 * Ranked design with its impact and overall score
 */
export interface RankedDesign {
  rank: number;
  designId: string;
  impact: Readonly<ImpactResult>;
  overallScore: number;
}

/**
 * Overall score: Delivery × 0.6 + (10 − Toxicity) × 3 + (100 − Cost) × 0.1,
 * clipped to [0, 100]. Higher is better.
 */
export function overallScore(impact: ImpactResult): number {
  return clamp(
    impact.Delivery * COMPOSITE_WEIGHTS.delivery +
      (MAX_TOXICITY - impact.Toxicity) * COMPOSITE_WEIGHTS.toxicity +
      (MAX_SCORE - impact.Cost) * COMPOSITE_WEIGHTS.cost,
    0,
    MAX_SCORE
  );
}

/**
 * Compares two scored designs for sorting
 * Ties on overall score are broken by lower toxicity, then lower cost, then design id.
 *
 * @returns negative if a should come first, positive if b should come first
 */
export function compareRankedDesigns(
  a: Omit<RankedDesign, 'rank'>,
  b: Omit<RankedDesign, 'rank'>
): number {
  const scoreDiff = b.overallScore - a.overallScore;
  if (Math.abs(scoreDiff) > SCORE_TIE_TOLERANCE) {
    return scoreDiff;
  }

  const toxicityDiff = a.impact.Toxicity - b.impact.Toxicity;
  if (Math.abs(toxicityDiff) > SCORE_TIE_TOLERANCE) {
    return toxicityDiff;
  }

  const costDiff = a.impact.Cost - b.impact.Cost;
  if (Math.abs(costDiff) > SCORE_TIE_TOLERANCE) {
    return costDiff;
  }

  return a.designId.localeCompare(b.designId);
}

/**
 * Scores and ranks candidate designs, best first
 *
 * @throws DesignValidationError if any candidate is invalid
 */
export function rankDesigns(
  candidates: RankingCandidate[],
  weights: DeliveryWeights = DEFAULT_DELIVERY_WEIGHTS
): RankedDesign[] {
  const scored = candidates.map((candidate) => {
    const impact = computeImpact(candidate.design, weights);
    return {
      designId: candidate.designId,
      impact,
      overallScore: overallScore(impact),
    };
  });

  return scored.sort(compareRankedDesigns).map((entry, index) => ({
    ...entry,
    rank: index + 1,
  }));
}
