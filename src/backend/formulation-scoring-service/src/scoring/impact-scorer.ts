/**
 * Impact Scorer
 *
 * Converts a design's physical parameters into delivery efficacy, toxicity
 * and production cost scores.
 *
 * Delivery = Σ (sub-score × weight) over size, charge, encapsulation, PDI,
 * hydrodynamic ratio and stability. Toxicity and cost are additive penalty
 * models whose first term is capped before the remaining terms are added.
 *
 * @tested tests/property/impact-scoring.property.test.ts
 */

import {
  DEFAULT_DELIVERY_WEIGHTS,
  MAX_SCORE,
  MAX_TOXICITY,
  resolveDesign,
  type DeliveryWeights,
  type Design,
  type ImpactResult,
  type ResolvedDesign,
  type ScoreFactor,
} from '@nanoeval/shared';

/**
 * Core size band (nm) that scores 100
 */
export const OPTIMAL_SIZE_RANGE = { min: 80, max: 120 } as const;

/**
 * Absolute zeta potential (mV) at or below which charge scores 100
 */
export const NEUTRAL_CHARGE_LIMIT = 10;

/**
 * Hydrodynamic / core size ratio band that scores 100, and its centre
 */
export const OPTIMAL_HYDRODYNAMIC_RATIO = { min: 1.0, max: 1.3, target: 1.15 } as const;

/**
 * Core size (nm) with no size-related toxicity
 */
export const REFERENCE_SIZE = 100;

/**
 * Degradation time (days) beyond which toxicity accrues
 */
export const TOXICITY_DEGRADATION_THRESHOLD = 30;

/**
 * Degradation time (days) beyond which cost accrues
 */
export const COST_DEGRADATION_THRESHOLD = 60;

/**
 * PDI at or above which no cost penalty applies
 */
export const PDI_COST_REFERENCE = 0.2;

/**
 * Validates that delivery weights sum to 1.0
 */
export function validateDeliveryWeightsSum(weights: DeliveryWeights): boolean {
  const sum =
    weights.size +
    weights.charge +
    weights.encapsulation +
    weights.pdi +
    weights.hydrodynamic +
    weights.stability;
  return Math.abs(sum - 1.0) < 0.001;
}

/**
 * Size score: plateau on the optimal band, linear ramp up from 0 nm,
 * linear decay above the band reaching 0 at 320 nm.
 */
export function sizeScore(size: number): number {
  if (size >= OPTIMAL_SIZE_RANGE.min && size <= OPTIMAL_SIZE_RANGE.max) {
    return 100;
  }
  if (size < OPTIMAL_SIZE_RANGE.min) {
    return (size / OPTIMAL_SIZE_RANGE.min) * 100;
  }
  return Math.max(0, 100 - (size - OPTIMAL_SIZE_RANGE.max) / 2);
}

/**
 * Charge score: plateau near neutral, losing 3 points per mV beyond ±10 mV
 */
export function chargeScore(charge: number): number {
  const magnitude = Math.abs(charge);
  if (magnitude <= NEUTRAL_CHARGE_LIMIT) {
    return 100;
  }
  return Math.max(0, 100 - (magnitude - NEUTRAL_CHARGE_LIMIT) * 3);
}

/**
 * Encapsulation score is the efficiency percentage itself, unclamped
 */
export function encapsulationScore(encapsulation: number): number {
  return encapsulation;
}

/**
 * PDI score: lower dispersity is better, 0 from PDI 0.5 upwards
 */
export function pdiScore(pdi: number): number {
  return Math.max(0, 100 - pdi * 200);
}

/**
 * Ratio of hydrodynamic to core size. A zero core size yields 1.0.
 */
export function hydrodynamicRatio(hydrodynamicSize: number, size: number): number {
  return size ? hydrodynamicSize / size : 1.0;
}

/**
 * Hydrodynamic score from the hydrodynamic / core size ratio
 */
export function hydrodynamicScore(ratio: number): number {
  if (ratio >= OPTIMAL_HYDRODYNAMIC_RATIO.min && ratio <= OPTIMAL_HYDRODYNAMIC_RATIO.max) {
    return 100;
  }
  return Math.max(0, 100 - Math.abs(ratio - OPTIMAL_HYDRODYNAMIC_RATIO.target) * 50);
}

function createFactor(
  name: string,
  value: number,
  weight: number,
  explanation: string
): ScoreFactor {
  return {
    name,
    value,
    weight,
    contribution: value * weight,
    explanation,
  };
}

function describeSize(size: number): string {
  if (size < OPTIMAL_SIZE_RANGE.min) {
    return `Core size ${size} nm is below the optimal ${OPTIMAL_SIZE_RANGE.min}-${OPTIMAL_SIZE_RANGE.max} nm band`;
  }
  if (size > OPTIMAL_SIZE_RANGE.max) {
    return `Core size ${size} nm is above the optimal ${OPTIMAL_SIZE_RANGE.min}-${OPTIMAL_SIZE_RANGE.max} nm band`;
  }
  return `Core size ${size} nm is within the optimal band`;
}

/**
 * Builds the delivery factor breakdown for a resolved design
 */
export function buildFactors(
  design: ResolvedDesign,
  weights: DeliveryWeights = DEFAULT_DELIVERY_WEIGHTS
): ScoreFactor[] {
  const ratio = hydrodynamicRatio(design.HydrodynamicSize, design.Size);

  return [
    createFactor('size', sizeScore(design.Size), weights.size, describeSize(design.Size)),
    createFactor(
      'charge',
      chargeScore(design.Charge),
      weights.charge,
      Math.abs(design.Charge) <= NEUTRAL_CHARGE_LIMIT
        ? `Surface charge ${design.Charge} mV is near neutral`
        : `Surface charge ${design.Charge} mV exceeds ±${NEUTRAL_CHARGE_LIMIT} mV`
    ),
    createFactor(
      'encapsulation',
      encapsulationScore(design.Encapsulation),
      weights.encapsulation,
      `Encapsulation efficiency ${design.Encapsulation}%`
    ),
    createFactor(
      'pdi',
      pdiScore(design.PDI),
      weights.pdi,
      `Polydispersity index ${design.PDI}`
    ),
    createFactor(
      'hydrodynamic',
      hydrodynamicScore(ratio),
      weights.hydrodynamic,
      `Hydrodynamic to core size ratio ${ratio.toFixed(2)}`
    ),
    createFactor(
      'stability',
      design.Stability,
      weights.stability,
      `Colloidal stability ${design.Stability}%`
    ),
  ];
}

/**
 * Delivery factor breakdown for a design, validating and defaulting it first.
 * Contributions sum to the delivery score.
 *
 * @throws DesignValidationError for a missing required parameter or invalid value
 */
export function buildDeliveryBreakdown(
  design: Design,
  weights: DeliveryWeights = DEFAULT_DELIVERY_WEIGHTS
): ScoreFactor[] {
  return buildFactors(resolveDesign(design), weights);
}

/**
 * Delivery score: weighted sum of the factor contributions. Not clamped.
 */
export function computeDelivery(
  design: ResolvedDesign,
  weights: DeliveryWeights = DEFAULT_DELIVERY_WEIGHTS
): number {
  return buildFactors(design, weights).reduce((sum, factor) => sum + factor.contribution, 0);
}

/**
 * Toxicity on a 0-10 scale. The charge/size term is capped at 10 on its own
 * before PDI and degradation terms are added and the total capped again.
 */
export function computeToxicity(design: ResolvedDesign): number {
  const baseToxicity = Math.min(
    MAX_TOXICITY,
    Math.abs(design.Charge) / 10 + Math.max(0, Math.abs(design.Size - REFERENCE_SIZE)) / 50
  );
  const pdiToxicity = design.PDI * 2;
  const degradationToxicity = Math.max(
    0,
    (design.DegradationTime - TOXICITY_DEGRADATION_THRESHOLD) / 30
  );

  return clamp(baseToxicity + pdiToxicity + degradationToxicity, 0, MAX_TOXICITY);
}

/**
 * Production cost on a 0-100 scale. The encapsulation/size term is capped
 * at 100 before surface area, PDI and degradation terms are added.
 */
export function computeCost(design: ResolvedDesign): number {
  const baseCost = Math.min(MAX_SCORE, (100 - design.Encapsulation) * 0.8 + design.Size / 4);
  const surfaceAreaCost = design.SurfaceArea / 20;
  const pdiCost = (PDI_COST_REFERENCE - Math.min(design.PDI, PDI_COST_REFERENCE)) * 100;
  const degradationCost = Math.max(
    0,
    (design.DegradationTime - COST_DEGRADATION_THRESHOLD) / 10
  );

  return clamp(baseCost + surfaceAreaCost + pdiCost + degradationCost, 0, MAX_SCORE);
}

/**
 * Impact Scorer
 *
 * @param design - Design record; optional parameters fall back to their defaults
 * @param weights - Delivery weights, must sum to 1.0
 * @returns Frozen impact result
 * @throws DesignValidationError for a missing required parameter or invalid value
 */
export function computeImpact(
  design: Design,
  weights: DeliveryWeights = DEFAULT_DELIVERY_WEIGHTS
): Readonly<ImpactResult> {
  return computeResolvedImpact(resolveDesign(design), weights);
}

/**
 * Impact for a design that has already been resolved
 */
export function computeResolvedImpact(
  design: ResolvedDesign,
  weights: DeliveryWeights = DEFAULT_DELIVERY_WEIGHTS
): Readonly<ImpactResult> {
  if (!validateDeliveryWeightsSum(weights)) {
    throw new Error('Delivery weights must sum to 1.0');
  }

  return Object.freeze({
    Delivery: computeDelivery(design, weights),
    Toxicity: computeToxicity(design),
    Cost: computeCost(design),
  });
}

/**
 * Clamps a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
