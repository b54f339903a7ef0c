/**
 * Scoring Data Models and Zod Schemas
 *
 * Defines the canonical schemas for the impact result, delivery score factors
 * and the configurable delivery weights of the formulation scoring engine.
 *
 * @tested tests/property/schema-validation.property.test.ts
 */

import { z } from 'zod';

/**
 * Individual delivery score factor
 * contribution = value * weight
 */
export const ScoreFactorSchema = z.object({
  name: z.string().min(1).max(100),
  value: z.number(),
  weight: z.number().min(0).max(1),
  contribution: z.number(),
  explanation: z.string().min(1).max(500),
});

export type ScoreFactor = z.infer<typeof ScoreFactorSchema>;

/**
 * Impact result schema
 *
 * Delivery is a weighted sum and is intentionally left unbounded;
 * Toxicity and Cost are clamped to their scales.
 */
export const ImpactResultSchema = z.object({
  Delivery: z.number(),
  Toxicity: z.number().min(0).max(10),
  Cost: z.number().min(0).max(100),
});

export type ImpactResult = z.infer<typeof ImpactResultSchema>;

/**
 * Upper bound of the toxicity scale
 */
export const MAX_TOXICITY = 10;

/**
 * Upper bound of the cost and overall scales
 */
export const MAX_SCORE = 100;

/**
 * Delivery weights configuration schema
 */
export const DeliveryWeightsSchema = z
  .object({
    size: z.number().min(0).max(1),
    charge: z.number().min(0).max(1),
    encapsulation: z.number().min(0).max(1),
    pdi: z.number().min(0).max(1),
    hydrodynamic: z.number().min(0).max(1),
    stability: z.number().min(0).max(1),
  })
  .refine(
    (data) =>
      Math.abs(
        data.size + data.charge + data.encapsulation + data.pdi + data.hydrodynamic + data.stability - 1
      ) < 0.001,
    {
      message: 'Weights must sum to 1.0',
    }
  );

export type DeliveryWeights = z.infer<typeof DeliveryWeightsSchema>;

/**
 * Default delivery weights
 */
export const DEFAULT_DELIVERY_WEIGHTS: DeliveryWeights = {
  size: 0.25,
  charge: 0.2,
  encapsulation: 0.25,
  pdi: 0.15,
  hydrodynamic: 0.1,
  stability: 0.05,
};

/**
 * Composite ranking weights. Toxicity and cost enter inverted:
 * overall = Delivery * delivery + (10 - Toxicity) * toxicity + (100 - Cost) * cost
 */
export const COMPOSITE_WEIGHTS = {
  delivery: 0.6,
  toxicity: 3,
  cost: 0.1,
} as const;

/**
 * Validates delivery weights
 */
export function validateDeliveryWeights(data: unknown): DeliveryWeights {
  return DeliveryWeightsSchema.parse(data);
}

/**
 * Validates that a delivery breakdown is internally consistent
 *
 * @param factors - Delivery factors to validate
 * @returns true if valid, throws error if invalid
 */
export function validateBreakdownCompleteness(factors: ScoreFactor[]): boolean {
  const totalWeight = factors.reduce((sum, f) => sum + f.weight, 0);

  if (Math.abs(totalWeight - 1.0) > 0.001) {
    throw new Error(`Factor weights must sum to 1.0, got ${totalWeight}`);
  }

  for (const factor of factors) {
    const expectedContribution = factor.value * factor.weight;
    if (Math.abs(factor.contribution - expectedContribution) > 0.001) {
      throw new Error(
        `Factor ${factor.name} contribution mismatch: expected ${expectedContribution}, got ${factor.contribution}`
      );
    }
  }

  return true;
}
