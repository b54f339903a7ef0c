/**
 * Parameter Validator
 *
 * Classifies a parameter value against its optimal range:
 * - ok: inside the range (inclusive)
 * - warning: outside, but less than 20 units from either bound
 * - bad: everything else
 *
 * @tested tests/property/parameter-validation.property.test.ts
 */

import {
  ParameterStatus,
  resolveDesign,
  type Design,
  type ParameterCheck,
  type ResolvedDesign,
} from '@nanoeval/shared';

/**
 * Inclusive [low, high] range
 */
export type OptimalRange = readonly [number, number];

/**
 * Absolute distance from a bound still reported as a warning
 */
export const WARNING_MARGIN = 20;

/**
 * Optimal ranges for the numeric design parameters
 */
export const OPTIMAL_RANGES = {
  Size: [80, 120],
  Charge: [-10, 10],
  Encapsulation: [85, 100],
  PDI: [0, 0.2],
  Stability: [80, 100],
  DegradationTime: [0, 30],
} as const satisfies Record<string, OptimalRange>;

export type RangedParameter = keyof typeof OPTIMAL_RANGES;

/**
 * Parameters checked by {@link validateDesignParameters}, in display order
 */
export const RANGED_PARAMETERS: readonly RangedParameter[] = [
  'Size',
  'Charge',
  'Encapsulation',
  'PDI',
  'Stability',
  'DegradationTime',
];

/**
 * Classifies a single parameter value. The name is informational only.
 */
export function validateParameter(
  _param: string,
  value: number,
  optimalRange: OptimalRange
): ParameterStatus {
  const [lo, hi] = optimalRange;
  if (lo <= value && value <= hi) {
    return ParameterStatus.OK;
  }
  if (Math.abs(value - lo) < WARNING_MARGIN || Math.abs(value - hi) < WARNING_MARGIN) {
    return ParameterStatus.WARNING;
  }
  return ParameterStatus.BAD;
}

/**
 * Checks every ranged parameter of a resolved design
 */
export function checkParameters(design: ResolvedDesign): ParameterCheck[] {
  return RANGED_PARAMETERS.map((parameter) => {
    const [lo, hi] = OPTIMAL_RANGES[parameter];
    const value = design[parameter];
    return {
      parameter,
      value,
      optimalRange: [lo, hi],
      status: validateParameter(parameter, value, [lo, hi]),
    };
  });
}

/**
 * Validates every ranged parameter of a design after defaults are applied
 *
 * @throws DesignValidationError for a missing required parameter or invalid value
 */
export function validateDesignParameters(design: Design): ParameterCheck[] {
  return checkParameters(resolveDesign(design));
}
