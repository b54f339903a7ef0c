/**
 * Property 6: Schema Validation
 *
 * For any input, design validation SHALL accept records with finite numeric
 * Size, Charge and Encapsulation, default the optional parameters, and reject
 * everything else with a typed error carrying field-level details.
 *
 * @file src/backend/shared/src/models/design.ts
 * @file src/backend/shared/src/models/scoring.ts
 * @file src/backend/shared/src/models/evaluation.ts
 * @file src/backend/shared/src/errors/design-errors.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  DESIGN_DEFAULTS,
  isKnownMaterial,
  resolveDesign,
  safeValidateDesign,
  validateDesign,
} from '../../src/backend/shared/src/models/design.js';
import {
  DEFAULT_DELIVERY_WEIGHTS,
  ImpactResultSchema,
  validateBreakdownCompleteness,
  validateDeliveryWeights,
} from '../../src/backend/shared/src/models/scoring.js';
import {
  safeValidateEvaluationRequest,
  validateEvaluationRequest,
} from '../../src/backend/shared/src/models/evaluation.js';
import {
  DesignErrorCode,
  DesignValidationError,
  isDesignValidationError,
} from '../../src/backend/shared/src/errors/design-errors.js';
import { buildDeliveryBreakdown } from '../../src/backend/formulation-scoring-service/src/scoring/impact-scorer.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const finite = fc.double({ noNaN: true, noDefaultInfinity: true });

const validDesign = fc.record({
  Size: finite,
  Charge: finite,
  Encapsulation: finite,
});

function captureError(fn: () => unknown): DesignValidationError {
  try {
    fn();
  } catch (error) {
    if (isDesignValidationError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a DesignValidationError');
}

describe('Property 6: Schema Validation', () => {
  describe('Design validation', () => {
    it('should accept any finite required parameters', () => {
      fc.assert(
        fc.property(validDesign, (design) => {
          expect(safeValidateDesign(design).success).toBe(true);
        }),
        propertyConfig
      );
    });

    it('should report a missing required parameter', () => {
      const error = captureError(() => validateDesign({ Charge: 5, Encapsulation: 85 }));

      expect(error.code).toBe(DesignErrorCode.MISSING_REQUIRED_PARAMETER);
      expect(error.parameter).toBe('Size');
      expect(error.message).toBe('Missing required parameter: Size');
      expect(error.details.map((d) => d.field)).toEqual(['Size']);
    });

    it('should prefer missing parameters over invalid values', () => {
      const error = captureError(() => validateDesign({ Size: 'large', Encapsulation: 85 }));

      expect(error.code).toBe(DesignErrorCode.MISSING_REQUIRED_PARAMETER);
      expect(error.parameter).toBe('Charge');
      expect(error.details.map((d) => d.field)).toEqual(['Size', 'Charge']);
    });

    it('should reject NaN as an invalid value', () => {
      const error = captureError(() => validateDesign({ Size: NaN, Charge: 5, Encapsulation: 85 }));

      expect(error.code).toBe(DesignErrorCode.INVALID_PARAMETER_VALUE);
      expect(error.parameter).toBe('Size');
    });

    it('should reject infinite values', () => {
      const error = captureError(() =>
        validateDesign({ Size: 100, Charge: Infinity, Encapsulation: 85 })
      );

      expect(error.code).toBe(DesignErrorCode.INVALID_PARAMETER_VALUE);
      expect(error.parameter).toBe('Charge');
    });

    it('should reject an unknown material', () => {
      const error = captureError(() =>
        validateDesign({ Size: 100, Charge: 5, Encapsulation: 85, Material: 'Unobtainium' })
      );

      expect(error.code).toBe(DesignErrorCode.INVALID_PARAMETER_VALUE);
      expect(error.parameter).toBe('Material');
    });

    it('should reject a non-object design at the record level', () => {
      const error = captureError(() => validateDesign(null));

      expect(error.code).toBe(DesignErrorCode.INVALID_PARAMETER_VALUE);
      expect(error.parameter).toBe('(design)');
    });

    it('should recognise known materials', () => {
      expect(isKnownMaterial('PLGA')).toBe(true);
      expect(isKnownMaterial('plga')).toBe(false);
    });
  });

  describe('Defaults', () => {
    it('should substitute documented defaults', () => {
      expect(resolveDesign({ Size: 100, Charge: 5, Encapsulation: 85 })).toEqual({
        Size: 100,
        Charge: 5,
        Encapsulation: 85,
        PDI: DESIGN_DEFAULTS.PDI,
        HydrodynamicSize: 120,
        Stability: 85,
        SurfaceArea: 250,
        DegradationTime: 30,
        Material: undefined,
      });
    });

    it('should keep supplied optional values', () => {
      const resolved = resolveDesign({
        Size: 100,
        Charge: 5,
        Encapsulation: 85,
        PDI: 0.05,
        HydrodynamicSize: 110,
      });

      expect(resolved.PDI).toBe(0.05);
      expect(resolved.HydrodynamicSize).toBe(110);
    });

    it('should derive hydrodynamic size from core size', () => {
      fc.assert(
        fc.property(fc.double({ min: 0, max: 1000, noNaN: true }), (size) => {
          const resolved = resolveDesign({ Size: size, Charge: 0, Encapsulation: 0 });
          expect(resolved.HydrodynamicSize).toBe(size * 1.2);
        }),
        propertyConfig
      );
    });
  });

  describe('Scoring schemas', () => {
    it('should reject toxicity above 10', () => {
      expect(ImpactResultSchema.safeParse({ Delivery: 50, Toxicity: 11, Cost: 10 }).success).toBe(
        false
      );
    });

    it('should accept default weights and reject weights not summing to 1', () => {
      expect(validateDeliveryWeights(DEFAULT_DELIVERY_WEIGHTS)).toEqual(DEFAULT_DELIVERY_WEIGHTS);
      expect(() => validateDeliveryWeights({ ...DEFAULT_DELIVERY_WEIGHTS, stability: 0.2 })).toThrow();
    });

    it('should validate a generated delivery breakdown as complete', () => {
      const breakdown = buildDeliveryBreakdown({ Size: 100, Charge: 5, Encapsulation: 85 });

      expect(validateBreakdownCompleteness(breakdown)).toBe(true);
    });

    it('should detect a contribution mismatch', () => {
      const breakdown = buildDeliveryBreakdown({ Size: 100, Charge: 5, Encapsulation: 85 });
      breakdown[0] = { ...breakdown[0], contribution: 1 };

      expect(() => validateBreakdownCompleteness(breakdown)).toThrow(
        'Factor size contribution mismatch'
      );
    });
  });

  describe('Evaluation request', () => {
    it('should accept named candidates', () => {
      const request = validateEvaluationRequest({
        candidates: [{ designId: 'a', design: { Size: 100 } }],
      });

      expect(request.candidates).toHaveLength(1);
    });

    it('should reject an empty candidate list', () => {
      expect(safeValidateEvaluationRequest({ candidates: [] }).success).toBe(false);
    });

    it('should reject duplicate design ids', () => {
      const result = safeValidateEvaluationRequest({
        candidates: [
          { designId: 'a', design: {} },
          { designId: 'a', design: {} },
        ],
      });

      expect(result.success).toBe(false);
    });

    it('should reject a request id that is not a uuid', () => {
      const result = safeValidateEvaluationRequest({
        requestId: 'not-a-uuid',
        candidates: [{ designId: 'a', design: {} }],
      });

      expect(result.success).toBe(false);
    });
  });
});
