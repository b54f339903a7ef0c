/**
 * Formulation Design Data Models and Zod Schemas
 *
 * Defines the canonical schema for a candidate nanoparticle formulation
 * and resolves the optional parameters to their documented defaults.
 *
 * @tested tests/property/schema-validation.property.test.ts
 */

import { z } from 'zod';

import { DesignValidationError } from '../errors/design-errors.js';

/**
 * Carrier materials the engine knows about
 */
export const KNOWN_MATERIALS = [
  'Lipid NP',
  'PLGA',
  'Liposome',
  'Chitosan',
  'Gold NP',
  'Silica NP',
  'Polymeric Micelle',
  'Dendrimer',
] as const;

export type Material = (typeof KNOWN_MATERIALS)[number];

/**
 * Materials approved for medical use unless configuration says otherwise
 */
export const DEFAULT_APPROVED_MATERIALS: readonly Material[] = ['Lipid NP', 'PLGA'];

/**
 * Defaults substituted for absent optional parameters.
 * HydrodynamicSize has no fixed default: it is derived from Size.
 */
export const DESIGN_DEFAULTS = {
  PDI: 0.15,
  Stability: 85,
  SurfaceArea: 250,
  DegradationTime: 30,
} as const;

/**
 * Hydrodynamic size is estimated as the core size times this factor when not measured
 */
export const HYDRODYNAMIC_SIZE_FACTOR = 1.2;

const finiteNumber = z.number().finite();

/**
 * Design schema
 *
 * Size in nm, Charge (zeta potential) in mV, Encapsulation in percent.
 * Values outside the physical range are accepted and scored as-is.
 */
export const DesignSchema = z.object({
  Size: finiteNumber,
  Charge: finiteNumber,
  Encapsulation: finiteNumber,
  PDI: finiteNumber.optional(),
  HydrodynamicSize: finiteNumber.optional(),
  Stability: finiteNumber.optional(),
  SurfaceArea: finiteNumber.optional(),
  DegradationTime: finiteNumber.optional(),
  Material: z.enum(KNOWN_MATERIALS).optional(),
});

export type Design = z.infer<typeof DesignSchema>;

/**
 * Design with every optional numeric parameter filled in
 */
export interface ResolvedDesign {
  Size: number;
  Charge: number;
  Encapsulation: number;
  PDI: number;
  HydrodynamicSize: number;
  Stability: number;
  SurfaceArea: number;
  DegradationTime: number;
  Material?: Material;
}

/**
 * Validates raw input against the design schema
 *
 * @throws DesignValidationError when a required parameter is missing or a value is invalid
 */
export function validateDesign(data: unknown): Design {
  const result = DesignSchema.safeParse(data);
  if (!result.success) {
    throw DesignValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Safely validates a design
 */
export function safeValidateDesign(data: unknown): z.SafeParseReturnType<unknown, Design> {
  return DesignSchema.safeParse(data);
}

/**
 * Validates a design and substitutes defaults for the optional parameters
 */
export function resolveDesign(data: unknown): ResolvedDesign {
  const design = validateDesign(data);

  return {
    Size: design.Size,
    Charge: design.Charge,
    Encapsulation: design.Encapsulation,
    PDI: design.PDI ?? DESIGN_DEFAULTS.PDI,
    HydrodynamicSize: design.HydrodynamicSize ?? design.Size * HYDRODYNAMIC_SIZE_FACTOR,
    Stability: design.Stability ?? DESIGN_DEFAULTS.Stability,
    SurfaceArea: design.SurfaceArea ?? DESIGN_DEFAULTS.SurfaceArea,
    DegradationTime: design.DegradationTime ?? DESIGN_DEFAULTS.DegradationTime,
    Material: design.Material,
  };
}

/**
 * Checks whether a string names a known material
 */
export function isKnownMaterial(value: string): value is Material {
  return KNOWN_MATERIALS.some((material) => material === value);
}
