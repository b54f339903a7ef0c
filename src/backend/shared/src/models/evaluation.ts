/**
 * Evaluation Data Models and Zod Schemas
 *
 * Result shapes produced by the evaluation engine: recommendations,
 * parameter statuses, the regulatory checklist and the full per-design
 * evaluation, plus the batch evaluation request.
 *
 * @tested tests/property/schema-validation.property.test.ts
 */

import { z } from 'zod';

import { DesignSchema } from './design.js';
import { ImpactResultSchema, ScoreFactorSchema } from './scoring.js';

// Recommendation severity enumeration
export const RecommendationSeverity = {
  HIGH: 'high',
  MEDIUM: 'medium',
  PASS: 'pass',
} as const;

export type RecommendationSeverity =
  (typeof RecommendationSeverity)[keyof typeof RecommendationSeverity];

// Recommendation category enumeration, in evaluation order
export const RecommendationCategory = {
  SIZE: 'size',
  CHARGE: 'charge',
  ENCAPSULATION: 'encapsulation',
  OVERALL: 'overall',
} as const;

export type RecommendationCategory =
  (typeof RecommendationCategory)[keyof typeof RecommendationCategory];

// Parameter status enumeration
export const ParameterStatus = {
  OK: 'ok',
  WARNING: 'warning',
  BAD: 'bad',
} as const;

export type ParameterStatus = (typeof ParameterStatus)[keyof typeof ParameterStatus];

/**
 * Recommendation schema
 */
export const RecommendationSchema = z.object({
  id: z.string().min(1).max(100),
  category: z.enum(['size', 'charge', 'encapsulation', 'overall']),
  severity: z.enum(['high', 'medium', 'pass']),
  message: z.string().min(1).max(500),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

/**
 * Parameter check schema
 */
export const ParameterCheckSchema = z.object({
  parameter: z.string().min(1),
  value: z.number(),
  optimalRange: z.tuple([z.number(), z.number()]),
  status: z.enum(['ok', 'warning', 'bad']),
});

export type ParameterCheck = z.infer<typeof ParameterCheckSchema>;

/**
 * Regulatory checklist item schema
 */
export const ChecklistItemSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  passed: z.boolean(),
});

export type ChecklistItem = z.infer<typeof ChecklistItemSchema>;

/**
 * Regulatory checklist result schema
 */
export const ChecklistResultSchema = z.object({
  items: z.array(ChecklistItemSchema),
  passed: z.number().int().min(0),
  total: z.number().int().min(1),
  percentage: z.number().min(0).max(100),
});

export type ChecklistResult = z.infer<typeof ChecklistResultSchema>;

/**
 * Resolved design schema (all numeric parameters present)
 */
export const ResolvedDesignSchema = DesignSchema.required({
  PDI: true,
  HydrodynamicSize: true,
  Stability: true,
  SurfaceArea: true,
  DegradationTime: true,
});

/**
 * Full evaluation of one design
 */
export const DesignEvaluationSchema = z.object({
  evaluationId: z.string().uuid(),
  designId: z.string().min(1).max(200),
  design: ResolvedDesignSchema,
  impact: ImpactResultSchema,
  deliveryBreakdown: z.array(ScoreFactorSchema),
  overallScore: z.number().min(0).max(100),
  recommendations: z.array(RecommendationSchema).min(1),
  parameterChecks: z.array(ParameterCheckSchema),
  checklist: ChecklistResultSchema,
  evaluatedAt: z.coerce.date(),
  processingTimeMs: z.number().min(0),
});

export type DesignEvaluation = z.infer<typeof DesignEvaluationSchema>;

/**
 * Named candidate in a batch request. The design itself is validated
 * per candidate so one malformed design does not reject the batch.
 */
export const DesignCandidateSchema = z.object({
  designId: z.string().min(1).max(200),
  design: z.unknown(),
});

export type DesignCandidate = z.infer<typeof DesignCandidateSchema>;

/**
 * Batch evaluation request schema
 */
export const EvaluationRequestSchema = z
  .object({
    requestId: z.string().uuid().optional(),
    candidates: z.array(DesignCandidateSchema).min(1).max(500),
  })
  .refine(
    (data) => new Set(data.candidates.map((c) => c.designId)).size === data.candidates.length,
    {
      message: 'Design ids must be unique',
      path: ['candidates'],
    }
  );

export type EvaluationRequest = z.infer<typeof EvaluationRequestSchema>;

/**
 * Validates a batch evaluation request
 */
export function validateEvaluationRequest(data: unknown): EvaluationRequest {
  return EvaluationRequestSchema.parse(data);
}

/**
 * Safely validates a batch evaluation request
 */
export function safeValidateEvaluationRequest(
  data: unknown
): z.SafeParseReturnType<unknown, EvaluationRequest> {
  return EvaluationRequestSchema.safeParse(data);
}
