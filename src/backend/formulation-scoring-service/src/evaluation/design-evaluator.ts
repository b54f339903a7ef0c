/**
 * Design Evaluator
 *
 * Runs the impact scorer, composite ranker, recommendation generator,
 * parameter validator and regulatory checklist over one design, and ranks
 * batches of named designs. Every evaluation is logged with its input,
 * intermediate scores, result and processing time.
 *
 * @tested tests/integration/design-evaluation.integration.test.ts
 */

import { v4 as uuidv4 } from 'uuid';
import {
  createLogger,
  isDesignValidationError,
  mergeEngineConfig,
  resolveDesign,
  validateEvaluationRequest,
  type DesignErrorCode,
  type DesignEvaluation,
  type EngineConfig,
  type Logger,
  type ResolvedDesign,
  type ValidationIssueDetail,
} from '@nanoeval/shared';

import { buildFactors, computeResolvedImpact } from '../scoring/impact-scorer.js';
import { compareRankedDesigns, overallScore } from '../scoring/composite-ranker.js';
import { recommendationsFor } from '../rules/recommendation-generator.js';
import { checkParameters } from '../rules/parameter-validator.js';
import { evaluateChecklist } from '../rules/regulatory-checklist.js';

/**
 * Options for the evaluator
 */
export interface DesignEvaluatorOptions {
  config?: Partial<EngineConfig>;
  logger?: Logger;
}

/**
 * Evaluation with its position in a ranked batch
 */
export interface RankedEvaluation extends DesignEvaluation {
  rank: number;
}

/**
 * A candidate that could not be evaluated
 */
export interface EvaluationFailure {
  designId: string;
  code: DesignErrorCode;
  message: string;
  details: ValidationIssueDetail[];
}

/**
 * Batch evaluation result
 */
export interface EvaluationBatchResult {
  requestId: string;
  evaluations: RankedEvaluation[];
  failures: EvaluationFailure[];
  totalCandidates: number;
  evaluatedCount: number;
  hasWarning: boolean;
  warning?: string;
  processingTimeMs: number;
}

/**
 * Design id used when a single design is evaluated without one
 */
export const DEFAULT_DESIGN_ID = 'design';

/**
 * Design Evaluator
 */
export class DesignEvaluator {
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(options: DesignEvaluatorOptions = {}) {
    this.config = mergeEngineConfig(options.config);
    this.logger =
      options.logger ??
      createLogger({
        serviceName: this.config.serviceName,
        minLevel: this.config.logLevel,
        enableConsole: this.config.enableConsoleLogging,
      });
  }

  getConfig(): EngineConfig {
    return { ...this.config };
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Evaluates a single design
   *
   * @param design - Raw design record, validated here
   * @param designId - Caller's name for the design
   * @param correlationId - Trace id; a new one is generated if omitted
   * @throws DesignValidationError for a missing required parameter or invalid value
   */
  evaluate(
    design: unknown,
    designId: string = DEFAULT_DESIGN_ID,
    correlationId: string = uuidv4()
  ): DesignEvaluation {
    const startTime = Date.now();
    const logger = this.logger.child(correlationId);

    const resolved = this.resolve(design, designId, logger);

    const weights = this.config.deliveryWeights;
    const deliveryBreakdown = buildFactors(resolved, weights);
    const impact = computeResolvedImpact(resolved, weights);
    const overall = overallScore(impact);
    const recommendations = recommendationsFor(resolved);
    const parameterChecks = checkParameters(resolved);
    const checklist = evaluateChecklist(resolved, this.config.approvedMaterials);
    const processingTimeMs = Date.now() - startTime;

    const evaluation: DesignEvaluation = {
      evaluationId: uuidv4(),
      designId,
      design: resolved,
      impact: { ...impact },
      deliveryBreakdown,
      overallScore: overall,
      recommendations,
      parameterChecks,
      checklist,
      evaluatedAt: new Date(),
      processingTimeMs,
    };

    logger.logEvaluation({
      correlationId,
      designId,
      inputPayload: { ...resolved },
      intermediateScores: {
        factors: deliveryBreakdown.map((f) => ({ name: f.name, value: f.value })),
        impact: { ...impact },
      },
      finalResult: {
        overallScore: overall,
        checklistPercentage: checklist.percentage,
        recommendationIds: recommendations.map((r) => r.id),
      },
      processingTimeMs,
    });

    return evaluation;
  }

  /**
   * Validates and defaults a design, logging rejections
   */
  private resolve(design: unknown, designId: string, logger: Logger): ResolvedDesign {
    try {
      return resolveDesign(design);
    } catch (error) {
      if (isDesignValidationError(error)) {
        logger.warn('Design rejected', {
          designId,
          code: error.code,
          parameter: error.parameter,
          details: error.details,
        });
      }
      throw error;
    }
  }

  /**
   * Evaluates a batch of named designs and ranks the valid ones.
   * Invalid designs are reported as failures without aborting the batch.
   *
   * @throws ZodError if the request itself is malformed
   */
  evaluateBatch(request: unknown): EvaluationBatchResult {
    const startTime = Date.now();
    const { requestId = uuidv4(), candidates } = validateEvaluationRequest(request);
    const logger = this.logger.child(requestId);

    const evaluations: DesignEvaluation[] = [];
    const failures: EvaluationFailure[] = [];

    for (const candidate of candidates) {
      try {
        evaluations.push(this.evaluate(candidate.design, candidate.designId, requestId));
      } catch (error) {
        if (!isDesignValidationError(error)) {
          throw error;
        }
        failures.push({
          designId: candidate.designId,
          code: error.code,
          message: error.message,
          details: error.details,
        });
      }
    }

    const ranked = [...evaluations]
      .sort((a, b) => compareRankedDesigns(a, b))
      .map((evaluation, index) => ({ ...evaluation, rank: index + 1 }));

    const result: EvaluationBatchResult = {
      requestId,
      evaluations: ranked,
      failures,
      totalCandidates: candidates.length,
      evaluatedCount: ranked.length,
      hasWarning: failures.length > 0,
      processingTimeMs: Date.now() - startTime,
    };

    if (failures.length > 0) {
      result.warning = `${failures.length} of ${candidates.length} designs could not be evaluated`;
      logger.warn('Batch evaluation completed with rejected designs', {
        rejected: failures.map((f) => f.designId),
      });
    }

    logger.info('Batch evaluation completed', {
      totalCandidates: result.totalCandidates,
      evaluatedCount: result.evaluatedCount,
      topDesignId: ranked[0]?.designId,
      processingTimeMs: result.processingTimeMs,
    });

    return result;
  }
}

/**
 * Creates a design evaluator
 */
export function createDesignEvaluator(options: DesignEvaluatorOptions = {}): DesignEvaluator {
  return new DesignEvaluator(options);
}

/**
 * Evaluates a single design with a fresh evaluator
 */
export function evaluateDesign(
  design: unknown,
  designId: string = DEFAULT_DESIGN_ID,
  options: DesignEvaluatorOptions = {}
): DesignEvaluation {
  return createDesignEvaluator(options).evaluate(design, designId);
}

/**
 * Evaluates and ranks a batch of designs with a fresh evaluator
 */
export function evaluateDesigns(
  request: unknown,
  options: DesignEvaluatorOptions = {}
): EvaluationBatchResult {
  return createDesignEvaluator(options).evaluateBatch(request);
}
