/**
 * Integration Tests: Design Evaluation
 *
 * Runs designs through the evaluator end to end: validation, scoring,
 * recommendations, parameter checks, checklist, ranking and logging.
 */

import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import {
  createDesignEvaluator,
  evaluateDesign,
  evaluateDesigns,
} from '../../src/backend/formulation-scoring-service/src/index.js';
import { DesignEvaluationSchema } from '../../src/backend/shared/src/models/evaluation.js';
import { DesignValidationError } from '../../src/backend/shared/src/errors/design-errors.js';
import { createLogger, LogLevel } from '../../src/backend/shared/src/logging/logger.js';

const quiet = { config: { enableConsoleLogging: false } };

const REQUEST_ID = '123e4567-e89b-42d3-a456-426614174000';

describe('Design Evaluation Integration', () => {
  describe('Single design', () => {
    it('should produce a complete evaluation', () => {
      const evaluation = evaluateDesign(
        { Size: 100, Charge: 5, Encapsulation: 85, Material: 'PLGA' },
        'A',
        quiet
      );

      expect(DesignEvaluationSchema.safeParse(evaluation).success).toBe(true);
      expect(evaluation.designId).toBe('A');
      expect(evaluation.impact.Delivery).toBeCloseTo(91.0, 6);
      expect(evaluation.overallScore).toBeCloseTo(86.75, 6);
      expect(evaluation.recommendations.map((r) => r.id)).toEqual(['overall.optimal']);
      expect(evaluation.parameterChecks.every((c) => c.status === 'ok')).toBe(true);
      expect(evaluation.checklist.percentage).toBe(100);
    });

    it('should flag a poor design across every component', () => {
      const evaluation = evaluateDesign({ Size: 60, Charge: 20, Encapsulation: 60 }, 'C', quiet);

      expect(evaluation.impact.Delivery).toBeCloseTo(72.5, 6);
      expect(evaluation.impact.Toxicity).toBeCloseTo(3.1, 6);
      expect(evaluation.impact.Cost).toBeCloseTo(64.5, 6);
      expect(evaluation.recommendations.map((r) => r.id)).toEqual([
        'size.increase',
        'charge.lower',
        'encapsulation.improve',
      ]);
      expect(evaluation.checklist.percentage).toBe(75);
    });

    it('should throw a typed error for a missing parameter', () => {
      expect(() => evaluateDesign({ Size: 100, Charge: 5 }, 'X', quiet)).toThrow(
        DesignValidationError
      );
    });

    it('should use the configured approved materials', () => {
      const evaluation = evaluateDesign(
        { Size: 100, Charge: 5, Encapsulation: 85, Material: 'Chitosan' },
        'A',
        { config: { enableConsoleLogging: false, approvedMaterials: ['Chitosan'] } }
      );

      expect(evaluation.checklist.percentage).toBe(100);
    });
  });

  describe('Logging', () => {
    it('should log each evaluation with its correlation id', () => {
      const logger = createLogger({
        minLevel: LogLevel.DEBUG,
        enableConsole: false,
        bufferEntries: true,
      });
      const evaluator = createDesignEvaluator({ logger });

      evaluator.evaluate({ Size: 100, Charge: 5, Encapsulation: 85 }, 'A', 'trace-1');

      const [entry] = logger.getLogEntries();
      expect(entry.message).toBe('Design evaluation completed');
      expect(entry.correlationId).toBe('trace-1');
      expect(entry.metadata?.designId).toBe('A');
      expect(entry.metadata?.finalResult).toMatchObject({
        checklistPercentage: 87.5,
        recommendationIds: ['overall.optimal'],
      });
    });

    it('should keep no log entries on a default evaluator', () => {
      const evaluator = createDesignEvaluator(quiet);

      for (let i = 0; i < 50; i++) {
        evaluator.evaluate({ Size: 100, Charge: 5, Encapsulation: 85 }, `design-${i}`);
      }
      evaluator.evaluateBatch({
        candidates: [{ designId: 'A', design: { Size: 100, Charge: 5, Encapsulation: 85 } }],
      });

      expect(evaluator.getLogger().getLogEntries()).toHaveLength(0);
    });

    it('should log a warning when a design is rejected', () => {
      const logger = createLogger({ enableConsole: false, bufferEntries: true });
      const evaluator = createDesignEvaluator({ logger });

      expect(() => evaluator.evaluate({ Charge: 5, Encapsulation: 85 }, 'X', 'trace-2')).toThrow();

      const [entry] = logger.getLogEntries();
      expect(entry.level).toBe('warn');
      expect(entry.message).toBe('Design rejected');
      expect(entry.metadata?.code).toBe('MISSING_REQUIRED_PARAMETER');
      expect(entry.metadata?.parameter).toBe('Size');
    });
  });

  describe('Batch evaluation', () => {
    it('should rank valid designs and report invalid ones', () => {
      const result = evaluateDesigns(
        {
          requestId: REQUEST_ID,
          candidates: [
            { designId: 'C', design: { Size: 60, Charge: 20, Encapsulation: 60 } },
            { designId: 'B', design: { Charge: 5, Encapsulation: 85 } },
            { designId: 'A', design: { Size: 100, Charge: 5, Encapsulation: 85 } },
          ],
        },
        quiet
      );

      expect(result.requestId).toBe(REQUEST_ID);
      expect(result.evaluations.map((e) => [e.rank, e.designId])).toEqual([
        [1, 'A'],
        [2, 'C'],
      ]);
      expect(result.failures).toEqual([
        {
          designId: 'B',
          code: 'MISSING_REQUIRED_PARAMETER',
          message: 'Missing required parameter: Size',
          details: [{ field: 'Size', message: 'Required', code: 'invalid_type' }],
        },
      ]);
      expect(result.totalCandidates).toBe(3);
      expect(result.evaluatedCount).toBe(2);
      expect(result.hasWarning).toBe(true);
      expect(result.warning).toBe('1 of 3 designs could not be evaluated');
    });

    it('should generate a request id when none is given', () => {
      const result = evaluateDesigns(
        { candidates: [{ designId: 'A', design: { Size: 100, Charge: 5, Encapsulation: 85 } }] },
        quiet
      );

      expect(result.requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(result.hasWarning).toBe(false);
      expect(result.warning).toBeUndefined();
    });

    it('should log batch completion under the request id', () => {
      const logger = createLogger({ enableConsole: false, bufferEntries: true });
      const evaluator = createDesignEvaluator({ logger });

      evaluator.evaluateBatch({
        requestId: REQUEST_ID,
        candidates: [{ designId: 'A', design: { Size: 100, Charge: 5, Encapsulation: 85 } }],
      });

      const last = logger.getLogEntries().at(-1);
      expect(last?.message).toBe('Batch evaluation completed');
      expect(last?.correlationId).toBe(REQUEST_ID);
      expect(last?.metadata?.topDesignId).toBe('A');
    });

    it('should reject a malformed request', () => {
      expect(() =>
        evaluateDesigns(
          {
            candidates: [
              { designId: 'A', design: {} },
              { designId: 'A', design: {} },
            ],
          },
          quiet
        )
      ).toThrow(ZodError);
    });
  });
});
