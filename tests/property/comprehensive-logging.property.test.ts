/**
 * Property 7: Comprehensive Logging
 *
 * For any evaluation, the system SHALL log the input payload, intermediate
 * scores, final result and processing time under the request's correlation id.
 *
 * @file src/backend/shared/src/logging/logger.ts
 */

import fc from 'fast-check';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  createLogger,
  getLogger,
  LogEntrySchema,
  Logger,
  LogLevel,
  resetLogger,
  setLogger,
  type EvaluationLogEntry,
} from '../../src/backend/shared/src/logging/logger.js';

// Property test configuration
const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const validEvaluationLogEntry: fc.Arbitrary<EvaluationLogEntry> = fc.record({
  correlationId: fc.uuid(),
  designId: fc.string({ minLength: 1, maxLength: 50 }),
  inputPayload: fc.record({
    Size: fc.double({ min: 0, max: 500, noNaN: true }),
    Charge: fc.double({ min: -100, max: 100, noNaN: true }),
    Encapsulation: fc.double({ min: 0, max: 100, noNaN: true }),
  }),
  intermediateScores: fc.option(
    fc.record({ delivery: fc.double({ min: 0, max: 150, noNaN: true }) }),
    { nil: undefined }
  ),
  finalResult: fc.option(fc.record({ overallScore: fc.double({ min: 0, max: 100, noNaN: true }) }), {
    nil: undefined,
  }),
  processingTimeMs: fc.integer({ min: 0, max: 10000 }),
});

describe('Property 7: Comprehensive Logging', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createLogger({
      serviceName: 'evaluation-test',
      minLevel: LogLevel.DEBUG,
      enableConsole: false,
      bufferEntries: true,
    });
  });

  describe('Evaluation log completeness', () => {
    it('should record every field of an evaluation log entry', () => {
      fc.assert(
        fc.property(validEvaluationLogEntry, (entry) => {
          logger.clearLogEntries();
          logger.logEvaluation(entry);

          const [logged] = logger.getLogEntries();
          expect(logged.message).toBe('Design evaluation completed');
          expect(logged.level).toBe('info');
          expect(logged.correlationId).toBe(entry.correlationId);
          expect(logged.metadata?.designId).toBe(entry.designId);
          expect(logged.metadata?.inputPayload).toEqual(entry.inputPayload);
          expect(logged.metadata?.processingTimeMs).toBe(entry.processingTimeMs);
          expect(logged.metadata?.intermediateScores).toEqual(entry.intermediateScores);
          expect(logged.metadata?.finalResult).toEqual(entry.finalResult);
        }),
        propertyConfig
      );
    });

    it('should produce entries that satisfy the log entry schema', () => {
      fc.assert(
        fc.property(validEvaluationLogEntry, (entry) => {
          logger.clearLogEntries();
          logger.logEvaluation(entry);

          expect(LogEntrySchema.safeParse(logger.getLogEntries()[0]).success).toBe(true);
        }),
        propertyConfig
      );
    });
  });

  describe('Levels and correlation', () => {
    it('should drop entries below the minimum level', () => {
      const warnOnly = createLogger({
        minLevel: LogLevel.WARN,
        enableConsole: false,
        bufferEntries: true,
      });

      warnOnly.debug('debug');
      warnOnly.info('info');
      warnOnly.warn('warn');
      warnOnly.error('error', new Error('boom'));

      expect(warnOnly.getLogEntries().map((e) => e.level)).toEqual(['warn', 'error']);
      expect(warnOnly.getLogEntries()[1].error?.message).toBe('boom');
    });

    it('should record child entries in the parent buffer with the child correlation id', () => {
      const child = logger.child('req-1');

      child.info('from child');
      logger.info('from parent');

      const entries = logger.getLogEntries();
      expect(entries.map((e) => [e.message, e.correlationId])).toEqual([
        ['from child', 'req-1'],
        ['from parent', undefined],
      ]);
    });

    it('should keep nothing in memory unless buffering is enabled', () => {
      const unbuffered = createLogger({ enableConsole: false });
      const child = unbuffered.child('req-2');

      unbuffered.info('parent entry');
      child.warn('child entry');

      expect(unbuffered.getConfig().bufferEntries).toBe(false);
      expect(unbuffered.getLogEntries()).toEqual([]);
      expect(child.getLogEntries()).toEqual([]);
    });

    it('should tag entries with the service name', () => {
      logger.info('hello');

      expect(logger.getLogEntries()[0].service).toBe('evaluation-test');
    });
  });

  describe('Console output', () => {
    it('should write one JSON line per entry, errors to stderr', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const consoleLogger = createLogger({ serviceName: 'console-test' });

      consoleLogger.info('visible', { designId: 'a' });
      consoleLogger.error('failed');

      expect(log).toHaveBeenCalledTimes(1);
      expect(error).toHaveBeenCalledTimes(1);
      const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
      expect(line).toMatchObject({ level: 'info', message: 'visible', service: 'console-test' });

      log.mockRestore();
      error.mockRestore();
    });
  });

  describe('Global logger', () => {
    it('should create, replace and reset the global logger', () => {
      resetLogger();
      const first = getLogger();
      expect(getLogger()).toBe(first);

      setLogger(logger);
      expect(getLogger()).toBe(logger);

      resetLogger();
      expect(getLogger()).not.toBe(logger);
      resetLogger();
    });
  });
});
