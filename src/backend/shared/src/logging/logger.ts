/**
 * Structured Logging Module
 *
 * Provides structured JSON logging with correlation ID support. Entries can
 * also be kept in memory for inspection when buffering is enabled.
 *
 * @tested tests/property/comprehensive-logging.property.test.ts
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Schema for a log level value
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  operation: z.string().optional(),
  duration: z.number().optional(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Evaluation log entry for tracking scoring of a single design
 */
export interface EvaluationLogEntry {
  correlationId: string;
  designId: string;
  inputPayload: Record<string, unknown>;
  intermediateScores?: Record<string, unknown>;
  finalResult?: Record<string, unknown>;
  processingTimeMs: number;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  /** Keep entries in memory for getLogEntries(); off by default */
  bufferEntries: boolean;
}

/**
 * Default logger configuration
 */
export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'nanoeval',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  bufferEntries: false,
};

/**
 * Checks if a log level should be logged based on minimum level
 */
function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
  return levels.indexOf(level) >= levels.indexOf(minLevel);
}

/**
 * Structured Logger class
 */
export class Logger {
  private config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[] = [];

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultLoggerConfig, ...config };
  }

  /**
   * Sets the correlation ID for all subsequent log entries
   */
  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Creates a child logger with a specific correlation ID.
   * The child records into the parent's entry buffer.
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config);
    childLogger.setCorrelationId(correlationId);
    childLogger.logEntries = this.logEntries;
    return childLogger;
  }

  /**
   * Gets all buffered log entries. Empty unless bufferEntries is set.
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  /**
   * Clears all log entries (for testing)
   */
  clearLogEntries(): void {
    this.logEntries.length = 0;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      correlationId: this.correlationId,
    };

    if (metadata) {
      entry.metadata = metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    if (this.config.bufferEntries) {
      this.logEntries.push(entry);
    }

    if (this.config.enableConsole) {
      const logFn = level === LogLevel.ERROR ? console.error : console.log;
      logFn(JSON.stringify(entry));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs an evaluation with its input, intermediate scores and final result
   */
  logEvaluation(entry: EvaluationLogEntry): void {
    this.setCorrelationId(entry.correlationId);

    const metadata: Record<string, unknown> = {
      designId: entry.designId,
      inputPayload: entry.inputPayload,
      processingTimeMs: entry.processingTimeMs,
    };

    if (entry.intermediateScores) {
      metadata.intermediateScores = entry.intermediateScores;
    }

    if (entry.finalResult) {
      metadata.finalResult = entry.finalResult;
    }

    this.info('Design evaluation completed', metadata);
  }
}

/**
 * Creates a logger instance with the given configuration
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

/**
 * Global logger instance
 */
let globalLogger: Logger | null = null;

/**
 * Gets the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Sets the global logger instance
 */
export function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Resets the global logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
