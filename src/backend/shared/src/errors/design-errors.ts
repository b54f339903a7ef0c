/**
 * Design Validation Errors
 *
 * Typed failures raised when a design record cannot be scored: a required
 * parameter is absent, or a value is not a finite number / known material.
 */

import type { ZodError, ZodIssue } from 'zod';

/**
 * Error codes for design validation failures
 */
export const DesignErrorCode = {
  MISSING_REQUIRED_PARAMETER: 'MISSING_REQUIRED_PARAMETER',
  INVALID_PARAMETER_VALUE: 'INVALID_PARAMETER_VALUE',
} as const;

export type DesignErrorCode = (typeof DesignErrorCode)[keyof typeof DesignErrorCode];

/**
 * Field-level validation detail
 */
export interface ValidationIssueDetail {
  field: string;
  message: string;
  code: string;
}

/**
 * Name used for issues that concern the record itself rather than a field
 */
export const ROOT_FIELD = '(design)';

/**
 * Formats Zod issues into field-level error details
 */
export function formatValidationIssues(issues: ZodIssue[]): ValidationIssueDetail[] {
  return issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * A required field is missing when Zod expected a value and received undefined
 */
function isMissingValueIssue(issue: ZodIssue): boolean {
  return issue.code === 'invalid_type' && issue.received === 'undefined' && issue.path.length > 0;
}

/**
 * Raised when a design cannot be validated
 */
export class DesignValidationError extends Error {
  constructor(
    message: string,
    public readonly code: DesignErrorCode,
    public readonly parameter: string,
    public readonly details: ValidationIssueDetail[] = []
  ) {
    super(message);
    this.name = 'DesignValidationError';
  }

  /**
   * Builds a validation error from a Zod error.
   * Missing required parameters take precedence over invalid values.
   */
  static fromZodError(error: ZodError): DesignValidationError {
    const details = formatValidationIssues(error.issues);
    const missing = error.issues.find(isMissingValueIssue);

    if (missing) {
      const parameter = missing.path.join('.');
      return new DesignValidationError(
        `Missing required parameter: ${parameter}`,
        DesignErrorCode.MISSING_REQUIRED_PARAMETER,
        parameter,
        details
      );
    }

    const [first] = details;
    const parameter = first?.field ?? ROOT_FIELD;
    return new DesignValidationError(
      `Invalid parameter value for ${parameter}: ${first?.message ?? 'validation failed'}`,
      DesignErrorCode.INVALID_PARAMETER_VALUE,
      parameter,
      details
    );
  }
}

/**
 * Type guard for design validation errors
 */
export function isDesignValidationError(error: unknown): error is DesignValidationError {
  return error instanceof DesignValidationError;
}
