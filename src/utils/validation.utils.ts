/**
 * @fileoverview Zod-based validation utilities for configuration input and printer API
 * responses. Wraps schema parsing into a success/failure result carrying an AppError, and
 * formats issues for log output.
 *
 * Core Functions:
 * - validate(schema, data, code): Full validation with detailed error info
 * - coerceToNumber(value): Safe number coercion with null on failure
 * - formatValidationErrors(error): Multi-line error message with paths
 */

import { z, ZodError, ZodSchema } from 'zod';
import { AppError, ErrorCode, fromZodError } from './error.utils';

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

/**
 * Success validation result
 */
export interface ValidationSuccess<T> {
  success: true;
  data: T;
}

/**
 * Failed validation result
 */
export interface ValidationFailure {
  success: false;
  error: AppError;
  issues?: Array<{
    path: string;
    message: string;
    code: string;
  }>;
}

/**
 * Validation result union type
 */
export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

// ============================================================================
// CORE VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate data against a schema with detailed error info
 */
export function validate<T>(
  schema: ZodSchema<T>,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return {
      success: true,
      data: result.data
    };
  }

  return {
    success: false,
    error: fromZodError(result.error, code),
    issues: result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }))
  };
}

// ============================================================================
// COERCION UTILITIES
// ============================================================================

/**
 * Coerce string to number with validation. Empty strings are rejected.
 */
export function coerceToNumber(value: unknown): number | null {
  if (typeof value === 'string' && value.trim() === '') {
    return null;
  }
  const result = z.coerce.number().finite().safeParse(value);
  return result.success ? result.data : null;
}

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format validation errors for display
 */
export function formatValidationErrors(error: ZodError): string {
  const messages = error.issues.map(issue => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return messages.join('\n');
}
