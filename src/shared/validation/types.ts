/**
 * Validation Types
 *
 * Type definitions for validation results and errors.
 */

/**
 * Validation error for a specific field
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Result of validation, carrying the parsed value when valid
 */
export type ValidationResult<T> =
  | { isValid: true; errors: ValidationError[]; data: T }
  | { isValid: false; errors: ValidationError[] };
