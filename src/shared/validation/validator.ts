/**
 * Validator Utilities
 *
 * Runs Zod schemas and reports field-level errors.
 */

import { z } from 'zod';
import { ValidationResult, ValidationError } from './types';
import { TailoringResponseSchema } from './schemas';
import { TailoringResult } from '../../types';

/**
 * Validate any value against a schema, collecting one error per failing path
 */
export function validateWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown
): ValidationResult<z.output<T>> {
  const result = schema.safeParse(value);

  if (result.success) {
    return { isValid: true, errors: [], data: result.data };
  }

  const errors: ValidationError[] = result.error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));

  return { isValid: false, errors };
}

/**
 * Validate the field types of a parsed tailoring response
 */
export function validateTailoringResponse(value: unknown): ValidationResult<TailoringResult> {
  return validateWithSchema(TailoringResponseSchema, value);
}
