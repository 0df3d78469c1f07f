/**
 * Validator Utilities
 *
 * Schema validation helpers built on Zod.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/types';

export interface ValidationError {
  field: string;
  message: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Flatten Zod issues into field/message pairs
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.') || '(root)',
    message: err.message
  }));
}

/**
 * Validate data against a schema without throwing
 */
export function validate(schema: z.ZodTypeAny, data: unknown): ValidationResult {
  const result = schema.safeParse(data);

  if (result.success) {
    return {
      isValid: true,
      errors: []
    };
  }

  return {
    isValid: false,
    errors: toValidationErrors(result.error)
  };
}

/**
 * Parse input-file data, turning schema violations into a ConfigurationError
 * that names the file and each offending field
 */
export function parseInputFile<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const details = toValidationErrors(result.error)
    .map(e => `  - ${e.field}: ${e.message}`)
    .join('\n');
  throw new ConfigurationError(`Invalid file ${source}:\n${details}`, { source });
}
