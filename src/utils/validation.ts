/**
 * Validation helper utilities
 *
 * Provides consistent validation and error handling for caller input
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../types/errors';

/**
 * Validates data against a Zod schema
 *
 * @param context - Names the validated value in the error message
 * @throws InvalidArgumentError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const message = context
    ? `Validation failed for ${context}: ${formatZodError(result.error)}`
    : `Validation failed: ${formatZodError(result.error)}`;

  throw new InvalidArgumentError(message, result.error.errors, {
    validationErrors: result.error.errors,
  });
}

/**
 * Formats Zod validation errors into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join('; ');
}
