import { z } from 'zod';
import { ValidationError } from '@/errors';

/**
 * Parse input with a zod schema or throw ValidationError with flattened details
 */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, result.error.flatten());
  }
  return result.data;
}

/**
 * Positive integer route parameter
 */
export function parseIdParam(value: string | undefined, label: string): number {
  const id = Number(value);
  if (!value || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${label}`);
  }
  return id;
}
