/**
 * Request validation helpers
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Parse input against a schema, raising ValidationError for the first failing field
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (!issue) {
    throw new ValidationError('Invalid request');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;
  throw new ValidationError(issue.message, field);
}

/**
 * Require a non-blank string argument, returning it trimmed
 */
export function requireText(value: unknown, field: string, label: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${label} cannot be null or empty`, field);
  }
  return value.trim();
}
