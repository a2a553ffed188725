/**
 * zod → ValidationFailedError
 */

import type { ZodError, ZodTypeAny, z } from 'zod';
import { ValidationFailedError, type FieldIssue } from './errors.js';

const ROOT_FIELD = '_root';

export function zodIssues(error: ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD,
    message: issue.message,
  }));
}

export function parseWith<T extends ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationFailedError(zodIssues(result.error));
  }
  return result.data;
}
