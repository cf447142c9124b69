import { z } from 'zod';
import { SchemaError, type SchemaIssue } from './errors.js';

function issuePath(path: (string | number)[]): string {
  return path.length === 0 ? '(root)' : path.join('.');
}

export function toSchemaIssues(issues: z.ZodIssue[]): SchemaIssue[] {
  return issues.map((issue) => ({ path: issuePath(issue.path), message: issue.message }));
}

/**
 * Validates an untrusted value against a Zod schema.
 * Returns the parsed data on success, or a SchemaError listing every issue.
 */
export function validateWith<T extends z.ZodType>(
  schema: T,
  value: unknown,
): { success: true; data: z.output<T> } | { success: false; error: SchemaError } {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { success: false, error: new SchemaError(toSchemaIssues(result.error.issues)) };
  }
  return { success: true, data: result.data };
}
