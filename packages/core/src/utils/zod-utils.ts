import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodSchema } from 'zod';

/**
 * Validates an input against a Zod schema and returns a neverthrow Result.
 */
export function fromZod<T>(schema: ZodSchema<T>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * Flatten zod issues into `path: message` strings, first `limit` only
 */
export function formatZodIssues(error: ZodError, limit = 5): string[] {
  return error.issues.slice(0, limit).map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
