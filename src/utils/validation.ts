import type { ZodIssue, ZodTypeAny, z } from 'zod';
import { Result } from '../fp/Result';

/**
 * Input rejected by a zod schema. The message lists every issue as
 * `path: message`, joined with ", ".
 */
export class ValidationError extends Error {
  constructor(public readonly issues: readonly ZodIssue[]) {
    super(formatIssues(issues));
    this.name = 'ValidationError';
  }
}

export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join(', ');
}

/**
 * Parse `input` with `schema`, returning the parsed value as Ok or the
 * collected issues as Err. Never throws for invalid input.
 *
 * @example
 * ```typescript
 * const PortSchema = z.coerce.number().int().min(1).max(65535);
 * parseWith(PortSchema, "8080").unwrapOr(3456); // 8080
 * ```
 */
export function parseWith<S extends ZodTypeAny>(
  schema: S,
  input: unknown
): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return Result.ok<z.output<S>, ValidationError>(parsed.data);
  }
  return Result.err<z.output<S>, ValidationError>(new ValidationError(parsed.error.issues));
}
