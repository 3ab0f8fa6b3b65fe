import { type ZodTypeAny, type output } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Parses `input`, handing the issues to `toError` when it does not fit. */
export function parseRequest<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
  toError: (issues: ValidationIssue[]) => Error,
): output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw toError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
}
