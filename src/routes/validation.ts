import type { Response } from 'express';
import type { z } from 'zod';

type Issue = { path?: string; message: string };

const toIssues = (error: z.ZodError): Issue[] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.') || undefined,
    message: issue.message,
  }));

/** Parses `input` or answers 400 with the issue list and returns undefined. */
export const parseOrReject = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  res: Response,
): z.infer<S> | undefined => {
  const validation = schema.safeParse(input);

  if (!validation.success) {
    res.status(400).json({ errors: toIssues(validation.error) });
    return undefined;
  }

  return validation.data;
};
