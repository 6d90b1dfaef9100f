import type { z } from 'zod';

export type DecodeIssue = {
  path: (string | number)[];
  message: string;
};

const formatIssue = (issue: DecodeIssue): string =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

/**
 * A document could not be turned back into a value: malformed JSON, a missing or
 * unknown `$result` discriminator, or a payload its schema rejects.
 */
export class ResultDecodeError extends Error {
  constructor(
    public readonly issues: DecodeIssue[],
    options?: { cause?: unknown },
  ) {
    super(`Invalid Result document: ${issues.map(formatIssue).join('; ')}`, options);
    this.name = 'ResultDecodeError';
  }

  static fromZodError(error: z.ZodError): ResultDecodeError {
    const issues = error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
    return new ResultDecodeError(issues, { cause: error });
  }
}
