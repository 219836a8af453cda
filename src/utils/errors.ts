import { ZodError } from "zod";

export interface InputIssue {
  path: string;
  message: string;
}

/**
 * Thrown when projection input fails a precondition.
 * Carries every failed precondition so the boundary can build a 4xx response.
 */
export class InvalidProjectionInputError extends Error {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    super(
      `Invalid projection input: ${issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ")}`
    );
    this.name = "InvalidProjectionInputError";
    this.issues = issues;
  }

  static fromZodError(error: ZodError): InvalidProjectionInputError {
    return new InvalidProjectionInputError(
      error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
}

export function isInvalidInputError(error: unknown): error is InvalidProjectionInputError {
  return error instanceof InvalidProjectionInputError;
}
