import { z } from "zod";

export interface ValidationIssue {
  field: string;
  message: string;
}

export class MatchingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed top-level input. Raised before any provider is scored,
 * with one issue per offending field.
 */
export class MatchValidationError extends MatchingError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], message?: string) {
    super(message ?? `Invalid match request: ${issues.map(formatIssue).join("; ")}`);
    this.issues = issues;
  }

  get fields(): string[] {
    return Array.from(new Set(this.issues.map((issue) => issue.field)));
  }
}

export class InvalidArgumentError extends MatchValidationError {
  constructor(field: string, message: string) {
    super([{ field, message }], `Invalid argument ${field}: ${message}`);
  }
}

export class WeightConfigurationError extends MatchValidationError {
  constructor(issues: ValidationIssue[]) {
    super(issues, `Invalid weight configuration: ${issues.map(formatIssue).join("; ")}`);
  }
}

export class MatchCancelledError extends MatchingError {
  readonly scoredCount: number;

  constructor(scoredCount: number) {
    super(`Matching batch cancelled after scoring ${scoredCount} provider(s)`);
    this.scoredCount = scoredCount;
  }
}

export function toValidationIssues(error: z.ZodError, prefix?: string): ValidationIssue[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String);
    const segments = prefix ? [prefix, ...path] : path;
    return {
      field: segments.length > 0 ? segments.join(".") : "(root)",
      message: issue.message,
    };
  });
}

export function fromZodError(error: z.ZodError, prefix?: string): MatchValidationError {
  return new MatchValidationError(toValidationIssues(error, prefix));
}

function formatIssue(issue: ValidationIssue): string {
  return `${issue.field}: ${issue.message}`;
}
