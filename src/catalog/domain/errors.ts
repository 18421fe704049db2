export interface FieldIssue {
  field: string;
  message: string;
}

function describeIssues(issues: readonly FieldIssue[]): string {
  return issues.map((issue) => `${issue.field} ${issue.message}`).join('; ');
}

/**
 * One or more movie fields failed validation on create or update.
 */
export class ValidationError extends Error {
  readonly kind = 'validation';

  constructor(readonly issues: FieldIssue[]) {
    super(`Invalid movie: ${describeIssues(issues)}`);
    this.name = 'ValidationError';
  }
}

export class MovieNotFoundError extends Error {
  readonly kind = 'not-found';

  constructor(readonly movieId: string) {
    super(`Movie ${movieId} not found`);
    this.name = 'MovieNotFoundError';
  }
}

/**
 * Filter options that contradict themselves or fall outside the rating scale.
 */
export class InvalidFilterError extends Error {
  readonly kind = 'invalid-filter';

  constructor(readonly issues: FieldIssue[]) {
    super(`Invalid filter: ${describeIssues(issues)}`);
    this.name = 'InvalidFilterError';
  }
}

export type CatalogError =
  | ValidationError
  | MovieNotFoundError
  | InvalidFilterError;
