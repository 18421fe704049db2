import { err, ok, Result } from 'neverthrow';
import { FieldIssue, ValidationError } from './errors';

export const FIRST_FILM_YEAR = 1888;
export const FUTURE_YEAR_ALLOWANCE = 10;
export const MIN_RATING = 0;
export const MAX_RATING = 10;

export interface MovieInput {
  title: string;
  year: number;
  description?: string;
  rating?: number | null;
  tags?: readonly string[];
}

/**
 * Partial set of changes applied on top of a stored movie.
 * `undefined` keeps the current value, `rating: null` clears the rating.
 */
export type MovieChanges = Partial<MovieInput>;

export function latestAllowedYear(now: Date = new Date()): number {
  return now.getFullYear() + FUTURE_YEAR_ALLOWANCE;
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Trims and lower-cases tags, drops blanks and keeps the first occurrence of
 * duplicates.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) {
      unique.add(normalized);
    }
  }
  return [...unique];
}

export function isValidRating(rating: number): boolean {
  return (
    Number.isFinite(rating) && rating >= MIN_RATING && rating <= MAX_RATING
  );
}

function validateMovieInput(id: string, input: MovieInput): FieldIssue[] {
  const issues: FieldIssue[] = [];

  if (!id.trim()) {
    issues.push({ field: 'id', message: 'must not be empty' });
  }

  if (!input.title.trim()) {
    issues.push({ field: 'title', message: 'must not be empty' });
  }

  const latestYear = latestAllowedYear();
  if (!Number.isInteger(input.year)) {
    issues.push({ field: 'year', message: 'must be a whole number' });
  } else if (input.year < FIRST_FILM_YEAR) {
    issues.push({
      field: 'year',
      message: `must not be earlier than ${FIRST_FILM_YEAR}`,
    });
  } else if (input.year > latestYear) {
    issues.push({
      field: 'year',
      message: `must not be later than ${latestYear}`,
    });
  }

  if (
    input.rating !== undefined &&
    input.rating !== null &&
    !isValidRating(input.rating)
  ) {
    issues.push({
      field: 'rating',
      message: `must be between ${MIN_RATING} and ${MAX_RATING}`,
    });
  }

  return issues;
}

export class Movie {
  private constructor(
    readonly id: string,
    readonly title: string,
    readonly year: number,
    readonly description: string,
    readonly rating: number | null,
    readonly tags: readonly string[],
  ) {}

  /**
   * Validates every field and reports all failures at once.
   */
  static create(id: string, input: MovieInput): Result<Movie, ValidationError> {
    const issues = validateMovieInput(id, input);
    if (issues.length > 0) {
      return err(new ValidationError(issues));
    }

    return ok(
      new Movie(
        id,
        input.title.trim(),
        input.year,
        input.description ?? '',
        input.rating ?? null,
        normalizeTags(input.tags ?? []),
      ),
    );
  }

  update(changes: MovieChanges): Result<Movie, ValidationError> {
    return Movie.create(this.id, {
      title: changes.title ?? this.title,
      year: changes.year ?? this.year,
      description: changes.description ?? this.description,
      rating: changes.rating === undefined ? this.rating : changes.rating,
      tags: changes.tags ?? this.tags,
    });
  }

  rate(rating: number | null): Result<Movie, ValidationError> {
    return this.update({ rating });
  }

  addTag(tag: string): Result<Movie, ValidationError> {
    return this.update({ tags: [...this.tags, tag] });
  }

  removeTag(tag: string): Result<Movie, ValidationError> {
    const removed = normalizeTag(tag);
    return this.update({
      tags: this.tags.filter((existing) => existing !== removed),
    });
  }

  hasTag(tag: string): boolean {
    return this.tags.includes(normalizeTag(tag));
  }

  equals(other: Movie): boolean {
    return this.id === other.id;
  }
}
