import { err, ok, Result } from 'neverthrow';
import { FieldIssue, InvalidFilterError } from './errors';
import {
  MAX_RATING,
  MIN_RATING,
  Movie,
  isValidRating,
  normalizeTags,
} from './movie';

export const MOVIE_SORT_FIELDS = ['title', 'year', 'rating'] as const;
export const SORT_ORDERS = ['asc', 'desc'] as const;

export type MovieSortField = (typeof MOVIE_SORT_FIELDS)[number];
export type SortOrder = (typeof SORT_ORDERS)[number];

export interface MovieFilter {
  titleContains?: string;
  year?: number;
  yearFrom?: number;
  yearTo?: number;
  minRating?: number;
  maxRating?: number;
  /** Every listed tag must be present on the movie. */
  tags?: readonly string[];
  sortBy?: MovieSortField;
  order?: SortOrder;
}

function checkRatingBound(
  field: 'minRating' | 'maxRating',
  value: number | undefined,
  issues: FieldIssue[],
): void {
  if (value !== undefined && !isValidRating(value)) {
    issues.push({
      field,
      message: `must be between ${MIN_RATING} and ${MAX_RATING}`,
    });
  }
}

function checkYear(
  field: 'year' | 'yearFrom' | 'yearTo',
  value: number | undefined,
  issues: FieldIssue[],
): void {
  if (value !== undefined && !Number.isInteger(value)) {
    issues.push({ field, message: 'must be a whole number' });
  }
}

/**
 * Checks the filter for out-of-range or contradictory options and returns a
 * normalized copy (trimmed title fragment, normalized tags).
 */
export function validateFilter(
  filter: MovieFilter,
): Result<MovieFilter, InvalidFilterError> {
  const issues: FieldIssue[] = [];

  checkRatingBound('minRating', filter.minRating, issues);
  checkRatingBound('maxRating', filter.maxRating, issues);
  if (
    filter.minRating !== undefined &&
    filter.maxRating !== undefined &&
    filter.minRating > filter.maxRating
  ) {
    issues.push({ field: 'minRating', message: 'must not exceed maxRating' });
  }

  checkYear('year', filter.year, issues);
  checkYear('yearFrom', filter.yearFrom, issues);
  checkYear('yearTo', filter.yearTo, issues);
  if (
    filter.yearFrom !== undefined &&
    filter.yearTo !== undefined &&
    filter.yearFrom > filter.yearTo
  ) {
    issues.push({ field: 'yearFrom', message: 'must not exceed yearTo' });
  }

  if (issues.length > 0) {
    return err(new InvalidFilterError(issues));
  }

  const titleContains = filter.titleContains?.trim();
  return ok({
    ...filter,
    titleContains: titleContains ? titleContains : undefined,
    tags: filter.tags ? normalizeTags(filter.tags) : undefined,
  });
}

export function matchesFilter(movie: Movie, filter: MovieFilter): boolean {
  if (
    filter.titleContains !== undefined &&
    !movie.title.toLowerCase().includes(filter.titleContains.toLowerCase())
  ) {
    return false;
  }

  if (filter.year !== undefined && movie.year !== filter.year) {
    return false;
  }
  if (filter.yearFrom !== undefined && movie.year < filter.yearFrom) {
    return false;
  }
  if (filter.yearTo !== undefined && movie.year > filter.yearTo) {
    return false;
  }

  // unrated movies never satisfy a rating bound
  if (
    filter.minRating !== undefined &&
    (movie.rating === null || movie.rating < filter.minRating)
  ) {
    return false;
  }
  if (
    filter.maxRating !== undefined &&
    (movie.rating === null || movie.rating > filter.maxRating)
  ) {
    return false;
  }

  if (filter.tags && !filter.tags.every((tag) => movie.hasTag(tag))) {
    return false;
  }

  return true;
}

function compareBy(field: MovieSortField, a: Movie, b: Movie): number {
  switch (field) {
    case 'title':
      return a.title.localeCompare(b.title, 'en', { sensitivity: 'base' });
    case 'year':
      return a.year - b.year;
    case 'rating':
      // callers keep unrated movies out of this comparison
      return (a.rating ?? 0) - (b.rating ?? 0);
  }
}

/**
 * Stable sort; unrated movies go last whichever the order when sorting by
 * rating.
 */
export function sortMovies(
  movies: readonly Movie[],
  field: MovieSortField,
  order: SortOrder = 'asc',
): Movie[] {
  const direction = order === 'asc' ? 1 : -1;

  return [...movies].sort((a, b) => {
    if (field === 'rating' && (a.rating === null || b.rating === null)) {
      if (a.rating === b.rating) {
        return 0;
      }
      return a.rating === null ? 1 : -1;
    }
    return direction * compareBy(field, a, b);
  });
}
