import { InvalidFilterError } from './errors';
import { Movie, MovieInput } from './movie';
import {
  MovieFilter,
  matchesFilter,
  sortMovies,
  validateFilter,
} from './movie-filter';

function movie(id: string, input: MovieInput): Movie {
  const result = Movie.create(id, input);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

const matrix = movie('matrix', {
  title: 'The Matrix',
  year: 1999,
  rating: 9.0,
  tags: ['sci-fi', 'action'],
});
const inception = movie('inception', {
  title: 'Inception',
  year: 2010,
  rating: 8.8,
  tags: ['sci-fi', 'thriller'],
});
const amelie = movie('amelie', {
  title: 'Amélie',
  year: 2001,
  rating: 7.9,
  tags: ['romance'],
});
const unrated = movie('unrated', {
  title: 'Unrated Movie',
  year: 2023,
  tags: ['mystery'],
});

const catalog = [matrix, inception, amelie, unrated];

function select(filter: MovieFilter): string[] {
  const validated = validateFilter(filter);
  if (validated.isErr()) {
    throw validated.error;
  }
  return catalog
    .filter((m) => matchesFilter(m, validated.value))
    .map((m) => m.id);
}

function filterIssues(filter: MovieFilter): InvalidFilterError['issues'] {
  const validated = validateFilter(filter);
  if (validated.isOk()) {
    throw new Error('expected the filter to be rejected');
  }
  return validated.error.issues;
}

describe('validateFilter', () => {
  it('accepts an empty filter', () => {
    expect(validateFilter({}).isOk()).toBe(true);
  });

  it('normalizes tags and the title fragment', () => {
    const validated = validateFilter({
      titleContains: '  matrix ',
      tags: [' Sci-Fi ', 'sci-fi'],
    });

    expect(validated.isOk()).toBe(true);
    if (validated.isOk()) {
      expect(validated.value.titleContains).toBe('matrix');
      expect(validated.value.tags).toEqual(['sci-fi']);
    }
  });

  it('rejects rating bounds outside the scale', () => {
    expect(filterIssues({ minRating: -1, maxRating: 11 })).toEqual([
      { field: 'minRating', message: 'must be between 0 and 10' },
      { field: 'maxRating', message: 'must be between 0 and 10' },
    ]);
  });

  it('rejects a minimum rating above the maximum', () => {
    expect(filterIssues({ minRating: 8, maxRating: 5 })).toEqual([
      { field: 'minRating', message: 'must not exceed maxRating' },
    ]);
  });

  it('rejects an inverted or fractional year range', () => {
    expect(filterIssues({ yearFrom: 2010, yearTo: 1999 })).toEqual([
      { field: 'yearFrom', message: 'must not exceed yearTo' },
    ]);
    expect(filterIssues({ year: 1999.5 })).toEqual([
      { field: 'year', message: 'must be a whole number' },
    ]);
  });

  it('describes the problem in the error message', () => {
    const validated = validateFilter({ minRating: 12 });

    expect(validated.isErr() && validated.error.message).toBe(
      'Invalid filter: minRating must be between 0 and 10',
    );
  });
});

describe('matchesFilter', () => {
  it('keeps every movie without criteria', () => {
    expect(select({})).toEqual(['matrix', 'inception', 'amelie', 'unrated']);
  });

  it('requires every listed tag', () => {
    expect(select({ tags: ['sci-fi'] })).toEqual(['matrix', 'inception']);
    expect(select({ tags: ['sci-fi', 'thriller'] })).toEqual(['inception']);
    expect(select({ tags: ['SCI-FI', 'western'] })).toEqual([]);
  });

  it('excludes unrated movies and lower ratings for a minimum rating', () => {
    expect(select({ minRating: 8.0 })).toEqual(['matrix', 'inception']);
  });

  it('excludes unrated movies for a maximum rating', () => {
    expect(select({ maxRating: 8.8 })).toEqual(['inception', 'amelie']);
  });

  it('matches the title fragment ignoring case', () => {
    expect(select({ titleContains: 'MATRIX' })).toEqual(['matrix']);
    expect(select({ titleContains: 'in' })).toEqual(['inception']);
  });

  it('matches an exact year and inclusive year bounds', () => {
    expect(select({ year: 2001 })).toEqual(['amelie']);
    expect(select({ yearFrom: 2001, yearTo: 2010 })).toEqual([
      'inception',
      'amelie',
    ]);
    expect(select({ yearTo: 2000 })).toEqual(['matrix']);
  });

  it('combines criteria', () => {
    expect(
      select({ tags: ['sci-fi'], minRating: 8.5, yearFrom: 2000 }),
    ).toEqual(['inception']);
  });
});

describe('sortMovies', () => {
  it('sorts by title ignoring accents and case', () => {
    expect(sortMovies(catalog, 'title').map((m) => m.id)).toEqual([
      'amelie',
      'inception',
      'matrix',
      'unrated',
    ]);
  });

  it('sorts by year in either direction', () => {
    expect(sortMovies(catalog, 'year', 'desc').map((m) => m.id)).toEqual([
      'unrated',
      'inception',
      'amelie',
      'matrix',
    ]);
  });

  it('puts unrated movies last whichever the order', () => {
    expect(sortMovies(catalog, 'rating').map((m) => m.id)).toEqual([
      'amelie',
      'inception',
      'matrix',
      'unrated',
    ]);
    expect(sortMovies(catalog, 'rating', 'desc').map((m) => m.id)).toEqual([
      'matrix',
      'inception',
      'amelie',
      'unrated',
    ]);
  });

  it('leaves the input untouched', () => {
    sortMovies(catalog, 'year');

    expect(catalog.map((m) => m.id)).toEqual([
      'matrix',
      'inception',
      'amelie',
      'unrated',
    ]);
  });
});
