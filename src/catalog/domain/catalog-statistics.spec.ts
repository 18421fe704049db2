import { computeStatistics, rankTags } from './catalog-statistics';
import { Movie, MovieInput } from './movie';

function movie(id: string, input: MovieInput): Movie {
  const result = Movie.create(id, input);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

const emptyHistogram = {
  '0': 0,
  '1': 0,
  '2': 0,
  '3': 0,
  '4': 0,
  '5': 0,
  '6': 0,
  '7': 0,
  '8': 0,
  '9': 0,
  '10': 0,
};

describe('computeStatistics', () => {
  it('uses null for the average of an empty catalog', () => {
    expect(computeStatistics([])).toEqual({
      count: 0,
      ratedCount: 0,
      averageRating: null,
      topTags: [],
      ratingHistogram: emptyHistogram,
      yearRange: null,
    });
  });

  it('uses null for the average when no movie is rated', () => {
    const stats = computeStatistics([
      movie('a', { title: 'Heat', year: 1995 }),
    ]);

    expect(stats.count).toBe(1);
    expect(stats.ratedCount).toBe(0);
    expect(stats.averageRating).toBeNull();
  });

  it('averages rated movies only and rounds to two decimals', () => {
    const stats = computeStatistics([
      movie('a', { title: 'The Matrix', year: 1999, rating: 9.0 }),
      movie('b', { title: 'Inception', year: 2010, rating: 8.8 }),
      movie('c', { title: 'Unrated Movie', year: 2023 }),
      movie('d', { title: 'Heat', year: 1995, rating: 7.25 }),
    ]);

    expect(stats.count).toBe(4);
    expect(stats.ratedCount).toBe(3);
    // (9.0 + 8.8 + 7.25) / 3 = 8.35
    expect(stats.averageRating).toBe(8.35);
    expect(stats.yearRange).toEqual({ earliest: 1995, latest: 2023 });
  });

  it('counts ratings in buckets rounded to the nearest integer', () => {
    const stats = computeStatistics([
      movie('a', { title: 'A', year: 2000, rating: 8.5 }),
      movie('b', { title: 'B', year: 2000, rating: 8.4 }),
      movie('c', { title: 'C', year: 2000, rating: 0 }),
      movie('d', { title: 'D', year: 2000, rating: 10 }),
      movie('e', { title: 'E', year: 2000, rating: 9.2 }),
    ]);

    expect(stats.ratingHistogram).toEqual({
      ...emptyHistogram,
      '0': 1,
      '8': 1,
      '9': 2,
      '10': 1,
    });
  });
});

describe('rankTags', () => {
  const movies = [
    movie('a', { title: 'A', year: 2000, tags: ['drama', 'crime'] }),
    movie('b', { title: 'B', year: 2000, tags: ['sci-fi', 'action'] }),
    movie('c', { title: 'C', year: 2000, tags: ['sci-fi', 'drama'] }),
    movie('d', { title: 'D', year: 2000, tags: ['crime', 'sci-fi'] }),
  ];

  it('ranks by frequency and breaks ties by tag', () => {
    expect(rankTags(movies, 10)).toEqual([
      { tag: 'sci-fi', count: 3 },
      { tag: 'crime', count: 2 },
      { tag: 'drama', count: 2 },
      { tag: 'action', count: 1 },
    ]);
  });

  it('limits the number of tags', () => {
    expect(rankTags(movies, 2)).toEqual([
      { tag: 'sci-fi', count: 3 },
      { tag: 'crime', count: 2 },
    ]);
    expect(rankTags(movies, 0)).toEqual([]);
  });
});
