import { MAX_RATING, MIN_RATING, Movie } from './movie';

export const DEFAULT_TOP_TAG_LIMIT = 5;

export interface TagCount {
  tag: string;
  count: number;
}

/** Bucket label ("0" to "10") mapped to the number of movies rounded in. */
export type RatingHistogram = Record<string, number>;

export interface CatalogStatistics {
  count: number;
  ratedCount: number;
  /** `null` when no movie in the catalog has a rating. */
  averageRating: number | null;
  topTags: TagCount[];
  ratingHistogram: RatingHistogram;
  yearRange: { earliest: number; latest: number } | null;
}

function emptyHistogram(): RatingHistogram {
  const histogram: RatingHistogram = {};
  for (let bucket = MIN_RATING; bucket <= MAX_RATING; bucket++) {
    histogram[String(bucket)] = 0;
  }
  return histogram;
}

function roundToHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}

export function rankTags(movies: readonly Movie[], limit: number): TagCount[] {
  const counts = new Map<string, number>();
  for (const movie of movies) {
    for (const tag of movie.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .map(([tag, count]) => ({ tag, count }))
    .sort(
      (a, b) =>
        b.count - a.count || (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0),
    )
    .slice(0, Math.max(0, limit));
}

export function computeStatistics(
  movies: readonly Movie[],
  topTagLimit: number = DEFAULT_TOP_TAG_LIMIT,
): CatalogStatistics {
  const ratingHistogram = emptyHistogram();
  let ratedCount = 0;
  let ratingTotal = 0;
  let yearRange: CatalogStatistics['yearRange'] = null;

  for (const movie of movies) {
    if (movie.rating !== null) {
      ratedCount++;
      ratingTotal += movie.rating;
      // Math.round sends x.5 up
      ratingHistogram[String(Math.round(movie.rating))]++;
    }

    yearRange = yearRange
      ? {
          earliest: Math.min(yearRange.earliest, movie.year),
          latest: Math.max(yearRange.latest, movie.year),
        }
      : { earliest: movie.year, latest: movie.year };
  }

  return {
    count: movies.length,
    ratedCount,
    averageRating:
      ratedCount > 0 ? roundToHundredths(ratingTotal / ratedCount) : null,
    topTags: rankTags(movies, topTagLimit),
    ratingHistogram,
    yearRange,
  };
}
