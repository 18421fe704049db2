import { Inject, Injectable, Logger } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import {
  CatalogStatistics,
  DEFAULT_TOP_TAG_LIMIT,
  computeStatistics,
} from './domain/catalog-statistics';
import { InvalidFilterError, MovieNotFoundError } from './domain/errors';
import { Movie } from './domain/movie';
import {
  MovieFilter,
  matchesFilter,
  sortMovies,
  validateFilter,
} from './domain/movie-filter';
import { MOVIE_REPOSITORY, MovieRepository } from './interfaces';

/**
 * Read-only access to the catalog. Every call works on the repository's
 * current snapshot; empty results are returned, never reported as failures.
 */
@Injectable()
export class MovieQueryService {
  private readonly logger = new Logger(MovieQueryService.name);

  constructor(
    @Inject(MOVIE_REPOSITORY)
    private readonly movieRepository: MovieRepository,
  ) {}

  async listMovies(
    filter: MovieFilter = {},
  ): Promise<Result<Movie[], InvalidFilterError>> {
    const validated = validateFilter(filter);
    if (validated.isErr()) {
      this.logger.warn(validated.error.message);
      return err(validated.error);
    }

    const criteria = validated.value;
    const movies = (await this.movieRepository.findAll()).filter((movie) =>
      matchesFilter(movie, criteria),
    );

    return ok(
      criteria.sortBy
        ? sortMovies(movies, criteria.sortBy, criteria.order)
        : movies,
    );
  }

  async searchByTitle(query: string): Promise<Movie[]> {
    const fragment = query.trim().toLowerCase();
    const movies = await this.movieRepository.findAll();
    return movies.filter((movie) =>
      movie.title.toLowerCase().includes(fragment),
    );
  }

  async getMovie(id: string): Promise<Result<Movie, MovieNotFoundError>> {
    return this.movieRepository.findById(id);
  }

  async countMovies(): Promise<number> {
    return this.movieRepository.count();
  }

  async getStatistics(
    topTagLimit: number = DEFAULT_TOP_TAG_LIMIT,
  ): Promise<CatalogStatistics> {
    const movies = await this.movieRepository.findAll();
    return computeStatistics(movies, topTagLimit);
  }
}
