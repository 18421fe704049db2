import { Inject, Injectable, Logger } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';
import { MovieNotFoundError, ValidationError } from './domain/errors';
import { Movie, MovieChanges, MovieInput } from './domain/movie';
import { MOVIE_REPOSITORY, MovieRepository } from './interfaces';

export type MovieUpdateResult = Result<
  Movie,
  ValidationError | MovieNotFoundError
>;

@Injectable()
export class MovieCommandService {
  private readonly logger = new Logger(MovieCommandService.name);

  constructor(
    @Inject(MOVIE_REPOSITORY)
    private readonly movieRepository: MovieRepository,
  ) {}

  /**
   * Validate the input, assign a fresh identifier and store the movie
   */
  async addMovie(input: MovieInput): Promise<Result<Movie, ValidationError>> {
    const created = Movie.create(uuidv4(), input);
    if (created.isErr()) {
      this.logger.warn(`Rejected new movie: ${created.error.message}`);
      return err(created.error);
    }

    const movie = await this.movieRepository.save(created.value);
    this.logger.log(`Added movie: ${movie.title} (${movie.id})`);
    return ok(movie);
  }

  async updateMovie(
    id: string,
    changes: MovieChanges,
  ): Promise<MovieUpdateResult> {
    return this.modify(id, 'Updated', (movie) => movie.update(changes));
  }

  async rateMovie(
    id: string,
    rating: number | null,
  ): Promise<MovieUpdateResult> {
    return this.modify(id, 'Rated', (movie) => movie.rate(rating));
  }

  async addTag(id: string, tag: string): Promise<MovieUpdateResult> {
    return this.modify(id, 'Tagged', (movie) => movie.addTag(tag));
  }

  async removeTag(id: string, tag: string): Promise<MovieUpdateResult> {
    return this.modify(id, 'Untagged', (movie) => movie.removeTag(tag));
  }

  /**
   * Remove the movie and hand back what was removed
   */
  async deleteMovie(id: string): Promise<Result<Movie, MovieNotFoundError>> {
    const found = await this.movieRepository.findById(id);
    if (found.isErr()) {
      return err(found.error);
    }

    const deleted = await this.movieRepository.delete(id);
    if (deleted.isErr()) {
      return err(deleted.error);
    }

    this.logger.log(`Deleted movie: ${found.value.title} (${id})`);
    return ok(found.value);
  }

  /**
   * Load, change through the entity (which re-validates) and write back over
   * the stored row
   */
  private async modify(
    id: string,
    action: string,
    change: (movie: Movie) => Result<Movie, ValidationError>,
  ): Promise<MovieUpdateResult> {
    const found = await this.movieRepository.findById(id);
    if (found.isErr()) {
      this.logger.warn(`Cannot change movie: ${found.error.message}`);
      return err(found.error);
    }

    const changed = change(found.value);
    if (changed.isErr()) {
      this.logger.warn(
        `Rejected change to movie ${id}: ${changed.error.message}`,
      );
      return err(changed.error);
    }

    const updated = await this.movieRepository.update(changed.value);
    if (updated.isErr()) {
      this.logger.warn(`Cannot change movie: ${updated.error.message}`);
      return err(updated.error);
    }

    const movie = updated.value;
    this.logger.log(`${action} movie: ${movie.title} (${movie.id})`);
    return ok(movie);
  }
}
