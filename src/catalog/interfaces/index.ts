import { Result } from 'neverthrow';
import { MovieNotFoundError } from '../domain/errors';
import { Movie } from '../domain/movie';

/** Injection token for the repository implementation chosen at start-up. */
export const MOVIE_REPOSITORY = Symbol('MOVIE_REPOSITORY');

/**
 * Storage contract for movies, independent of the storage technology.
 */
export interface MovieRepository {
  /** Inserts the movie or overwrites the one stored under the same id. */
  save(movie: Movie): Promise<Movie>;

  /**
   * Overwrites a stored movie. Never inserts: a movie deleted since it was
   * read stays deleted.
   */
  update(movie: Movie): Promise<Result<Movie, MovieNotFoundError>>;

  findById(id: string): Promise<Result<Movie, MovieNotFoundError>>;

  /** All movies in insertion order. */
  findAll(): Promise<Movie[]>;

  delete(id: string): Promise<Result<void, MovieNotFoundError>>;

  count(): Promise<number>;
}
