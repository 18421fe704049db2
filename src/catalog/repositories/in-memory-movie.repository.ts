import { Injectable } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import { MovieNotFoundError } from '../domain/errors';
import { Movie } from '../domain/movie';
import { MovieRepository } from '../interfaces';

/**
 * Process-local store. Contents are lost when the process exits.
 */
@Injectable()
export class InMemoryMovieRepository implements MovieRepository {
  // Map keeps insertion order, also when an existing key is overwritten
  private readonly movies = new Map<string, Movie>();

  async save(movie: Movie): Promise<Movie> {
    this.movies.set(movie.id, movie);
    return movie;
  }

  async update(movie: Movie): Promise<Result<Movie, MovieNotFoundError>> {
    if (!this.movies.has(movie.id)) {
      return err(new MovieNotFoundError(movie.id));
    }
    this.movies.set(movie.id, movie);
    return ok(movie);
  }

  async findById(id: string): Promise<Result<Movie, MovieNotFoundError>> {
    const movie = this.movies.get(id);
    return movie ? ok(movie) : err(new MovieNotFoundError(id));
  }

  async findAll(): Promise<Movie[]> {
    return [...this.movies.values()];
  }

  async delete(id: string): Promise<Result<void, MovieNotFoundError>> {
    if (!this.movies.delete(id)) {
      return err(new MovieNotFoundError(id));
    }
    return ok(undefined);
  }

  async count(): Promise<number> {
    return this.movies.size;
  }
}
