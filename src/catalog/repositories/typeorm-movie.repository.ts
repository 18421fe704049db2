import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { err, ok, Result } from 'neverthrow';
import { Repository } from 'typeorm';
import { MovieRecord } from '../../database/entities/movie.entity';
import { MovieNotFoundError } from '../domain/errors';
import { Movie } from '../domain/movie';
import { MovieRepository } from '../interfaces';

@Injectable()
export class TypeOrmMovieRepository implements MovieRepository {
  private readonly logger = new Logger(TypeOrmMovieRepository.name);

  constructor(
    @InjectRepository(MovieRecord)
    private readonly movieRecords: Repository<MovieRecord>,
  ) {}

  async save(movie: Movie): Promise<Movie> {
    const record = (await this.findRecord(movie.id)) ?? new MovieRecord();

    record.movieUid = movie.id;
    Object.assign(record, this.toColumns(movie));

    await this.movieRecords.save(record);
    return movie;
  }

  /**
   * A single UPDATE, so a row deleted after the movie was read is reported
   * as missing instead of being inserted again.
   */
  async update(movie: Movie): Promise<Result<Movie, MovieNotFoundError>> {
    const { affected } = await this.movieRecords.update(
      { movieUid: movie.id },
      this.toColumns(movie),
    );
    return affected ? ok(movie) : err(new MovieNotFoundError(movie.id));
  }

  async findById(id: string): Promise<Result<Movie, MovieNotFoundError>> {
    const record = await this.findRecord(id);
    return record ? ok(this.toMovie(record)) : err(new MovieNotFoundError(id));
  }

  async findAll(): Promise<Movie[]> {
    const records = await this.movieRecords.find({ order: { id: 'ASC' } });
    return records.map((record) => this.toMovie(record));
  }

  async delete(id: string): Promise<Result<void, MovieNotFoundError>> {
    const record = await this.findRecord(id);
    if (!record) {
      return err(new MovieNotFoundError(id));
    }

    await this.movieRecords.remove(record);
    return ok(undefined);
  }

  async count(): Promise<number> {
    return await this.movieRecords.count();
  }

  private toColumns(
    movie: Movie,
  ): Pick<
    MovieRecord,
    'title' | 'releaseYear' | 'description' | 'rating' | 'tags'
  > {
    return {
      title: movie.title,
      releaseYear: movie.year,
      description: movie.description,
      rating: movie.rating,
      tags: [...movie.tags],
    };
  }

  private async findRecord(movieUid: string): Promise<MovieRecord | null> {
    return await this.movieRecords.findOne({ where: { movieUid } });
  }

  /**
   * Rows are written from validated movies, so a row that fails validation
   * means the table was changed behind the catalog's back.
   */
  private toMovie(record: MovieRecord): Movie {
    const restored = Movie.create(record.movieUid, {
      title: record.title,
      year: record.releaseYear,
      description: record.description,
      rating: record.rating,
      tags: record.tags,
    });

    if (restored.isErr()) {
      this.logger.error(
        `Stored movie ${record.movieUid} is invalid: ${restored.error.message}`,
      );
      throw restored.error;
    }
    return restored.value;
  }
}
