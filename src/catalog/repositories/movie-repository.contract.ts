import { MovieNotFoundError } from '../domain/errors';
import { Movie, MovieInput } from '../domain/movie';
import { MovieRepository } from '../interfaces';

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
  description: 'Sci-fi classic',
  rating: 9.0,
  tags: ['sci-fi', 'action'],
});
const inception = movie('inception', {
  title: 'Inception',
  year: 2010,
  description: 'Dreams within dreams',
  rating: 8.8,
  tags: ['sci-fi', 'thriller'],
});
const unrated = movie('unrated', { title: 'Unrated Movie', year: 2023 });

/**
 * Behaviour every MovieRepository implementation has to share.
 */
export function describeMovieRepositoryContract(
  createRepository: () => Promise<MovieRepository>,
): void {
  let repository: MovieRepository;

  beforeEach(async () => {
    repository = await createRepository();
  });

  it('finds a saved movie by id with all its fields', async () => {
    await repository.save(matrix);

    const found = await repository.findById('matrix');

    expect(found.isOk()).toBe(true);
    if (found.isOk()) {
      expect(found.value.id).toBe('matrix');
      expect(found.value.title).toBe('The Matrix');
      expect(found.value.year).toBe(1999);
      expect(found.value.description).toBe('Sci-fi classic');
      expect(found.value.rating).toBe(9.0);
      expect(found.value.tags).toEqual(['sci-fi', 'action']);
    }
  });

  it('keeps a missing rating as null', async () => {
    await repository.save(unrated);

    const found = await repository.findById('unrated');

    expect(found.isOk() && found.value.rating).toBeNull();
  });

  it('fails with MovieNotFoundError for an unknown id', async () => {
    const found = await repository.findById('missing');

    expect(found.isErr()).toBe(true);
    if (found.isErr()) {
      expect(found.error).toBeInstanceOf(MovieNotFoundError);
      expect(found.error.movieId).toBe('missing');
    }
  });

  it('returns movies in insertion order', async () => {
    await repository.save(inception);
    await repository.save(matrix);
    await repository.save(unrated);

    const movies = await repository.findAll();

    expect(movies.map((m) => m.id)).toEqual([
      'inception',
      'matrix',
      'unrated',
    ]);
  });

  it('overwrites a movie saved under the same id in place', async () => {
    await repository.save(matrix);
    await repository.save(inception);
    const renamed = matrix.update({
      title: 'The Matrix (1999)',
      rating: 9.5,
    });
    if (renamed.isErr()) {
      throw renamed.error;
    }

    await repository.save(renamed.value);

    const movies = await repository.findAll();
    expect(movies.map((m) => m.id)).toEqual(['matrix', 'inception']);
    expect(movies[0].title).toBe('The Matrix (1999)');
    expect(movies[0].rating).toBe(9.5);
    expect(await repository.count()).toBe(2);
  });

  it('updates a stored movie in place', async () => {
    await repository.save(matrix);
    await repository.save(inception);
    const rated = matrix.rate(7.5);
    if (rated.isErr()) {
      throw rated.error;
    }

    const updated = await repository.update(rated.value);

    expect(updated.isOk()).toBe(true);
    const movies = await repository.findAll();
    expect(movies.map((m) => m.id)).toEqual(['matrix', 'inception']);
    expect(movies[0].rating).toBe(7.5);
    expect(movies[0].tags).toEqual(['sci-fi', 'action']);
  });

  it('does not insert a movie through update', async () => {
    await repository.save(matrix);
    await repository.delete('matrix');

    const updated = await repository.update(matrix);

    expect(updated.isErr() && updated.error).toEqual(
      new MovieNotFoundError('matrix'),
    );
    expect(await repository.count()).toBe(0);
  });

  it('deletes a movie and fails when deleting it again', async () => {
    await repository.save(matrix);

    const first = await repository.delete('matrix');
    const second = await repository.delete('matrix');

    expect(first.isOk()).toBe(true);
    expect(second.isErr()).toBe(true);
    expect((await repository.findById('matrix')).isErr()).toBe(true);
    expect(await repository.count()).toBe(0);
  });
}
