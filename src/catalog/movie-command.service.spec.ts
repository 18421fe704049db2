import { MovieNotFoundError, ValidationError } from './domain/errors';
import { Movie, MovieInput } from './domain/movie';
import { MovieCommandService } from './movie-command.service';
import { InMemoryMovieRepository } from './repositories/in-memory-movie.repository';

const UUID_V4 =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

// deletes each movie right after handing it out, like a concurrent DELETE
class VanishingMovieRepository extends InMemoryMovieRepository {
  async findById(id: string) {
    const found = await super.findById(id);
    await this.delete(id);
    return found;
  }
}

const matrix: MovieInput = {
  title: 'The Matrix',
  year: 1999,
  description: 'Sci-fi classic',
  rating: 9.0,
  tags: ['sci-fi', 'action'],
};

describe('MovieCommandService', () => {
  let repository: InMemoryMovieRepository;
  let service: MovieCommandService;

  beforeEach(() => {
    repository = new InMemoryMovieRepository();
    service = new MovieCommandService(repository);
  });

  async function addMatrix(): Promise<Movie> {
    const added = await service.addMovie(matrix);
    if (added.isErr()) {
      throw added.error;
    }
    return added.value;
  }

  describe('addMovie', () => {
    it('stores the movie under a generated id', async () => {
      const movie = await addMatrix();

      expect(movie.id).toMatch(UUID_V4);
      const found = await repository.findById(movie.id);
      expect(found.isOk() && found.value).toBe(movie);
    });

    it('assigns a different id to every movie', async () => {
      const first = await addMatrix();
      const second = await addMatrix();

      expect(first.id).not.toBe(second.id);
      expect(await repository.count()).toBe(2);
    });

    it.each<{ name: string; input: MovieInput }>([
      { name: 'an empty title', input: { ...matrix, title: '' } },
      { name: 'a rating above 10', input: { ...matrix, rating: 10.5 } },
      { name: 'a negative rating', input: { ...matrix, rating: -1 } },
      { name: 'a year before 1888', input: { ...matrix, year: 1800 } },
    ])('rejects $name without storing anything', async ({ input }) => {
      const added = await service.addMovie(input);

      expect(added.isErr()).toBe(true);
      expect(added.isErr() && added.error).toBeInstanceOf(ValidationError);
      expect(await repository.count()).toBe(0);
    });
  });

  describe('updateMovie', () => {
    it('changes the given fields and keeps the others', async () => {
      const movie = await addMatrix();

      const updated = await service.updateMovie(movie.id, {
        description: 'Red pill or blue pill',
        tags: ['Cyberpunk'],
      });

      expect(updated.isOk()).toBe(true);
      const stored = await repository.findById(movie.id);
      expect(stored.isOk()).toBe(true);
      if (stored.isOk()) {
        expect(stored.value.title).toBe('The Matrix');
        expect(stored.value.year).toBe(1999);
        expect(stored.value.description).toBe('Red pill or blue pill');
        expect(stored.value.rating).toBe(9.0);
        expect(stored.value.tags).toEqual(['cyberpunk']);
      }
    });

    it('fails with MovieNotFoundError for an unknown id', async () => {
      const updated = await service.updateMovie('missing', {
        title: 'Anything',
      });

      expect(updated.isErr() && updated.error).toEqual(
        new MovieNotFoundError('missing'),
      );
    });

    it('keeps the stored movie when the change is invalid', async () => {
      const movie = await addMatrix();

      const updated = await service.updateMovie(movie.id, { rating: 11 });

      expect(updated.isErr() && updated.error).toBeInstanceOf(
        ValidationError,
      );
      const stored = await repository.findById(movie.id);
      expect(stored.isOk() && stored.value.rating).toBe(9.0);
    });
  });

  describe('rateMovie, addTag and removeTag', () => {
    it('rates and clears the rating', async () => {
      const movie = await addMatrix();

      const rated = await service.rateMovie(movie.id, 8.7);
      expect(rated.isOk() && rated.value.rating).toBe(8.7);

      const cleared = await service.rateMovie(movie.id, null);
      expect(cleared.isOk() && cleared.value.rating).toBeNull();
    });

    it('adds and removes tags on the stored movie', async () => {
      const movie = await addMatrix();

      await service.addTag(movie.id, 'Classic');
      await service.removeTag(movie.id, 'action');

      const stored = await repository.findById(movie.id);
      expect(stored.isOk() && stored.value.tags).toEqual([
        'sci-fi',
        'classic',
      ]);
    });

    it('reports unknown ids', async () => {
      expect((await service.rateMovie('missing', 5)).isErr()).toBe(true);
      expect((await service.addTag('missing', 'x')).isErr()).toBe(true);
      expect((await service.removeTag('missing', 'x')).isErr()).toBe(true);
    });

    it('does not bring back a movie deleted mid-change', async () => {
      const vanishing = new VanishingMovieRepository();
      const racing = new MovieCommandService(vanishing);
      const added = await racing.addMovie(matrix);
      const movie = added._unsafeUnwrap();

      const rated = await racing.rateMovie(movie.id, 5);

      expect(rated.isErr() && rated.error).toEqual(
        new MovieNotFoundError(movie.id),
      );
      expect(await vanishing.count()).toBe(0);
    });
  });

  describe('deleteMovie', () => {
    it('removes the movie and fails the second time', async () => {
      const movie = await addMatrix();

      const first = await service.deleteMovie(movie.id);
      const second = await service.deleteMovie(movie.id);

      expect(first.isOk() && first.value.title).toBe('The Matrix');
      expect(second.isErr() && second.error).toEqual(
        new MovieNotFoundError(movie.id),
      );
      expect((await repository.findById(movie.id)).isErr()).toBe(true);
    });
  });
});
