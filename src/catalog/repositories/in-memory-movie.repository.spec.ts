import { describeMovieRepositoryContract } from './movie-repository.contract';
import { InMemoryMovieRepository } from './in-memory-movie.repository';

describe('InMemoryMovieRepository', () => {
  describeMovieRepositoryContract(async () => new InMemoryMovieRepository());

  it('starts empty', async () => {
    const repository = new InMemoryMovieRepository();

    expect(await repository.findAll()).toEqual([]);
    expect(await repository.count()).toBe(0);
  });
});
