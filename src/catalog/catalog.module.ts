import { DynamicModule, Module, Type } from '@nestjs/common';
import { CatalogConfig } from '../config/catalog.config';
import { DatabaseModule } from '../database/database.module';
import { MOVIE_REPOSITORY, MovieRepository } from './interfaces';
import { MovieCommandService } from './movie-command.service';
import { MovieQueryService } from './movie-query.service';
import { InMemoryMovieRepository } from './repositories/in-memory-movie.repository';
import { TypeOrmMovieRepository } from './repositories/typeorm-movie.repository';

/**
 * Wires one repository instance, picked from configuration, into both services.
 * Nest providers are singletons, so the command and query sides share it for
 * the lifetime of the process.
 */
@Module({})
export class CatalogModule {
  static register(config: CatalogConfig): DynamicModule {
    const repository: Type<MovieRepository> =
      config.storage === 'database'
        ? TypeOrmMovieRepository
        : InMemoryMovieRepository;

    return {
      module: CatalogModule,
      imports:
        config.storage === 'database'
          ? [DatabaseModule.forRoot(config.database)]
          : [],
      providers: [
        { provide: MOVIE_REPOSITORY, useClass: repository },
        MovieCommandService,
        MovieQueryService,
      ],
      exports: [MovieCommandService, MovieQueryService],
    };
  }
}
