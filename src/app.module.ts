import { DynamicModule, Module } from '@nestjs/common';
import { CatalogConfig } from './config/catalog.config';
import { MoviesModule } from './movies/movies.module';

@Module({})
export class AppModule {
  static register(config: CatalogConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [MoviesModule.register(config)],
    };
  }
}
