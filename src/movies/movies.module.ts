import { DynamicModule, Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { CatalogConfig } from '../config/catalog.config';
import { MoviesController } from './movies.controller';
import { StatisticsController } from './statistics.controller';

@Module({})
export class MoviesModule {
  static register(config: CatalogConfig): DynamicModule {
    return {
      module: MoviesModule,
      imports: [CatalogModule.register(config)],
      controllers: [MoviesController, StatisticsController],
    };
  }
}
