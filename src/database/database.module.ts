import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseConfig } from '../config/catalog.config';
import { MovieRecord } from './entities/movie.entity';

export function toTypeOrmOptions(config: DatabaseConfig): TypeOrmModuleOptions {
  if (config.type === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: config.database,
      entities: [MovieRecord],
      synchronize: config.synchronize,
    };
  }

  return {
    type: 'postgres',
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.database,
    entities: [MovieRecord],
    synchronize: config.synchronize,
  };
}

@Module({})
export class DatabaseModule {
  static forRoot(config: DatabaseConfig): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [
        TypeOrmModule.forRoot(toTypeOrmOptions(config)),
        TypeOrmModule.forFeature([MovieRecord]),
      ],
      exports: [TypeOrmModule],
    };
  }
}
