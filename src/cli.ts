#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CatalogModule } from './catalog/catalog.module';
import { runCatalogCli } from './cli/catalog-cli';
import { loadCatalogConfig, logLevelsFrom } from './config/catalog.config';

async function bootstrap() {
  const config = loadCatalogConfig();
  // keep stdout for command output unless a level is asked for
  const app = await NestFactory.createApplicationContext(
    CatalogModule.register(config),
    { logger: logLevelsFrom(config.logLevel ?? 'error') },
  );

  process.exitCode = await runCatalogCli(app, process.argv.slice(2));
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Movie catalog command failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
