import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadCatalogConfig, logLevelsFrom } from './config/catalog.config';
import { validationPipeOptions } from './movies/validation-pipe.options';

async function bootstrap() {
  const config = loadCatalogConfig();
  const app = await NestFactory.create(AppModule.register(config), {
    logger: logLevelsFrom(config.logLevel ?? 'log'),
  });

  app.useGlobalPipes(new ValidationPipe(validationPipeOptions));

  await app.listen(config.port);
  new Logger('Bootstrap').log(
    `Movie catalog API listening on port ${config.port} (${config.storage} storage)`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start the movie catalog API',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
