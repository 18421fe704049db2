import {
  BadRequestException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import { Result } from 'neverthrow';
import { CatalogError } from '../catalog/domain/errors';

export function toHttpException(error: CatalogError): HttpException {
  switch (error.kind) {
    case 'validation':
    case 'invalid-filter':
      return new BadRequestException({
        statusCode: 400,
        error: 'Bad Request',
        message: error.message,
        issues: error.issues,
      });
    case 'not-found':
      return new NotFoundException({
        statusCode: 404,
        error: 'Not Found',
        message: error.message,
        movieId: error.movieId,
      });
  }
}

/**
 * Hands the value back, or throws the HTTP exception matching the catalog
 * failure.
 */
export function unwrapOrThrow<T, E extends CatalogError>(
  result: Result<T, E>,
): T {
  if (result.isErr()) {
    throw toHttpException(result.error);
  }
  return result.value;
}
