import { Transform } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
} from 'class-validator';
import {
  MOVIE_SORT_FIELDS,
  MovieFilter,
  MovieSortField,
  SORT_ORDERS,
  SortOrder,
} from '../../catalog/domain/movie-filter';
import { RejectBlankNumber } from './reject-blank-number';

/**
 * Query string of `GET /movies`. Numbers arrive as text and are converted by
 * the global ValidationPipe; `tags` is a comma-separated list or a repeated
 * key.
 */
export class ListMoviesQueryDto {
  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @RejectBlankNumber()
  @IsInt()
  year?: number;

  @IsOptional()
  @RejectBlankNumber()
  @IsInt()
  year_from?: number;

  @IsOptional()
  @RejectBlankNumber()
  @IsInt()
  year_to?: number;

  @IsOptional()
  @RejectBlankNumber()
  @IsNumber()
  min_rating?: number;

  @IsOptional()
  @RejectBlankNumber()
  @IsNumber()
  max_rating?: number;

  @IsOptional()
  @Transform(({ value }) =>
    typeof value === 'string' ? value.split(',') : value,
  )
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @IsOptional()
  @IsIn(MOVIE_SORT_FIELDS)
  sort?: MovieSortField;

  @IsOptional()
  @IsIn(SORT_ORDERS)
  order?: SortOrder;
}

export function toMovieFilter(query: ListMoviesQueryDto): MovieFilter {
  return {
    titleContains: query.title,
    year: query.year,
    yearFrom: query.year_from,
    yearTo: query.year_to,
    minRating: query.min_rating,
    maxRating: query.max_rating,
    tags: query.tags,
    sortBy: query.sort,
    order: query.order,
  };
}
