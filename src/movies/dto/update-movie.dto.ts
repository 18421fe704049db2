import {
  IsArray,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
} from 'class-validator';
import { RejectBlankNumber } from './reject-blank-number';

/**
 * Any subset of the movie fields. `rating: null` clears the rating.
 */
export class UpdateMovieDto {
  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @RejectBlankNumber()
  @IsInt()
  year?: number;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @RejectBlankNumber()
  @IsNumber()
  rating?: number | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}
