import {
  IsArray,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
} from 'class-validator';
import { RejectBlankNumber } from './reject-blank-number';

// Shape checks only; title, year and rating ranges are domain rules.
export class CreateMovieDto {
  @IsString()
  title!: string;

  @RejectBlankNumber()
  @IsInt()
  year!: number;

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
