import { IsNumber, ValidateIf } from 'class-validator';
import { RejectBlankNumber } from './reject-blank-number';

export class RateMovieDto {
  // required, but null is accepted and clears the rating
  @ValidateIf((_dto, value) => value !== null)
  @RejectBlankNumber()
  @IsNumber()
  rating!: number | null;
}
